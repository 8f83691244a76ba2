/**
 * ToolEmitter - Begin/end events and model-facing results for one tool call
 *
 * A ToolEmitter captures the static description of a tool call when it
 * starts (the command and where it runs, or the patch being applied) and
 * uses that same description for both the begin and the end event, so the
 * two can never disagree.
 *
 * Every (tool kind, lifecycle stage) pair is handled by an exhaustive
 * switch: adding a kind or a stage fails to compile until each combination
 * sends its event.
 */

import {
  ActivityEventType,
  type ExecCommandSource,
  type ExecToolCallOutput,
  type FileChange,
  type FileChanges,
  type ParsedCommand,
} from '../types/index.js';
import { EXEC_EVENTS } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { parseCommand, type CommandParser } from '../utils/commandParser.js';
import { assertNever, formatError } from '../utils/errorUtils.js';
import { formatExecOutputForModel } from '../utils/execOutputFormat.js';
import { payloadFromMessage, payloadFromOutput, type ExecCommandResultPayload } from './execPayload.js';
import type { ToolEventCtx } from './ToolEventContext.js';
import {
  FunctionCallError,
  describeExecError,
  sandboxOutput,
  type ExecResult,
  type FunctionCallResult,
} from './ToolError.js';

export type ToolEmitterKind =
  | {
      readonly type: 'shell';
      readonly command: readonly string[];
      readonly cwd: string;
      readonly source: ExecCommandSource;
      readonly parsedCmd: readonly ParsedCommand[];
    }
  | {
      readonly type: 'apply_patch';
      readonly changes: Readonly<FileChanges>;
      readonly autoApproved: boolean;
    }
  | {
      readonly type: 'unified_exec';
      readonly command: readonly string[];
      readonly cwd: string;
      readonly source: ExecCommandSource;
      readonly interactionInput?: string;
      readonly parsedCmd: readonly ParsedCommand[];
    };

export type ToolEventFailure =
  | { type: 'output'; output: ExecToolCallOutput }
  | { type: 'message'; message: string };

export type ToolEventStage =
  | { type: 'begin' }
  | { type: 'success'; output: ExecToolCallOutput }
  | { type: 'failure'; failure: ToolEventFailure };

/**
 * Fields shared by exec_command_begin and exec_command_end
 */
interface ExecEventMetadata {
  command: readonly string[];
  cwd: string;
  parsedCmd: readonly ParsedCommand[];
  source: ExecCommandSource;
  interactionInput?: string;
}

function freezeChanges(changes: FileChanges): Readonly<FileChanges> {
  const copy: FileChanges = {};
  for (const [filePath, change] of Object.entries(changes)) {
    copy[filePath] = Object.freeze({ ...change });
  }
  return Object.freeze(copy);
}

function copyChanges(changes: Readonly<FileChanges>): FileChanges {
  const copy: FileChanges = {};
  for (const [filePath, change] of Object.entries(changes)) {
    const cloned: FileChange = { ...change };
    copy[filePath] = cloned;
  }
  return copy;
}

export class ToolEmitter {
  readonly kind: ToolEmitterKind;

  private constructor(kind: ToolEmitterKind) {
    this.kind = Object.freeze(kind);
  }

  static shell(
    command: readonly string[],
    cwd: string,
    source: ExecCommandSource = 'agent',
    parser: CommandParser = parseCommand
  ): ToolEmitter {
    return new ToolEmitter({
      type: 'shell',
      command: Object.freeze([...command]),
      cwd,
      source,
      parsedCmd: Object.freeze(parser(command)),
    });
  }

  static applyPatch(changes: FileChanges, autoApproved: boolean): ToolEmitter {
    return new ToolEmitter({
      type: 'apply_patch',
      changes: freezeChanges(changes),
      autoApproved,
    });
  }

  static unifiedExec(
    command: readonly string[],
    cwd: string,
    source: ExecCommandSource,
    interactionInput?: string,
    parser: CommandParser = parseCommand
  ): ToolEmitter {
    return new ToolEmitter({
      type: 'unified_exec',
      command: Object.freeze([...command]),
      cwd,
      source,
      interactionInput,
      parsedCmd: Object.freeze(parser(command)),
    });
  }

  /**
   * Send the event for a lifecycle stage of this call
   */
  async emit(ctx: ToolEventCtx, stage: ToolEventStage): Promise<void> {
    const kind = this.kind;
    switch (kind.type) {
      case 'shell':
        return emitExecStage(ctx, {
          command: kind.command,
          cwd: kind.cwd,
          parsedCmd: kind.parsedCmd,
          source: kind.source,
        }, stage);
      case 'unified_exec':
        return emitExecStage(ctx, {
          command: kind.command,
          cwd: kind.cwd,
          parsedCmd: kind.parsedCmd,
          source: kind.source,
          interactionInput: kind.interactionInput,
        }, stage);
      case 'apply_patch':
        return emitPatchStage(ctx, kind.changes, kind.autoApproved, stage);
      default:
        return assertNever(kind, 'tool kind');
    }
  }

  async begin(ctx: ToolEventCtx): Promise<void> {
    await this.emit(ctx, { type: 'begin' });
  }

  /**
   * Turn the outcome of running the tool into the end event and the text
   * returned to the model
   *
   * Both are derived from the same data, and the event is sent before this
   * resolves.
   */
  async finish(ctx: ToolEventCtx, result: ExecResult): Promise<FunctionCallResult> {
    const { stage, response } = classifyOutcome(ctx, result);
    await this.emit(ctx, stage);
    return response;
  }
}

/**
 * Map an execution result to the stage to emit and the model's result
 *
 * - Success: Success stage; an error result for the model when the exit
 *   code is non-zero, with the same rendered output.
 * - Sandbox timeout/denial: Failure with the captured output.
 * - Other execution errors: Failure with a diagnostic message.
 * - Rejection before running: Failure with the normalized rejection text.
 */
function classifyOutcome(
  ctx: ToolEventCtx,
  result: ExecResult
): { stage: ToolEventStage; response: FunctionCallResult } {
  const limits = ctx.session.getOutputLimits();

  if (result.ok) {
    const content = formatExecOutputForModel(result.output, limits);
    return {
      stage: { type: 'success', output: result.output },
      response: result.output.exit_code === 0
        ? { success: true, content }
        : { success: false, error: new FunctionCallError(content) },
    };
  }

  const error = result.error;
  switch (error.type) {
    case 'exec': {
      const output = sandboxOutput(error.error);
      if (output !== undefined) {
        return {
          stage: { type: 'failure', failure: { type: 'output', output } },
          response: { success: false, error: new FunctionCallError(formatExecOutputForModel(output, limits)) },
        };
      }
      const message = `${EXEC_EVENTS.EXECUTION_ERROR_PREFIX}: ${describeExecError(error.error)}`;
      return {
        stage: { type: 'failure', failure: { type: 'message', message } },
        response: { success: false, error: new FunctionCallError(message) },
      };
    }
    case 'rejected': {
      const message = ctx.session.normalizeRejection(error.message);
      return {
        stage: { type: 'failure', failure: { type: 'message', message } },
        response: { success: false, error: new FunctionCallError(message) },
      };
    }
    default:
      return assertNever(error, 'tool error');
  }
}

async function emitExecStage(ctx: ToolEventCtx, meta: ExecEventMetadata, stage: ToolEventStage): Promise<void> {
  switch (stage.type) {
    case 'begin':
      return emitExecCommandBegin(ctx, meta);
    case 'success':
      return emitExecEnd(ctx, meta, payloadFromOutput(stage.output, ctx.session.getOutputLimits()));
    case 'failure': {
      const failure = stage.failure;
      switch (failure.type) {
        case 'output':
          return emitExecEnd(ctx, meta, payloadFromOutput(failure.output, ctx.session.getOutputLimits()));
        case 'message':
          return emitExecEnd(ctx, meta, payloadFromMessage(failure.message));
        default:
          return assertNever(failure, 'failure');
      }
    }
    default:
      return assertNever(stage, 'stage');
  }
}

async function emitPatchStage(
  ctx: ToolEventCtx,
  changes: Readonly<FileChanges>,
  autoApproved: boolean,
  stage: ToolEventStage
): Promise<void> {
  switch (stage.type) {
    case 'begin':
      return emitPatchBegin(ctx, changes, autoApproved);
    case 'success':
      return emitPatchEnd(ctx, stage.output.stdout, stage.output.stderr, stage.output.exit_code === 0);
    case 'failure': {
      const failure = stage.failure;
      switch (failure.type) {
        case 'output':
          return emitPatchEnd(ctx, failure.output.stdout, failure.output.stderr, failure.output.exit_code === 0);
        case 'message':
          return emitPatchEnd(ctx, '', failure.message, false);
        default:
          return assertNever(failure, 'failure');
      }
    }
    default:
      return assertNever(stage, 'stage');
  }
}

function interactionField(meta: ExecEventMetadata): { interaction_input?: string } {
  return meta.interactionInput === undefined ? {} : { interaction_input: meta.interactionInput };
}

async function emitExecCommandBegin(ctx: ToolEventCtx, meta: ExecEventMetadata): Promise<void> {
  logger.debug('[TOOL_EVENTS] exec_command_begin', ctx.callId);
  await ctx.session.sendEvent(ctx.turn, {
    type: ActivityEventType.EXEC_COMMAND_BEGIN,
    call_id: ctx.callId,
    turn_id: ctx.turn.sub_id,
    command: [...meta.command],
    cwd: meta.cwd,
    parsed_cmd: meta.parsedCmd.map(parsed => ({ ...parsed })),
    source: meta.source,
    ...interactionField(meta),
  });
}

async function emitExecEnd(
  ctx: ToolEventCtx,
  meta: ExecEventMetadata,
  payload: ExecCommandResultPayload
): Promise<void> {
  logger.debug('[TOOL_EVENTS] exec_command_end', ctx.callId, 'exit_code:', payload.exit_code);
  await ctx.session.sendEvent(ctx.turn, {
    type: ActivityEventType.EXEC_COMMAND_END,
    call_id: ctx.callId,
    turn_id: ctx.turn.sub_id,
    command: [...meta.command],
    cwd: meta.cwd,
    parsed_cmd: meta.parsedCmd.map(parsed => ({ ...parsed })),
    source: meta.source,
    ...interactionField(meta),
    stdout: payload.stdout,
    stderr: payload.stderr,
    aggregated_output: payload.aggregated_output,
    exit_code: payload.exit_code,
    duration_ms: payload.duration_ms,
    formatted_output: payload.formatted_output,
  });
}

async function emitPatchBegin(
  ctx: ToolEventCtx,
  changes: Readonly<FileChanges>,
  autoApproved: boolean
): Promise<void> {
  const tracker = ctx.turnDiffTracker;
  if (tracker) {
    try {
      await tracker.withLock(t => t.onPatchBegin(copyChanges(changes)));
    } catch (error) {
      logger.warn(`[TOOL_EVENTS] Diff tracker could not snapshot ${ctx.callId}: ${formatError(error)}`);
    }
  }

  logger.debug('[TOOL_EVENTS] patch_apply_begin', ctx.callId);
  await ctx.session.sendEvent(ctx.turn, {
    type: ActivityEventType.PATCH_APPLY_BEGIN,
    call_id: ctx.callId,
    auto_approved: autoApproved,
    changes: copyChanges(changes),
  });
}

/**
 * Send patch_apply_end, then the turn's accumulated diff if there is one
 *
 * The tracker lock covers only the diff computation, not the send. A diff
 * error means no turn_diff event.
 */
async function emitPatchEnd(ctx: ToolEventCtx, stdout: string, stderr: string, success: boolean): Promise<void> {
  logger.debug('[TOOL_EVENTS] patch_apply_end', ctx.callId, 'success:', success);
  await ctx.session.sendEvent(ctx.turn, {
    type: ActivityEventType.PATCH_APPLY_END,
    call_id: ctx.callId,
    stdout,
    stderr,
    success,
  });

  const tracker = ctx.turnDiffTracker;
  if (!tracker || !ctx.session.isTurnDiffEnabled()) {
    return;
  }

  let unifiedDiff: string | null;
  try {
    unifiedDiff = await tracker.withLock(t => t.getUnifiedDiff());
  } catch (error) {
    logger.debug(`[TOOL_EVENTS] Turn diff unavailable after ${ctx.callId}: ${formatError(error)}`);
    return;
  }

  if (unifiedDiff) {
    await ctx.session.sendEvent(ctx.turn, {
      type: ActivityEventType.TURN_DIFF,
      unified_diff: unifiedDiff,
    });
  }
}
