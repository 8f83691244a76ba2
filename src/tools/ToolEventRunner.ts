/**
 * ToolEventRunner - Runs a tool between its begin and end events
 *
 * Guarantees the end event: a thrown executor error becomes an execution
 * failure, and an abort finishes the call with a rejection straight away.
 * Whatever the executor returns after an abort is dropped.
 */

import { EXEC_EVENTS } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import type { ToolEmitter } from './ToolEmitter.js';
import type { ToolEventCtx } from './ToolEventContext.js';
import { rejected, toolErrorFromUnknown, type ExecResult, type FunctionCallResult } from './ToolError.js';

export type ToolExecutor = (signal?: AbortSignal) => Promise<ExecResult>;

export interface RunToolOptions {
  signal?: AbortSignal;
}

const ABORTED = Symbol('aborted');

function abortPromise(signal: AbortSignal): { promise: Promise<typeof ABORTED>; dispose: () => void } {
  let onAbort: (() => void) | undefined;
  const promise = new Promise<typeof ABORTED>(resolve => {
    onAbort = () => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      if (onAbort) {
        signal.removeEventListener('abort', onAbort);
      }
    },
  };
}

async function settle(execute: ToolExecutor, signal?: AbortSignal): Promise<ExecResult> {
  try {
    return await execute(signal);
  } catch (error) {
    return { ok: false, error: toolErrorFromUnknown(error) };
  }
}

/**
 * Emit begin, execute, and finish with the outcome
 */
export async function runToolWithEvents(
  emitter: ToolEmitter,
  ctx: ToolEventCtx,
  execute: ToolExecutor,
  options: RunToolOptions = {}
): Promise<FunctionCallResult> {
  const { signal } = options;

  await emitter.begin(ctx);

  if (signal?.aborted) {
    return emitter.finish(ctx, rejected(EXEC_EVENTS.ABORTED_MESSAGE));
  }

  if (!signal) {
    return emitter.finish(ctx, await settle(execute));
  }

  const abort = abortPromise(signal);
  try {
    const outcome = await Promise.race([settle(execute, signal), abort.promise]);
    if (outcome === ABORTED) {
      logger.debug('[TOOL_EVENTS] Tool call aborted:', ctx.callId);
      return emitter.finish(ctx, rejected(EXEC_EVENTS.ABORTED_MESSAGE));
    }
    return emitter.finish(ctx, outcome);
  } finally {
    abort.dispose();
  }
}
