/**
 * toolcast - tool lifecycle events and model-facing results
 */

export * from './types/index.js';
export * from './config/index.js';

export { ActivityStream } from './services/ActivityStream.js';
export { ConfigManager } from './services/ConfigManager.js';
export { Logger, LogLevel, logger } from './services/Logger.js';
export { Session, type EventSink } from './services/Session.js';
export {
  FileSystemTurnDiffTracker,
  SharedTurnDiffTracker,
  type TurnDiffTracker,
} from './services/TurnDiffTracker.js';

export {
  ToolEmitter,
  type ToolEmitterKind,
  type ToolEventFailure,
  type ToolEventStage,
} from './tools/ToolEmitter.js';
export { createToolEventCtx, type ToolEventCtx } from './tools/ToolEventContext.js';
export { runToolWithEvents, type RunToolOptions, type ToolExecutor } from './tools/ToolEventRunner.js';
export { payloadFromMessage, payloadFromOutput, type ExecCommandResultPayload } from './tools/execPayload.js';
export {
  ExecError,
  FunctionCallError,
  describeExecError,
  execFailure,
  rejected,
  sandboxOutput,
  toolErrorFromUnknown,
  type ExecErrorCode,
  type ExecResult,
  type FunctionCallErrorCode,
  type FunctionCallResult,
  type ToolError,
} from './tools/ToolError.js';

export { parseCommand, shellJoin, tokenizeScript, type CommandParser } from './utils/commandParser.js';
export { formatExecOutputForModel, formatExecOutputStr, DEFAULT_OUTPUT_LIMITS } from './utils/execOutputFormat.js';
export { createGitFileDiff, calculateDiffStats, type DiffStats } from './utils/diffUtils.js';
export { Mutex } from './utils/Mutex.js';
