/**
 * Core type definitions for toolcast
 */

// ===========================
// Command Types
// ===========================

/**
 * Who started a command: the model, the user's own shell, or an
 * interactive exec session (its startup or a later interaction).
 */
export type ExecCommandSource =
  | 'agent'
  | 'user_shell'
  | 'unified_exec_startup'
  | 'unified_exec_interaction';

/**
 * Display-oriented decomposition of a command line
 */
export type ParsedCommand =
  | { type: 'read'; cmd: string; name: string; path: string }
  | { type: 'list_files'; cmd: string; path?: string }
  | { type: 'search'; cmd: string; query?: string; path?: string }
  | { type: 'unknown'; cmd: string };

// ===========================
// Patch Types
// ===========================

export type FileChange =
  | { type: 'add'; content: string }
  | { type: 'delete'; content: string }
  | { type: 'update'; unified_diff: string; move_path?: string };

/** Absolute file path -> change */
export type FileChanges = Record<string, FileChange>;

// ===========================
// Execution Types
// ===========================

/**
 * Output of a finished process, as produced by the executor
 */
export interface ExecToolCallOutput {
  stdout: string;
  stderr: string;
  /** Interleaved stdout/stderr */
  aggregated_output: string;
  exit_code: number;
  duration_ms: number;
  timed_out: boolean;
}

// ===========================
// Event Types
// ===========================

export enum ActivityEventType {
  EXEC_COMMAND_BEGIN = 'exec_command_begin',
  EXEC_COMMAND_END = 'exec_command_end',
  PATCH_APPLY_BEGIN = 'patch_apply_begin',
  PATCH_APPLY_END = 'patch_apply_end',
  TURN_DIFF = 'turn_diff',
}

export interface ExecCommandBeginEvent {
  type: ActivityEventType.EXEC_COMMAND_BEGIN;
  call_id: string;
  turn_id: string;
  command: string[];
  cwd: string;
  parsed_cmd: ParsedCommand[];
  source: ExecCommandSource;
  interaction_input?: string;
}

export interface ExecCommandEndEvent {
  type: ActivityEventType.EXEC_COMMAND_END;
  call_id: string;
  turn_id: string;
  command: string[];
  cwd: string;
  parsed_cmd: ParsedCommand[];
  source: ExecCommandSource;
  interaction_input?: string;
  stdout: string;
  stderr: string;
  aggregated_output: string;
  exit_code: number;
  duration_ms: number;
  formatted_output: string;
}

export interface PatchApplyBeginEvent {
  type: ActivityEventType.PATCH_APPLY_BEGIN;
  call_id: string;
  auto_approved: boolean;
  changes: FileChanges;
}

export interface PatchApplyEndEvent {
  type: ActivityEventType.PATCH_APPLY_END;
  call_id: string;
  stdout: string;
  stderr: string;
  success: boolean;
}

export interface TurnDiffEvent {
  type: ActivityEventType.TURN_DIFF;
  unified_diff: string;
}

export type EventMsg =
  | ExecCommandBeginEvent
  | ExecCommandEndEvent
  | PatchApplyBeginEvent
  | PatchApplyEndEvent
  | TurnDiffEvent;

/**
 * Envelope delivered to activity stream subscribers
 */
export interface ActivityEvent {
  id: string;
  type: ActivityEventType;
  timestamp: number;
  turn_id: string;
  parentId?: string;
  data: EventMsg;
}

export type ActivityCallback = (event: ActivityEvent) => void;

// ===========================
// Turn Types
// ===========================

/**
 * The conversational turn a tool call belongs to
 */
export interface TurnContext {
  /** Submission id of the turn; referenced by every event in it */
  sub_id: string;
  cwd: string;
}

// ===========================
// Configuration Types
// ===========================

export type LogLevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export interface Config {
  log_level: LogLevelName;
  model_output_max_bytes: number;
  model_output_max_lines: number;
  diff_context_lines: number;
  emit_turn_diff: boolean;
  rejection_messages: Record<string, string>;
}

export type ConfigKey = keyof Config;

export type ConfigValue = Config[ConfigKey];

/**
 * Budget applied when rendering command output for the model
 */
export interface OutputLimits {
  maxBytes: number;
  maxLines: number;
}
