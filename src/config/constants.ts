/**
 * Application-wide constants for sizes, limits, and fixed messages
 *
 * These values are for internal use and maintenance - they are not exposed
 * to users through the configuration system. User-tunable settings live in
 * defaults.ts.
 */

// ===========================================
// BUFFER SIZES
// ===========================================

export const BUFFER_SIZES = {
  /** Maximum number of log entries to store in memory (5000 entries) */
  MAX_LOG_BUFFER_SIZE: 5000,

  /** Maximum length for a single log message (10KB) */
  MAX_LOG_MESSAGE_LENGTH: 10 * 1024,

  /** Listener count per event type above which the activity stream warns */
  MAX_LISTENERS_PER_TYPE: 50,
} as const;

// ===========================================
// MODEL OUTPUT FORMATTING
// ===========================================

/**
 * Budget for command output rendered into the conversation.
 * Clients still receive the full streams; only the model's copy is capped.
 */
export const MODEL_FORMAT = {
  /** Maximum size of the formatted output (10KB) */
  MAX_BYTES: 10 * 1024,

  /** Maximum number of lines of the formatted output */
  MAX_LINES: 256,
} as const;

// ===========================================
// EXEC EVENTS
// ===========================================

export const EXEC_EVENTS = {
  /** Exit code reported when no process ran */
  NO_PROCESS_EXIT_CODE: -1,

  /** Prefix of the diagnostic sent for execution-layer errors */
  EXECUTION_ERROR_PREFIX: 'execution error',

  /** Rejection text used when a tool call is aborted mid-flight */
  ABORTED_MESSAGE: 'aborted by user',
} as const;

// ===========================================
// ID GENERATION
// ===========================================

export const ID_GENERATION = {
  /** Random string radix for base-36 encoding (0-9, a-z) */
  RANDOM_STRING_RADIX: 36,

  /** Random string substring start index (skip '0.' prefix from Math.random()) */
  RANDOM_STRING_SUBSTRING_START: 2,

  /** Random string length for event IDs (9 characters) */
  RANDOM_STRING_LENGTH_LONG: 9,
} as const;

// ===========================================
// TURN DIFF
// ===========================================

export const TURN_DIFF = {
  /** File mode written into git-style headers */
  DEFAULT_FILE_MODE: '100644',

  /** Placeholder path for the absent side of an add or delete */
  DEV_NULL: '/dev/null',
} as const;
