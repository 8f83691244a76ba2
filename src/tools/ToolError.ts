/**
 * Error types produced while running a tool and returned to the model
 */

import type { ExecToolCallOutput } from '../types/index.js';
import { formatError } from '../utils/errorUtils.js';

export type ExecErrorCode =
  | 'sandbox_timeout'
  | 'sandbox_denied'
  | 'sandbox_signal'
  | 'spawn_failed'
  | 'io'
  | 'internal';

/**
 * Failure reported by the execution layer
 *
 * Sandbox timeouts and denials carry the output the process produced
 * before it was stopped.
 */
export class ExecError extends Error {
  readonly code: ExecErrorCode;
  readonly output?: ExecToolCallOutput;
  readonly signal?: number;

  constructor(code: ExecErrorCode, message: string, options: { output?: ExecToolCallOutput; signal?: number } = {}) {
    super(message);
    this.name = 'ExecError';
    this.code = code;
    this.output = options.output;
    this.signal = options.signal;
  }

  static timeout(output: ExecToolCallOutput): ExecError {
    return new ExecError('sandbox_timeout', `command timed out after ${output.duration_ms} milliseconds`, { output });
  }

  static denied(output: ExecToolCallOutput): ExecError {
    return new ExecError('sandbox_denied', 'command was denied by the sandbox', { output });
  }

  static signal(signal: number): ExecError {
    return new ExecError('sandbox_signal', `command was killed by signal ${signal}`, { signal });
  }
}

/**
 * Why a tool call produced no successful output
 */
export type ToolError =
  | { type: 'exec'; error: ExecError }
  | { type: 'rejected'; message: string };

/**
 * Result of executing a tool, as handed to ToolEmitter.finish
 */
export type ExecResult =
  | { ok: true; output: ExecToolCallOutput }
  | { ok: false; error: ToolError };

export type FunctionCallErrorCode = 'respond_to_model';

/**
 * Error text that goes back into the conversation as the tool's result
 */
export class FunctionCallError extends Error {
  readonly code: FunctionCallErrorCode;

  constructor(message: string, code: FunctionCallErrorCode = 'respond_to_model') {
    super(message);
    this.name = 'FunctionCallError';
    this.code = code;
  }
}

export type FunctionCallResult =
  | { success: true; content: string }
  | { success: false; error: FunctionCallError };

/**
 * Sandbox errors that still carry the process output
 */
export function sandboxOutput(error: ExecError): ExecToolCallOutput | undefined {
  switch (error.code) {
    case 'sandbox_timeout':
    case 'sandbox_denied':
      return error.output;
    default:
      return undefined;
  }
}

/**
 * Describe an execution error for the model
 */
export function describeExecError(error: ExecError): string {
  return `${error.code}: ${error.message}`;
}

/**
 * Convert anything thrown by an executor into a tool error
 */
export function toolErrorFromUnknown(error: unknown): ToolError {
  if (error instanceof ExecError) {
    return { type: 'exec', error };
  }
  return { type: 'exec', error: new ExecError('internal', formatError(error)) };
}

export function execFailure(error: ExecError): ExecResult {
  return { ok: false, error: { type: 'exec', error } };
}

export function rejected(message: string): ExecResult {
  return { ok: false, error: { type: 'rejected', message } };
}
