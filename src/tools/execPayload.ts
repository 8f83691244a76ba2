/**
 * Result fields of an exec_command_end event
 */

import type { ExecToolCallOutput, OutputLimits } from '../types/index.js';
import { EXEC_EVENTS } from '../config/constants.js';
import { formatExecOutputStr, DEFAULT_OUTPUT_LIMITS } from '../utils/execOutputFormat.js';

export interface ExecCommandResultPayload {
  stdout: string;
  stderr: string;
  aggregated_output: string;
  exit_code: number;
  duration_ms: number;
  formatted_output: string;
}

export function payloadFromOutput(
  output: ExecToolCallOutput,
  limits: OutputLimits = DEFAULT_OUTPUT_LIMITS
): ExecCommandResultPayload {
  return {
    stdout: output.stdout,
    stderr: output.stderr,
    aggregated_output: output.aggregated_output,
    exit_code: output.exit_code,
    duration_ms: output.duration_ms,
    formatted_output: formatExecOutputStr(output, limits),
  };
}

/**
 * Payload for a failure where no process ran: exit code -1, zero duration,
 * and the message standing in for the output.
 */
export function payloadFromMessage(message: string): ExecCommandResultPayload {
  return {
    stdout: '',
    stderr: message,
    aggregated_output: message,
    exit_code: EXEC_EVENTS.NO_PROCESS_EXIT_CODE,
    duration_ms: 0,
    formatted_output: message,
  };
}
