/**
 * Rendering of command output for display and for the model
 *
 * Clients receive the full stdout/stderr streams in events; only the
 * formatted copy is capped, keeping the head and tail of the output around
 * an elision marker.
 */

import type { ExecToolCallOutput, OutputLimits } from '../types/index.js';
import { MODEL_FORMAT } from '../config/constants.js';

export const DEFAULT_OUTPUT_LIMITS: OutputLimits = {
  maxBytes: MODEL_FORMAT.MAX_BYTES,
  maxLines: MODEL_FORMAT.MAX_LINES,
};

function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/**
 * Count lines the way a line iterator would: a trailing newline does not
 * start another line.
 */
export function countLines(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  const newlines = text.split('\n').length - 1;
  return text.endsWith('\n') ? newlines : newlines + 1;
}

/**
 * Split into lines, each keeping its terminating newline
 */
function splitInclusive(text: string): string[] {
  const segments = text.match(/[^\n]*\n|[^\n]+$/g);
  return segments ?? [];
}

/**
 * Longest prefix of text that fits in maxBytes without splitting a character
 */
export function takeBytesFromStart(text: string, maxBytes: number): string {
  if (byteLength(text) <= maxBytes) {
    return text;
  }
  let used = 0;
  let end = 0;
  for (const char of text) {
    const size = byteLength(char);
    if (used + size > maxBytes) {
      break;
    }
    used += size;
    end += char.length;
  }
  return text.slice(0, end);
}

/**
 * Longest suffix of text that fits in maxBytes without splitting a character
 */
export function takeBytesFromEnd(text: string, maxBytes: number): string {
  if (byteLength(text) <= maxBytes) {
    return text;
  }
  const chars = Array.from(text);
  let used = 0;
  let start = chars.length;
  while (start > 0) {
    const size = byteLength(chars[start - 1] ?? '');
    if (used + size > maxBytes) {
      break;
    }
    used += size;
    start--;
  }
  return chars.slice(start).join('');
}

/**
 * Format the aggregated output of a command
 *
 * Timed-out commands get a leading line saying so. Output over the byte or
 * line budget keeps the first and last lines with a marker in between.
 */
export function formatExecOutputStr(
  output: ExecToolCallOutput,
  limits: OutputLimits = DEFAULT_OUTPUT_LIMITS
): string {
  let text = output.aggregated_output;
  if (output.timed_out) {
    text = `command timed out after ${output.duration_ms} milliseconds\n${text}`;
  }

  const totalLines = countLines(text);
  if (byteLength(text) <= limits.maxBytes && totalLines <= limits.maxLines) {
    return text;
  }

  const segments = splitInclusive(text);
  const headLines = Math.floor(limits.maxLines / 2);
  const headTake = Math.min(headLines, segments.length);
  const tailTake = Math.min(limits.maxLines - headLines, segments.length - headTake);
  const omitted = segments.length - headTake - tailTake;

  const head = segments.slice(0, headTake).join('');
  const tail = segments.slice(segments.length - tailTake).join('');
  const marker = `\n[... omitted ${omitted} of ${totalLines} lines ...]\n\n`;

  const headBudget = Math.max(0, Math.min(Math.floor(limits.maxBytes / 2), limits.maxBytes - byteLength(marker)));
  const headPart = takeBytesFromStart(head, headBudget);
  const remaining = Math.max(0, limits.maxBytes - byteLength(headPart) - byteLength(marker));
  const tailPart = remaining > 0 ? takeBytesFromEnd(tail, remaining) : '';

  return `${headPart}${marker}${tailPart}`;
}

/**
 * Render command output as the JSON document returned to the model
 *
 * @returns `{"output": ..., "metadata": {"exit_code": ..., "duration_seconds": ...}}`
 */
export function formatExecOutputForModel(
  output: ExecToolCallOutput,
  limits: OutputLimits = DEFAULT_OUTPUT_LIMITS
): string {
  // Seconds, rounded to one decimal place
  const durationSeconds = Math.round((output.duration_ms / 1000) * 10) / 10;

  return JSON.stringify({
    output: formatExecOutputStr(output, limits),
    metadata: {
      exit_code: output.exit_code,
      duration_seconds: durationSeconds,
    },
  });
}
