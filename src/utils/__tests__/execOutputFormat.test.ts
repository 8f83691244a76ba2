/**
 * Tests for execOutputFormat - head/tail truncation and the model document
 */

import { describe, it, expect } from 'vitest';
import {
  countLines,
  formatExecOutputForModel,
  formatExecOutputStr,
  takeBytesFromEnd,
  takeBytesFromStart,
} from '../execOutputFormat.js';
import type { ExecToolCallOutput } from '@shared/index.js';

function output(aggregated: string, overrides: Partial<ExecToolCallOutput> = {}): ExecToolCallOutput {
  return {
    stdout: aggregated,
    stderr: '',
    aggregated_output: aggregated,
    exit_code: 0,
    duration_ms: 0,
    timed_out: false,
    ...overrides,
  };
}

describe('execOutputFormat', () => {
  describe('countLines', () => {
    it('should not count a trailing newline as a line', () => {
      expect(countLines('')).toBe(0);
      expect(countLines('a')).toBe(1);
      expect(countLines('a\n')).toBe(1);
      expect(countLines('a\nb')).toBe(2);
      expect(countLines('\n\n')).toBe(2);
    });
  });

  describe('takeBytesFromStart / takeBytesFromEnd', () => {
    it('should not split multi-byte characters', () => {
      expect(takeBytesFromStart('héllo', 2)).toBe('h');
      expect(takeBytesFromStart('héllo', 3)).toBe('hé');
      expect(takeBytesFromEnd('héllo', 4)).toBe('llo');
      expect(takeBytesFromEnd('héllo', 5)).toBe('éllo');
    });

    it('should return the whole text when it fits', () => {
      expect(takeBytesFromStart('abc', 10)).toBe('abc');
      expect(takeBytesFromEnd('abc', 3)).toBe('abc');
    });
  });

  describe('formatExecOutputStr', () => {
    it('should return output within limits unchanged', () => {
      expect(formatExecOutputStr(output('a\nb\n'), { maxBytes: 100, maxLines: 2 })).toBe('a\nb\n');
    });

    it('should keep head and tail lines around a marker', () => {
      const text = 'l1\nl2\nl3\nl4\nl5\nl6\n';

      expect(formatExecOutputStr(output(text), { maxBytes: 10240, maxLines: 4 })).toBe(
        'l1\nl2\n\n[... omitted 2 of 6 lines ...]\n\nl5\nl6\n'
      );
    });

    it('should trim the tail to the remaining byte budget', () => {
      const text = 'line-1\nline-2\nline-3\nline-4\nline-5\nline-6\n';

      const formatted = formatExecOutputStr(output(text), { maxBytes: 55, maxLines: 4 });

      expect(formatted).toBe('line-1\nline-2\n\n[... omitted 2 of 6 lines ...]\n\n\nline-6\n');
      expect(Buffer.byteLength(formatted)).toBe(55);
    });

    it('should prefix timed-out output', () => {
      const formatted = formatExecOutputStr(output('partial\n', { timed_out: true, duration_ms: 2500 }));

      expect(formatted).toBe('command timed out after 2500 milliseconds\npartial\n');
    });

    it('should render the timeout line for empty output', () => {
      const formatted = formatExecOutputStr(output('', { timed_out: true, duration_ms: 10 }));

      expect(formatted).toBe('command timed out after 10 milliseconds\n');
    });

    it('should use aggregated output rather than stdout', () => {
      const formatted = formatExecOutputStr(output('both\n', { stdout: 'out only\n' }));

      expect(formatted).toBe('both\n');
    });
  });

  describe('formatExecOutputForModel', () => {
    it('should produce the output and metadata document', () => {
      const content = formatExecOutputForModel(output('hi\n', { exit_code: 3, duration_ms: 1234 }));

      expect(content).toBe('{"output":"hi\\n","metadata":{"exit_code":3,"duration_seconds":1.2}}');
    });

    it('should round the duration to one decimal place', () => {
      const content = formatExecOutputForModel(output('', { duration_ms: 2960 }));

      expect(JSON.parse(content)).toEqual({ output: '', metadata: { exit_code: 0, duration_seconds: 3 } });
    });
  });
});
