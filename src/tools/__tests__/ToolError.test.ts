/**
 * Tests for tool error helpers
 */

import { describe, it, expect } from 'vitest';
import { ExecError, describeExecError, sandboxOutput, toolErrorFromUnknown } from '../ToolError.js';
import type { ExecToolCallOutput } from '@shared/index.js';

const OUTPUT: ExecToolCallOutput = {
  stdout: '',
  stderr: 'blocked\n',
  aggregated_output: 'blocked\n',
  exit_code: 1,
  duration_ms: 300,
  timed_out: false,
};

describe('ToolError', () => {
  it('should build sandbox errors that carry output', () => {
    const timeout = ExecError.timeout(OUTPUT);
    const denied = ExecError.denied(OUTPUT);

    expect(timeout.message).toBe('command timed out after 300 milliseconds');
    expect(sandboxOutput(timeout)).toBe(OUTPUT);
    expect(sandboxOutput(denied)).toBe(OUTPUT);
  });

  it('should not expose output for other error codes', () => {
    expect(sandboxOutput(ExecError.signal(15))).toBeUndefined();
    expect(sandboxOutput(new ExecError('io', 'read failed', { output: OUTPUT }))).toBeUndefined();
  });

  it('should describe errors by code and message', () => {
    expect(describeExecError(ExecError.signal(15))).toBe('sandbox_signal: command was killed by signal 15');
  });

  it('should wrap unknown thrown values as internal errors', () => {
    const fromString = toolErrorFromUnknown('bad state');
    expect(fromString.type).toBe('exec');
    if (fromString.type === 'exec') {
      expect(fromString.error.code).toBe('internal');
      expect(fromString.error.message).toBe('bad state');
    }

    const original = new ExecError('spawn_failed', 'ENOENT');
    expect(toolErrorFromUnknown(original)).toEqual({ type: 'exec', error: original });
  });
});
