/**
 * Tests for runToolWithEvents - begin/end pairing around an executor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { runToolWithEvents, type ToolExecutor } from '../ToolEventRunner.js';
import { ToolEmitter } from '../ToolEmitter.js';
import { createToolEventCtx, type ToolEventCtx } from '../ToolEventContext.js';
import { ExecError } from '../ToolError.js';
import { ActivityStream } from '@services/ActivityStream.js';
import { Session } from '@services/Session.js';
import type { EventMsg, ExecToolCallOutput } from '@shared/index.js';

const OUTPUT: ExecToolCallOutput = {
  stdout: 'done\n',
  stderr: '',
  aggregated_output: 'done\n',
  exit_code: 0,
  duration_ms: 500,
  timed_out: false,
};

describe('runToolWithEvents', () => {
  let stream: ActivityStream;
  let events: EventMsg[];
  let ctx: ToolEventCtx;
  let emitter: ToolEmitter;

  beforeEach(() => {
    stream = new ActivityStream();
    events = [];
    stream.subscribe('*', event => events.push(event.data));
    ctx = createToolEventCtx(new Session(stream), { sub_id: 'turn-7', cwd: '/work' }, 'call-7');
    emitter = ToolEmitter.shell(['make'], '/work');
  });

  afterEach(() => {
    stream.cleanup();
  });

  it('should emit begin and end around a successful run', async () => {
    const execute: ToolExecutor = async () => ({ ok: true, output: OUTPUT });

    const result = await runToolWithEvents(emitter, ctx, execute);

    expect(result).toEqual({
      success: true,
      content: '{"output":"done\\n","metadata":{"exit_code":0,"duration_seconds":0.5}}',
    });
    expect(events.map(event => event.type)).toEqual(['exec_command_begin', 'exec_command_end']);
  });

  it('should turn a thrown error into an execution failure', async () => {
    const execute: ToolExecutor = async () => {
      throw new Error('boom');
    };

    const result = await runToolWithEvents(emitter, ctx, execute);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('execution error: internal: boom');
    }
    expect(events[1]).toMatchObject({
      type: 'exec_command_end',
      stderr: 'execution error: internal: boom',
      exit_code: -1,
    });
  });

  it('should keep the code of a thrown ExecError', async () => {
    const execute: ToolExecutor = async () => {
      throw new ExecError('io', 'broken pipe');
    };

    const result = await runToolWithEvents(emitter, ctx, execute);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('execution error: io: broken pipe');
    }
  });

  it('should not run the executor when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const execute = vi.fn<ToolExecutor>(async () => ({ ok: true, output: OUTPUT }));

    const result = await runToolWithEvents(emitter, ctx, execute, { signal: controller.signal });

    expect(execute).not.toHaveBeenCalled();
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('aborted by user');
    }
    expect(events.map(event => event.type)).toEqual(['exec_command_begin', 'exec_command_end']);
  });

  it('should finish with an end event when aborted mid-run', async () => {
    const controller = new AbortController();
    let markStarted: () => void = () => {};
    const started = new Promise<void>(resolve => {
      markStarted = resolve;
    });
    const execute: ToolExecutor = () => {
      markStarted();
      return new Promise(() => {});
    };

    const run = runToolWithEvents(emitter, ctx, execute, { signal: controller.signal });
    await started;
    controller.abort();
    const result = await run;

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('aborted by user');
    }
    expect(events[1]).toMatchObject({
      type: 'exec_command_end',
      call_id: 'call-7',
      stderr: 'aborted by user',
      exit_code: -1,
      duration_ms: 0,
    });
  });

  it('should pass the signal to the executor', async () => {
    const controller = new AbortController();
    const execute = vi.fn<ToolExecutor>(async () => ({ ok: true, output: OUTPUT }));

    await runToolWithEvents(emitter, ctx, execute, { signal: controller.signal });

    expect(execute).toHaveBeenCalledWith(controller.signal);
  });
});
