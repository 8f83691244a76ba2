/**
 * ActivityStream unit tests
 *
 * Tests event emission, subscription, unsubscribe, cleanup, and scoped streams.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ActivityStream } from '../ActivityStream.js';
import { logger } from '../Logger.js';
import { ActivityEventType } from '@shared/index.js';
import type { ActivityEvent } from '@shared/index.js';

function turnDiffEvent(id: string, parentId?: string): ActivityEvent {
  return {
    id,
    type: ActivityEventType.TURN_DIFF,
    timestamp: 1000,
    turn_id: 'turn-1',
    parentId,
    data: { type: ActivityEventType.TURN_DIFF, unified_diff: 'diff --git a/x b/x\n' },
  };
}

function patchEndEvent(id: string): ActivityEvent {
  return {
    id,
    type: ActivityEventType.PATCH_APPLY_END,
    timestamp: 1000,
    turn_id: 'turn-1',
    data: {
      type: ActivityEventType.PATCH_APPLY_END,
      call_id: 'call-1',
      stdout: '',
      stderr: '',
      success: true,
    },
  };
}

describe('ActivityStream', () => {
  let stream: ActivityStream;

  beforeEach(() => {
    stream = new ActivityStream();
  });

  afterEach(() => {
    stream.cleanup();
  });

  describe('emit', () => {
    it('should call subscribed listeners for matching event type', () => {
      const mockCallback = vi.fn();
      stream.subscribe(ActivityEventType.TURN_DIFF, mockCallback);

      const event = turnDiffEvent('1');
      stream.emit(event);

      expect(mockCallback).toHaveBeenCalledWith(event);
      expect(mockCallback).toHaveBeenCalledTimes(1);
    });

    it('should call wildcard listeners for any event type', () => {
      const wildcardCallback = vi.fn();
      stream.subscribe('*', wildcardCallback);

      const event1 = turnDiffEvent('1');
      const event2 = patchEndEvent('2');
      stream.emit(event1);
      stream.emit(event2);

      expect(wildcardCallback).toHaveBeenCalledTimes(2);
      expect(wildcardCallback).toHaveBeenNthCalledWith(1, event1);
      expect(wildcardCallback).toHaveBeenNthCalledWith(2, event2);
    });

    it('should not call listeners for different event types', () => {
      const diffCallback = vi.fn();
      const patchCallback = vi.fn();
      stream.subscribe(ActivityEventType.TURN_DIFF, diffCallback);
      stream.subscribe(ActivityEventType.PATCH_APPLY_END, patchCallback);

      stream.emit(turnDiffEvent('1'));

      expect(diffCallback).toHaveBeenCalledTimes(1);
      expect(patchCallback).not.toHaveBeenCalled();
    });

    it('should call type listeners before wildcard listeners', () => {
      const order: string[] = [];
      stream.subscribe('*', () => order.push('wildcard'));
      stream.subscribe(ActivityEventType.TURN_DIFF, () => order.push('type'));

      stream.emit(turnDiffEvent('1'));

      expect(order).toEqual(['type', 'wildcard']);
    });

    it('should keep delivering when a listener throws', () => {
      const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => {});
      const failing = vi.fn(() => {
        throw new Error('Listener error');
      });
      const normal = vi.fn();
      stream.subscribe(ActivityEventType.TURN_DIFF, failing);
      stream.subscribe(ActivityEventType.TURN_DIFF, normal);

      const event = turnDiffEvent('1');
      expect(() => stream.emit(event)).not.toThrow();

      expect(failing).toHaveBeenCalledWith(event);
      expect(normal).toHaveBeenCalledWith(event);
      expect(errorSpy).toHaveBeenCalledTimes(1);

      errorSpy.mockRestore();
    });

    it('should add parentId to events when stream is scoped', () => {
      const scopedStream = stream.createScoped('parent-123');
      const callback = vi.fn();
      scopedStream.subscribe(ActivityEventType.TURN_DIFF, callback);

      scopedStream.emit(turnDiffEvent('1'));

      expect(callback).toHaveBeenCalledWith(expect.objectContaining({ parentId: 'parent-123' }));
      expect(scopedStream.getParentId()).toBe('parent-123');
    });

    it('should not override existing parentId in events', () => {
      const scopedStream = stream.createScoped('parent-123');
      const callback = vi.fn();
      scopedStream.subscribe(ActivityEventType.TURN_DIFF, callback);

      scopedStream.emit(turnDiffEvent('1', 'existing-parent'));

      expect(callback).toHaveBeenCalledWith(expect.objectContaining({ parentId: 'existing-parent' }));
    });
  });

  describe('subscribe', () => {
    it('should return an unsubscribe function', () => {
      const callback = vi.fn();
      const unsubscribe = stream.subscribe(ActivityEventType.TURN_DIFF, callback);

      unsubscribe();
      stream.emit(turnDiffEvent('1'));

      expect(callback).not.toHaveBeenCalled();
      expect(stream.getListenerCount()).toBe(0);
    });

    it('should count listeners across event types', () => {
      stream.subscribe(ActivityEventType.TURN_DIFF, vi.fn());
      stream.subscribe(ActivityEventType.PATCH_APPLY_END, vi.fn());
      stream.subscribe('*', vi.fn());

      expect(stream.getListenerCount()).toBe(3);
    });

    it('should warn when one event type has too many listeners', () => {
      const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => {});

      for (let i = 0; i < 51; i++) {
        stream.subscribe(ActivityEventType.TURN_DIFF, vi.fn());
      }

      expect(warnSpy).toHaveBeenCalledTimes(1);
      warnSpy.mockRestore();
    });
  });

  describe('cleanup', () => {
    it('should remove all listeners', () => {
      const callback = vi.fn();
      stream.subscribe('*', callback);

      stream.cleanup();
      stream.emit(turnDiffEvent('1'));

      expect(callback).not.toHaveBeenCalled();
      expect(stream.getListenerCount()).toBe(0);
    });
  });
});
