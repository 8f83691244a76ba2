/**
 * ActivityStream - Event-driven stream of tool lifecycle events
 *
 * The transport between the tool event dispatcher and whatever observes it
 * (a UI, a log writer, a test). Subscribers register per event type or for
 * all events with '*'.
 */

import { ActivityEvent, ActivityEventType, ActivityCallback } from '../types/index.js';
import { BUFFER_SIZES } from '../config/constants.js';
import { logger } from './Logger.js';

export class ActivityStream {
  private listeners: Map<ActivityEventType | '*', Set<ActivityCallback>>;
  private parentId?: string;

  /**
   * Maximum listeners allowed per event type before warning about potential memory leak
   */
  private readonly MAX_LISTENERS_PER_TYPE = BUFFER_SIZES.MAX_LISTENERS_PER_TYPE;

  constructor(parentId?: string) {
    this.listeners = new Map();
    this.parentId = parentId;
  }

  /**
   * Emit an event to all registered listeners
   *
   * Type-specific listeners run before wildcard listeners. A listener that
   * throws is logged and does not stop delivery to the others.
   */
  emit(event: ActivityEvent): void {
    // Scoped streams stamp their parent ID on events that lack one
    if (this.parentId && !event.parentId) {
      event.parentId = this.parentId;
    }

    const typeListeners = this.listeners.get(event.type);
    const wildcardListeners = this.listeners.get('*');

    if (typeListeners) {
      for (const callback of typeListeners) {
        this.invoke(callback, event);
      }
    }

    if (wildcardListeners) {
      for (const callback of wildcardListeners) {
        this.invoke(callback, event);
      }
    }
  }

  private invoke(callback: ActivityCallback, event: ActivityEvent): void {
    try {
      callback(event);
    } catch (error) {
      logger.error(`Error in activity stream listener for '${event.type}':`, error);
    }
  }

  /**
   * Subscribe to a specific event type
   *
   * IMPORTANT: Always call the returned unsubscribe function when done listening!
   *
   * @param eventType - The event type to listen for, or '*' for all events
   * @param callback - The callback to invoke when the event is emitted
   * @returns Unsubscribe function
   *
   * @example
   * ```typescript
   * const unsubscribe = stream.subscribe(ActivityEventType.EXEC_COMMAND_END, (event) => {
   *   console.log('Command finished:', event.data);
   * });
   *
   * unsubscribe();
   * ```
   */
  subscribe(eventType: ActivityEventType | '*', callback: ActivityCallback): () => void {
    let callbacks = this.listeners.get(eventType);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(eventType, callbacks);
    }
    callbacks.add(callback);

    if (callbacks.size > this.MAX_LISTENERS_PER_TYPE) {
      logger.warn(
        `[ACTIVITY_STREAM] High listener count (${callbacks.size}) for event type '${String(eventType)}'. ` +
        `This may indicate a memory leak. Ensure all subscribers call unsubscribe() when done.`
      );
    }

    const registered = callbacks;
    return () => {
      registered.delete(callback);
      if (registered.size === 0) {
        this.listeners.delete(eventType);
      }
    };
  }

  /**
   * Create a scoped activity stream for nested contexts
   *
   * Events emitted from the scoped stream carry the parent ID.
   */
  createScoped(parentId: string): ActivityStream {
    return new ActivityStream(parentId);
  }

  getParentId(): string | undefined {
    return this.parentId;
  }

  /**
   * Clean up all event listeners
   *
   * After calling cleanup(), this ActivityStream should not be used again.
   */
  cleanup(): void {
    const totalListeners = this.getListenerCount();

    if (totalListeners > 0) {
      logger.debug(
        `[ACTIVITY_STREAM] Cleaning up ActivityStream` +
        (this.parentId ? ` (scoped: ${this.parentId})` : ' (root)') +
        ` - removing ${totalListeners} listeners across ${this.listeners.size} event types`
      );
    }

    this.listeners.clear();
  }

  /**
   * Get the total number of active listeners across all event types
   */
  getListenerCount(): number {
    let count = 0;
    this.listeners.forEach(callbacks => {
      count += callbacks.size;
    });
    return count;
  }
}
