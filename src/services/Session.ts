/**
 * Session - Delivers tool events for one conversation
 *
 * Wraps each event message in an activity envelope stamped with the turn's
 * submission id and hands it to the activity stream. Many tool calls of a
 * turn share one session.
 */

import type { ActivityEvent, Config, EventMsg, OutputLimits, TurnContext } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { generateEventId } from '../utils/id.js';
import { ActivityStream } from './ActivityStream.js';
import { logger } from './Logger.js';

/**
 * What the tool event dispatcher needs from a session
 */
export interface EventSink {
  sendEvent(turn: TurnContext, msg: EventMsg): Promise<void>;
  getOutputLimits(): OutputLimits;
  normalizeRejection(message: string): string;
  isTurnDiffEnabled(): boolean;
}

export class Session implements EventSink {
  private readonly activityStream: ActivityStream;
  private readonly config: Config;

  constructor(activityStream: ActivityStream, config: Config = DEFAULT_CONFIG) {
    this.activityStream = activityStream;
    this.config = config;
  }

  /**
   * Send an event to every subscriber of the session's stream
   */
  async sendEvent(turn: TurnContext, msg: EventMsg): Promise<void> {
    const event: ActivityEvent = {
      id: generateEventId(msg.type),
      type: msg.type,
      timestamp: Date.now(),
      turn_id: turn.sub_id,
      data: msg,
    };
    logger.debug('[SESSION] sendEvent', msg.type, 'turn:', turn.sub_id);
    this.activityStream.emit(event);
  }

  getOutputLimits(): OutputLimits {
    return {
      maxBytes: this.config.model_output_max_bytes,
      maxLines: this.config.model_output_max_lines,
    };
  }

  /**
   * Rewrite a known rejection text to its configured replacement
   *
   * Texts without a mapping pass through unchanged.
   */
  normalizeRejection(message: string): string {
    const mapping = this.config.rejection_messages;
    return Object.prototype.hasOwnProperty.call(mapping, message) ? mapping[message] : message;
  }

  isTurnDiffEnabled(): boolean {
    return this.config.emit_turn_diff;
  }
}
