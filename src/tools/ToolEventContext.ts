/**
 * Per-invocation context for tool events
 */

import type { TurnContext } from '../types/index.js';
import type { EventSink } from '../services/Session.js';
import type { SharedTurnDiffTracker } from '../services/TurnDiffTracker.js';

/**
 * Identifies one tool call: where its events go, which turn it belongs to,
 * and the diff tracker patch calls of that turn share.
 *
 * Build one per invocation and drop it when the call finishes; the emitter
 * never keeps a reference.
 */
export interface ToolEventCtx {
  readonly session: EventSink;
  readonly turn: TurnContext;
  readonly callId: string;
  readonly turnDiffTracker?: SharedTurnDiffTracker;
}

export function createToolEventCtx(
  session: EventSink,
  turn: TurnContext,
  callId: string,
  turnDiffTracker?: SharedTurnDiffTracker
): ToolEventCtx {
  return { session, turn, callId, turnDiffTracker };
}
