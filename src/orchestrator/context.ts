import type { ArtifactRecord } from "../persistence/types.js";
import type {
  LiveEventType,
  StreamEvent,
  ToolTiming,
} from "../schemas/stream-event.js";
import { EventQueue } from "./queue.js";
import { SpanClock } from "./timing.js";

/** Marks the end of the live portion of a stream */
export const SENTINEL: unique symbol = Symbol("sentinel");

export type QueueItem = StreamEvent | typeof SENTINEL;

/**
 * Mutable state of one conversational turn.
 * Created per stream() call and passed explicitly to everything that
 * records into it (agent loop, tool handlers); never shared across turns.
 */
export interface TurnContext {
  conversation_id: string;
  queue: EventQueue<QueueItem>;
  clock: SpanClock;
  now: () => number;
  pending_artifacts: ArtifactRecord[];
  tool_timings: ToolTiming[];
  turns: number;
  tool_calls: number;
}

export function createTurnContext(
  conversation_id: string,
  now: () => number = Date.now,
): TurnContext {
  return {
    conversation_id,
    queue: new EventQueue<QueueItem>(),
    clock: new SpanClock(now),
    now,
    pending_artifacts: [],
    tool_timings: [],
    turns: 0,
    tool_calls: 0,
  };
}

/** Push a live event for the consumer */
export function emit(ctx: TurnContext, type: LiveEventType, data: string): void {
  ctx.queue.put({ type, data });
}
