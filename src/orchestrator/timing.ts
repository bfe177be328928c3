import type { SpanType, TimingSpan } from "../schemas/stream-event.js";

/**
 * Records contiguous timing spans for one conversational turn.
 *
 * Offsets are integer milliseconds from the clock's start. Each span runs
 * from the previous boundary to the new one, so the spans partition
 * [0, boundary] in order with no gaps or overlaps.
 */
export class SpanClock {
  private readonly startedAt: number;
  private lastBoundary = 0;
  private readonly recorded: TimingSpan[] = [];

  constructor(private readonly now: () => number = Date.now) {
    this.startedAt = now();
  }

  /** Milliseconds since the clock started, rounded, never behind the last boundary. */
  elapsed(): number {
    return Math.max(this.lastBoundary, Math.round(this.now() - this.startedAt));
  }

  /** Close a span ending now. */
  mark(name: string, type: SpanType): TimingSpan {
    const end = this.elapsed();
    const span: TimingSpan = {
      name,
      type,
      start_ms: this.lastBoundary,
      duration_ms: end - this.lastBoundary,
    };
    this.recorded.push(span);
    this.lastBoundary = end;
    return span;
  }

  /** End offset of the last recorded span (0 before any). */
  get boundary(): number {
    return this.lastBoundary;
  }

  get spans(): TimingSpan[] {
    return [...this.recorded];
  }
}
