export {
  type ArtifactPayload,
  ArtifactPayloadSchema,
  type DonePayload,
  DonePayloadSchema,
  type LiveEventType,
  type SpanType,
  SpanTypeSchema,
  type StreamEvent,
  StreamEventSchema,
  type StreamEventType,
  StreamEventTypeSchema,
  type TimingSpan,
  TimingSpanSchema,
  type TimingSummary,
  TimingSummarySchema,
  type ToolTiming,
  ToolTimingSchema,
} from "./stream-event.js";
