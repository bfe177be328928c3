import { z } from "zod";

export const StreamEventTypeSchema = z.enum([
  "text",
  "code",
  "status",
  "error",
  "artifact",
  "done",
]);

export const StreamEventSchema = z
  .object({
    type: StreamEventTypeSchema,
    data: z.string(),
  })
  .strict();

export const SpanTypeSchema = z.enum(["llm", "tool"]);

export const TimingSpanSchema = z
  .object({
    name: z.string(),
    type: SpanTypeSchema,
    start_ms: z.number().int().nonnegative(),
    duration_ms: z.number().int().nonnegative(),
  })
  .strict();

export const ToolTimingSchema = z
  .object({
    name: z.string(),
    duration_ms: z.number().int().nonnegative(),
    has_error: z.boolean(),
  })
  .strict();

export const TimingSummarySchema = z
  .object({
    total_ms: z.number().int().nonnegative(),
    turns: z.number().int().nonnegative(),
    tool_calls: z.number().int().nonnegative(),
    spans: z.array(TimingSpanSchema),
    tool_details: z.array(ToolTimingSchema),
  })
  .strict();

/** Payload of an `artifact` event (state blob never leaves persistence) */
export const ArtifactPayloadSchema = z
  .object({
    id: z.string(),
    code: z.string(),
    result_json: z.string().nullable(),
    result_type: z.string().nullable(),
    error: z.string().nullable(),
  })
  .strict();

/**
 * Payload of the final `done` event: either the turn summary, or the
 * message of a fault that ended the stream early.
 */
export const DonePayloadSchema = z.union([
  z
    .object({
      artifacts: z.array(z.string()),
      timing: TimingSummarySchema,
    })
    .strict(),
  z.object({ error: z.string() }).strict(),
]);

export type StreamEventType = z.infer<typeof StreamEventTypeSchema>;
export type StreamEvent = z.infer<typeof StreamEventSchema>;
export type SpanType = z.infer<typeof SpanTypeSchema>;
export type TimingSpan = z.infer<typeof TimingSpanSchema>;
export type ToolTiming = z.infer<typeof ToolTimingSchema>;
export type TimingSummary = z.infer<typeof TimingSummarySchema>;
export type ArtifactPayload = z.infer<typeof ArtifactPayloadSchema>;
export type DonePayload = z.infer<typeof DonePayloadSchema>;

/** Events produced while the agent loop is live */
export type LiveEventType = Exclude<StreamEventType, "artifact" | "done">;
