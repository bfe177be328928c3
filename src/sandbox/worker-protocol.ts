import { z } from "zod";

/**
 * Messages exchanged with the sandbox worker thread.
 *
 * The worker owns the QuickJS engine; the host thread owns the router and
 * the analytic store. A run is one strict alternation: the host sends
 * `start` or `resume`, the worker answers with exactly one step message.
 */

export const WorkerInitSchema = z
  .object({
    code: z.string(),
    external_functions: z.array(z.string()),
  })
  .strict();

const RunLimitsSchema = z
  .object({
    deadline_ms: z.number(),
    max_memory_bytes: z.number().int().positive().optional(),
  })
  .strict();

/** Resume value in cloneable form; exceptions travel as name and message */
const WireResumeSchema = z.union([
  z.object({ return_value: z.unknown() }).strict(),
  z
    .object({
      exception: z.object({ name: z.string(), message: z.string() }).strict(),
    })
    .strict(),
]);

export const HostMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("start"), limits: RunLimitsSchema }).strict(),
  z.object({ type: z.literal("resume"), value: WireResumeSchema }).strict(),
]);

const PauseRequestSchema = z
  .object({
    function_name: z.string(),
    args: z.array(z.unknown()),
    kwargs: z.record(z.string(), z.unknown()),
  })
  .strict();

export const WorkerMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("compiled") }).strict(),
  z.object({ type: z.literal("snapshot"), request: PauseRequestSchema }).strict(),
  z.object({ type: z.literal("future_snapshot") }).strict(),
  z
    .object({
      type: z.literal("complete"),
      output: z.unknown(),
      state: z.instanceof(Uint8Array),
    })
    .strict(),
  z
    .object({
      type: z.literal("failed"),
      code: z.enum(["SYNTAX_ERROR", "RUNTIME_ERROR", "UNEXPECTED_ASYNC_PAUSE"]),
      message: z.string(),
    })
    .strict(),
]);

export type WorkerInit = z.infer<typeof WorkerInitSchema>;
export type WireResume = z.infer<typeof WireResumeSchema>;
export type HostMessage = z.infer<typeof HostMessageSchema>;
export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;
