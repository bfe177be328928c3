// Context
export { createTurnContext, emit, SENTINEL } from "./context.js";
export type { QueueItem, TurnContext } from "./context.js";

// Orchestrator
export {
  StreamingOrchestrator,
  timingSummary,
  toArtifactPayload,
} from "./orchestrator.js";
export type { StreamingOrchestratorOpts } from "./orchestrator.js";

// Primitives
export { EventQueue } from "./queue.js";
export { SpanClock } from "./timing.js";
