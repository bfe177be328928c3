// App
export { createApp } from "./app.js";
export type { App, CreateAppOpts } from "./app.js";
export { ConfigError, DEFAULT_LIMITS, loadConfig } from "./config.js";
export type { AppConfig, Limits } from "./config.js";

// Components
export * from "./agent/index.js";
export * from "./analytics/index.js";
export * from "./chat/index.js";
export * from "./orchestrator/index.js";
export * from "./persistence/index.js";
export * from "./router/index.js";
export * from "./sandbox/index.js";
export * from "./schemas/index.js";

// Renderers
export { renderResultSummary } from "./renderers/result-summary.js";
export type { SummarizableResult } from "./renderers/result-summary.js";
export { renderResultData } from "./renderers/result-table.js";
export { renderSchemaContext } from "./renderers/schema-context.js";
export type { SchemaTable } from "./renderers/schema-context.js";
