import fs from "node:fs";
import path from "node:path";
import type { AgentRunner } from "./agent/types.js";
import { type LoadedDataset, loadDatasets } from "./analytics/datasets.js";
import { SqliteAnalyticStore } from "./analytics/sqlite.js";
import { ChatService } from "./chat/service.js";
import type { AppConfig } from "./config.js";
import { StreamingOrchestrator } from "./orchestrator/orchestrator.js";
import { SqliteConversationStore } from "./persistence/sqlite.js";
import { renderSchemaContext } from "./renderers/schema-context.js";
import { FunctionRouter } from "./router/router.js";
import { ExecutionBridge } from "./sandbox/bridge.js";
import type { Engine } from "./sandbox/engine.js";
import { WorkerEngine } from "./sandbox/worker-engine.js";

export interface App {
  chat: ChatService;
  analytics: SqliteAnalyticStore;
  store: SqliteConversationStore;
  datasets: LoadedDataset[];
  close(): void;
}

export interface CreateAppOpts {
  engine?: Engine; // defaults to WorkerEngine
}

/**
 * Open both stores, load the dataset catalog and wire the chat service.
 */
export function createApp(
  config: AppConfig,
  runner: AgentRunner,
  opts: CreateAppOpts = {},
): App {
  if (config.sqlite_path !== ":memory:") {
    fs.mkdirSync(path.dirname(config.sqlite_path), { recursive: true });
  }

  const analytics = new SqliteAnalyticStore();
  const store = new SqliteConversationStore({ dbPath: config.sqlite_path });

  const datasets = loadDatasets(analytics, config.datasets_path);
  const schemaContext = renderSchemaContext(analytics, datasets);

  const executor = new ExecutionBridge({
    engine: opts.engine ?? new WorkerEngine(),
    router: new FunctionRouter(analytics),
    max_duration_ms: config.limits.max_execution_duration_ms,
    max_memory_bytes: config.limits.max_memory_bytes,
  });

  const orchestrator = new StreamingOrchestrator({
    runner,
    executor,
    store,
    model: config.model,
    schema_context: schemaContext,
    limits: config.limits,
  });

  const chat = new ChatService({ store, orchestrator, executor });
  console.info(
    `[app] ready: ${datasets.length} datasets, store at ${config.sqlite_path}`,
  );

  return {
    chat,
    analytics,
    store,
    datasets,
    close() {
      store.close();
      analytics.close();
    },
  };
}
