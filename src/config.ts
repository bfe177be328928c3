import path from "node:path";
import { z } from "zod";

/** Limits observable by the agent and the consumer of the stream */
export const DEFAULT_LIMITS = {
  max_execution_duration_ms: 30_000, // wall clock, compile through completion
  max_agent_turns: 25,
  max_load_rows: 100, // rows returned by load_result
  max_memory_bytes: 64 * 1024 * 1024, // per engine runtime
} as const;

export type Limits = {
  -readonly [K in keyof typeof DEFAULT_LIMITS]: number;
};

export interface AppConfig {
  model: string;
  data_dir: string;
  sqlite_path: string;
  datasets_path: string;
  limits: Limits;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly keys: string[]
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  MODEL: z.string().min(1).default("claude-sonnet-4-5"),
  DATA_DIR: z.string().min(1).default("data"),
  SQLITE_PATH: z.string().min(1).optional(),
  DATASETS_PATH: z.string().min(1).optional(),
  MAX_EXECUTION_DURATION_MS: positiveInt.default(
    DEFAULT_LIMITS.max_execution_duration_ms,
  ),
  MAX_AGENT_TURNS: positiveInt.default(DEFAULT_LIMITS.max_agent_turns),
  MAX_LOAD_ROWS: positiveInt.default(DEFAULT_LIMITS.max_load_rows),
  MAX_MEMORY_BYTES: positiveInt.default(DEFAULT_LIMITS.max_memory_bytes),
});

/**
 * Build the application config from environment variables.
 * Paths default to files under DATA_DIR; numeric limits are coerced from strings.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ];
    throw new ConfigError(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      keys,
    );
  }

  const e = parsed.data;
  return {
    model: e.MODEL,
    data_dir: e.DATA_DIR,
    sqlite_path: e.SQLITE_PATH ?? path.join(e.DATA_DIR, "store.db"),
    datasets_path: e.DATASETS_PATH ?? path.join(e.DATA_DIR, "datasets.json"),
    limits: {
      max_execution_duration_ms: e.MAX_EXECUTION_DURATION_MS,
      max_agent_turns: e.MAX_AGENT_TURNS,
      max_load_rows: e.MAX_LOAD_ROWS,
      max_memory_bytes: e.MAX_MEMORY_BYTES,
    },
  };
}
