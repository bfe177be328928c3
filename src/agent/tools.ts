import { z } from "zod";
import { emit, type TurnContext } from "../orchestrator/context.js";
import type { ConversationStore } from "../persistence/store.js";
import { renderResultSummary } from "../renderers/result-summary.js";
import { renderResultData } from "../renderers/result-table.js";
import type { CodeExecutor } from "../sandbox/bridge.js";
import type { AgentTool, ToolResult } from "./types.js";

export const EXECUTE_CODE_TOOL = "execute_code";
export const LOAD_RESULT_TOOL = "load_result";

const ExecuteCodeInputSchema = z.object({ code: z.string() }).strict();
const LoadResultInputSchema = z.object({ uid: z.string().min(1) }).strict();

export interface AgentToolDeps {
  executor: CodeExecutor;
  store: ConversationStore;
  max_load_rows: number;
}

function invalidInput(tool: string, error: z.ZodError): ToolResult {
  return {
    content: `Error: invalid ${tool} input: ${error.issues.map((i) => i.message).join("; ")}`,
    is_error: true,
  };
}

/**
 * Run one code unit, persist its outcome as an artifact on the turn, and
 * summarize it for the agent.
 */
export async function executeCode(
  deps: AgentToolDeps,
  ctx: TurnContext,
  input: unknown,
): Promise<ToolResult> {
  const parsed = ExecuteCodeInputSchema.safeParse(input);
  if (!parsed.success) return invalidInput(EXECUTE_CODE_TOOL, parsed.error);
  const { code } = parsed.data;

  emit(ctx, "status", "Running code in sandbox...");

  const started = ctx.now();
  const outcome = await deps.executor.run(code);
  const durationMs = Math.max(0, Math.round(ctx.now() - started));

  const artifact = await deps.store.saveArtifact({
    conversation_id: ctx.conversation_id,
    message_id: null,
    code,
    state: outcome.state,
    result_json: outcome.output_json,
    result_type: outcome.output_type,
    error: outcome.error,
  });
  ctx.pending_artifacts.push(artifact);
  ctx.tool_timings.push({
    name: EXECUTE_CODE_TOOL,
    duration_ms: durationMs,
    has_error: outcome.error !== null,
  });

  if (outcome.error !== null) {
    emit(ctx, "status", "Code failed, agent may retry...");
    return { content: `Error: ${outcome.error}`, is_error: true };
  }

  return { content: renderResultSummary(artifact.id, outcome) };
}

/**
 * Load a stored result into the agent's context, capped at max_load_rows.
 */
export async function loadResult(
  deps: AgentToolDeps,
  input: unknown,
): Promise<ToolResult> {
  const parsed = LoadResultInputSchema.safeParse(input);
  if (!parsed.success) return invalidInput(LOAD_RESULT_TOOL, parsed.error);
  const { uid } = parsed.data;

  const artifact = await deps.store.getArtifact(uid);
  if (!artifact) {
    return { content: `Error: No result found for UID ${uid}`, is_error: true };
  }
  if (artifact.error) {
    return { content: `Error in result: ${artifact.error}`, is_error: true };
  }
  if (!artifact.result_json) {
    return { content: "Result: None" };
  }

  const data: unknown = JSON.parse(artifact.result_json);
  return { content: renderResultData(data, deps.max_load_rows) };
}

/** The two tools offered to the agent, bound to one turn */
export function createAgentTools(
  deps: AgentToolDeps,
  ctx: TurnContext,
): AgentTool[] {
  return [
    {
      name: EXECUTE_CODE_TOOL,
      description:
        "Execute JavaScript in the sandbox. The code can call fetch(), count(), describe() and tables() to read datasets; the value of the last expression is the result. Returns a result UID and metadata; the full data is shown to the user automatically.",
      input_schema: {
        type: "object",
        properties: { code: { type: "string" } },
        required: ["code"],
        additionalProperties: false,
      },
      handler: (input) => executeCode(deps, ctx, input),
    },
    {
      name: LOAD_RESULT_TOOL,
      description: `Load a result into context by its UID. Returns up to ${deps.max_load_rows} rows formatted as a markdown table. Use this when you need to reference specific values.`,
      input_schema: {
        type: "object",
        properties: { uid: { type: "string" } },
        required: ["uid"],
        additionalProperties: false,
      },
      handler: (input) => loadResult(deps, input),
    },
  ];
}
