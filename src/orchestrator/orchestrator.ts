import {
  buildPromptWithHistory,
  buildSystemPrompt,
  withoutCurrentMessage,
} from "../agent/prompts.js";
import {
  createAgentTools,
  EXECUTE_CODE_TOOL,
  LOAD_RESULT_TOOL,
} from "../agent/tools.js";
import type { AgentMessage, AgentRunner } from "../agent/types.js";
import type { Limits } from "../config.js";
import type { ConversationStore } from "../persistence/store.js";
import type { ArtifactRecord } from "../persistence/types.js";
import type { CodeExecutor } from "../sandbox/bridge.js";
import type {
  ArtifactPayload,
  DonePayload,
  StreamEvent,
  TimingSummary,
} from "../schemas/stream-event.js";
import {
  createTurnContext,
  emit,
  SENTINEL,
  type TurnContext,
} from "./context.js";

export interface StreamingOrchestratorOpts {
  runner: AgentRunner;
  executor: CodeExecutor;
  store: ConversationStore;
  model: string;
  schema_context: string;
  limits: Pick<Limits, "max_agent_turns" | "max_load_rows">;
  now?: () => number; // injectable clock for tests
}

export function toArtifactPayload(artifact: ArtifactRecord): ArtifactPayload {
  return {
    id: artifact.id,
    code: artifact.code,
    result_json: artifact.result_json,
    result_type: artifact.result_type,
    error: artifact.error,
  };
}

export function timingSummary(ctx: TurnContext): TimingSummary {
  return {
    total_ms: ctx.clock.boundary,
    turns: ctx.turns,
    tool_calls: ctx.tool_calls,
    spans: ctx.clock.spans,
    tool_details: [...ctx.tool_timings],
  };
}

/**
 * Runs the agent loop for one conversational turn and streams its progress.
 *
 * The loop runs in the background and only pushes events onto the turn's
 * queue; stream() drains the queue until the sentinel, then emits the
 * turn's artifacts and a single done event with the timing summary.
 */
export class StreamingOrchestrator {
  private readonly now: () => number;

  constructor(private readonly opts: StreamingOrchestratorOpts) {
    this.now = opts.now ?? Date.now;
  }

  async *stream(
    conversationId: string,
    userMessage: string,
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const ctx = createTurnContext(conversationId, this.now);

    yield { type: "status", data: "Starting analysis..." };

    const agent = this.runAgent(ctx, userMessage);

    for (;;) {
      const item = await ctx.queue.get();
      if (item === SENTINEL) break;
      yield item;
    }

    await agent;

    for (const artifact of ctx.pending_artifacts) {
      yield { type: "artifact", data: JSON.stringify(toArtifactPayload(artifact)) };
    }

    const timing = timingSummary(ctx);
    const done: DonePayload = {
      artifacts: ctx.pending_artifacts.map((a) => a.id),
      timing,
    };
    console.info(
      `[orchestrator] turn done: ${timing.turns} turns, ${timing.tool_calls} tool calls, ${timing.total_ms}ms`,
    );
    yield { type: "done", data: JSON.stringify(done) };
  }

  /** Background agent loop. Never rejects; always ends with the sentinel. */
  private async runAgent(ctx: TurnContext, userMessage: string): Promise<void> {
    try {
      const history = withoutCurrentMessage(
        await this.opts.store.getMessages(ctx.conversation_id),
        userMessage,
      );
      const tools = createAgentTools(
        {
          executor: this.opts.executor,
          store: this.opts.store,
          max_load_rows: this.opts.limits.max_load_rows,
        },
        ctx,
      );

      const messages = this.opts.runner.run({
        model: this.opts.model,
        system_prompt: buildSystemPrompt(this.opts.schema_context),
        prompt: buildPromptWithHistory(userMessage, history),
        tools,
        max_turns: this.opts.limits.max_agent_turns,
      });
      emit(ctx, "status", "Agent is thinking...");

      for await (const message of messages) {
        this.observe(ctx, message);
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[orchestrator] agent run failed: ${message}`);
      emit(ctx, "error", message);
    } finally {
      if (ctx.clock.elapsed() > ctx.clock.boundary) {
        ctx.clock.mark("Wrap-up", "llm");
      }
      ctx.queue.put(SENTINEL);
    }
  }

  private observe(ctx: TurnContext, message: AgentMessage): void {
    switch (message.type) {
      case "assistant":
        ctx.turns++;
        ctx.clock.mark(`LLM Turn ${ctx.turns}`, "llm");
        for (const block of message.content) {
          if (block.type === "text") {
            if (block.text.trim()) emit(ctx, "text", block.text);
            continue;
          }
          ctx.tool_calls++;
          if (block.name === EXECUTE_CODE_TOOL) {
            const code = block.input.code;
            emit(ctx, "code", typeof code === "string" ? code : "");
          } else if (block.name === LOAD_RESULT_TOOL) {
            emit(ctx, "status", "Loading result data...");
          }
        }
        return;

      case "tool_result":
        ctx.clock.mark("Tool Execution", "tool");
        emit(ctx, "status", "Analyzing results...");
        return;

      case "result":
        if (message.subtype === "error_max_turns") {
          emit(
            ctx,
            "status",
            `Reached the limit of ${this.opts.limits.max_agent_turns} agent turns`,
          );
        } else if (message.subtype === "error_during_execution") {
          emit(ctx, "error", "Agent run ended with an error");
        }
        return;
    }
  }
}
