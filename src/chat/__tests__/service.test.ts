import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { StoreError } from "../../persistence/errors.js";
import { SqliteConversationStore } from "../../persistence/sqlite.js";
import type { CodeExecutor } from "../../sandbox/bridge.js";
import type { StreamEvent } from "../../schemas/stream-event.js";
import { ChatService, titleFromMessage } from "../service.js";

const DONE: StreamEvent = {
  type: "done",
  data: JSON.stringify({
    artifacts: [],
    timing: { total_ms: 0, turns: 0, tool_calls: 0, spans: [], tool_details: [] },
  }),
};

async function collect(
  stream: AsyncIterable<StreamEvent>,
): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

describe("titleFromMessage", () => {
  test("keeps short messages, trimmed", () => {
    expect(titleFromMessage("  Rainfall by station  ")).toBe("Rainfall by station");
    expect(titleFromMessage("x".repeat(79))).toBe("x".repeat(79));
  });

  test("cuts at 80 characters with an ellipsis", () => {
    expect(titleFromMessage("x".repeat(80))).toBe(`${"x".repeat(77)}...`);
    expect(titleFromMessage("y".repeat(200))).toBe(`${"y".repeat(77)}...`);
  });
});

describe("ChatService", () => {
  let store: SqliteConversationStore;
  let script: StreamEvent[];
  let fault: Error | null;
  let executor: CodeExecutor;
  let service: ChatService;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    store = new SqliteConversationStore({ dbPath: ":memory:" });
    script = [
      { type: "status", data: "Starting analysis..." },
      { type: "text", data: "Hill had " },
      { type: "text", data: "the most rain." },
      DONE,
    ];
    fault = null;
    executor = {
      run: vi.fn(async (code: string) => ({
        code,
        output: 42,
        output_json: "42",
        output_type: "scalar" as const,
        error: null,
        state: null,
      })),
    };
    service = new ChatService({
      store,
      executor,
      orchestrator: {
        stream: async function* () {
          for (const event of script) {
            if (fault && event.type === "done") throw fault;
            yield event;
          }
        },
      },
    });
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  describe("chat", () => {
    test("starts a conversation and persists both sides of the turn", async () => {
      const turn = await service.chat({ message: "Which station is wettest?" });

      expect(await store.getMessages(turn.conversation_id)).toHaveLength(1);
      const events = await collect(turn.events);
      expect(events).toEqual(script);

      const messages = await store.getMessages(turn.conversation_id);
      expect(messages.map((m) => [m.role, m.content])).toEqual([
        ["user", "Which station is wettest?"],
        ["assistant", "Hill had the most rain."],
      ]);
      expect((await store.getConversation(turn.conversation_id))?.title).toBe(
        "Which station is wettest?",
      );
    });

    test("continues an existing conversation without retitling it", async () => {
      const conversation = await store.createConversation("Rain study");
      const turn = await service.chat({
        conversation_id: conversation.id,
        message: "And the driest?",
      });
      await collect(turn.events);

      expect(turn.conversation_id).toBe(conversation.id);
      expect((await store.getConversation(conversation.id))?.title).toBe("Rain study");
    });

    test("stores no assistant message when the agent said nothing", async () => {
      script = [DONE];
      const turn = await service.chat({ message: "hello" });
      await collect(turn.events);

      const messages = await store.getMessages(turn.conversation_id);
      expect(messages.map((m) => m.role)).toEqual(["user"]);
    });

    test("rejects unknown conversations and empty messages", async () => {
      await expect(
        service.chat({ conversation_id: "missing", message: "hi" }),
      ).rejects.toThrow(StoreError);
      await expect(service.chat({ message: "   " })).rejects.toThrow(
        "message must not be empty",
      );
      expect(await store.listConversations()).toEqual([]);
    });

    test("a stream fault ends with error and done", async () => {
      fault = new Error("queue exploded");
      const turn = await service.chat({ message: "hi" });

      const events = await collect(turn.events);

      expect(events).toEqual([
        { type: "status", data: "Starting analysis..." },
        { type: "text", data: "Hill had " },
        { type: "text", data: "the most rain." },
        { type: "error", data: "queue exploded" },
        { type: "done", data: JSON.stringify({ error: "queue exploded" }) },
      ]);
      const messages = await store.getMessages(turn.conversation_id);
      expect(messages.map((m) => m.role)).toEqual(["user"]);
    });
  });

  describe("conversation access", () => {
    test("returns the conversation with its messages and artifacts", async () => {
      const turn = await service.chat({ message: "q" });
      await collect(turn.events);
      const artifact = await store.saveArtifact({
        conversation_id: turn.conversation_id,
        code: "1",
        state: new Uint8Array([1]),
      });

      const view = await service.getConversationView(turn.conversation_id);

      expect(view.conversation.id).toBe(turn.conversation_id);
      expect(view.messages.map((m) => m.content)).toEqual([
        "q",
        "Hill had the most rain.",
      ]);
      expect(view.artifacts).toEqual([artifact]);
      expect(Object.keys(view.artifacts[0])).not.toContain("engine_state");
    });

    test("lists conversations", async () => {
      await service.chat({ message: "one" });
      expect((await service.listConversations()).map((c) => c.title)).toEqual([
        "New conversation",
      ]);
    });

    test("missing records are NOT_FOUND", async () => {
      await expect(service.getConversationView("missing")).rejects.toThrow(
        "Conversation not found: missing",
      );
      await expect(service.getArtifact("missing")).rejects.toThrow(
        "Artifact not found: missing",
      );
    });
  });

  describe("replayArtifact", () => {
    test("re-runs the stored code without persisting anything", async () => {
      const conversation = await store.createConversation();
      const artifact = await store.saveArtifact({
        conversation_id: conversation.id,
        code: "6 * 7",
        result_json: "41",
        result_type: "scalar",
      });

      expect(await service.replayArtifact(artifact.id)).toEqual({
        artifact_id: artifact.id,
        code: "6 * 7",
        result_json: "42",
        result_type: "scalar",
        error: null,
      });
      expect(executor.run).toHaveBeenCalledWith("6 * 7");
      expect(await store.listArtifacts(conversation.id)).toEqual([artifact]);
    });
  });
});
