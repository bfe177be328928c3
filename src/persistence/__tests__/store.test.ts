import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { StoreError } from "../errors.js";
import { SqliteConversationStore } from "../sqlite.js";
import type { ConversationStore } from "../store.js";

async function storeErrorCode(p: Promise<unknown>): Promise<string> {
  try {
    await p;
  } catch (err) {
    if (err instanceof StoreError) return err.code;
    throw err;
  }
  throw new Error("expected a StoreError");
}

describe("SqliteConversationStore", () => {
  let sqlite: SqliteConversationStore;
  let store: ConversationStore;

  beforeEach(() => {
    sqlite = new SqliteConversationStore({ dbPath: ":memory:" });
    store = sqlite;
  });

  afterEach(() => {
    sqlite.close();
  });

  describe("conversations", () => {
    test("creates with ULID id and default title", async () => {
      const conversation = await store.createConversation();

      expect(conversation.id).toMatch(/^[0-9A-Z]{26}$/);
      expect(conversation.title).toBe("New conversation");
      expect(conversation.created_at).toBe(conversation.updated_at);
      expect(new Date(conversation.created_at).toISOString()).toBe(
        conversation.created_at,
      );
      expect(await store.getConversation(conversation.id)).toEqual(conversation);
    });

    test("rejects an empty title", async () => {
      expect(await storeErrorCode(store.createConversation("  "))).toBe(
        "INVALID_REQUEST",
      );
    });

    test("returns null for an unknown id", async () => {
      expect(await store.getConversation("missing")).toBeNull();
    });

    test("updates the title", async () => {
      const { id } = await store.createConversation();
      await store.updateConversationTitle(id, "Rainfall by station");
      expect((await store.getConversation(id))?.title).toBe("Rainfall by station");
    });

    test("title updates fail for unknown conversations and empty titles", async () => {
      const { id } = await store.createConversation();
      expect(await storeErrorCode(store.updateConversationTitle("missing", "x"))).toBe(
        "NOT_FOUND",
      );
      expect(await storeErrorCode(store.updateConversationTitle(id, ""))).toBe(
        "INVALID_REQUEST",
      );
    });

    test("lists most recently updated first", async () => {
      const first = await store.createConversation("first");
      const second = await store.createConversation("second");

      // Same-millisecond timestamps fall back to id order, newest first
      let listed = await store.listConversations();
      expect(listed.map((c) => c.title)).toEqual(["second", "first"]);

      await new Promise((r) => setTimeout(r, 5));
      await store.addMessage(first.id, "user", "bump");
      listed = await store.listConversations();
      expect(listed.map((c) => c.id)).toEqual([first.id, second.id]);
    });
  });

  describe("messages", () => {
    test("appends and returns messages oldest first", async () => {
      const { id } = await store.createConversation();
      await store.addMessage(id, "user", "q1");
      await store.addMessage(id, "assistant", "a1");
      await store.addMessage(id, "user", "q2");

      const messages = await store.getMessages(id);
      expect(messages.map((m) => [m.role, m.content])).toEqual([
        ["user", "q1"],
        ["assistant", "a1"],
        ["user", "q2"],
      ]);
      expect(messages.every((m) => m.conversation_id === id)).toBe(true);
    });

    test("adding a message bumps updated_at", async () => {
      const conversation = await store.createConversation();
      await new Promise((r) => setTimeout(r, 5));
      const message = await store.addMessage(conversation.id, "user", "hi");

      const updated = await store.getConversation(conversation.id);
      expect(updated?.updated_at).toBe(message.created_at);
      expect(updated?.created_at).toBe(conversation.created_at);
    });

    test("fails for an unknown conversation", async () => {
      expect(await storeErrorCode(store.addMessage("missing", "user", "hi"))).toBe(
        "NOT_FOUND",
      );
    });
  });

  describe("artifacts", () => {
    test("saves and reads back an artifact without its state", async () => {
      const { id } = await store.createConversation();
      const saved = await store.saveArtifact({
        conversation_id: id,
        code: "count('t')",
        state: new Uint8Array([7, 8, 9]),
        result_json: "3",
        result_type: "scalar",
      });

      expect(saved).toEqual({
        id: saved.id,
        conversation_id: id,
        message_id: null,
        code: "count('t')",
        result_json: "3",
        result_type: "scalar",
        error: null,
        created_at: saved.created_at,
      });
      expect(await store.getArtifact(saved.id)).toEqual(saved);
      expect(await store.getArtifactState(saved.id)).toEqual(
        new Uint8Array([7, 8, 9]),
      );
    });

    test("failed runs are stored with their error and no state", async () => {
      const { id } = await store.createConversation();
      const saved = await store.saveArtifact({
        conversation_id: id,
        code: "(",
        error: "Syntax error: unexpected end of input",
      });

      expect(saved.result_json).toBeNull();
      expect(saved.error).toBe("Syntax error: unexpected end of input");
      expect(await store.getArtifactState(saved.id)).toBeNull();
    });

    test("links to a message when given one", async () => {
      const { id } = await store.createConversation();
      const message = await store.addMessage(id, "assistant", "see result");
      const saved = await store.saveArtifact({
        conversation_id: id,
        message_id: message.id,
        code: "1",
      });
      expect((await store.getArtifact(saved.id))?.message_id).toBe(message.id);
    });

    test("lists a conversation's artifacts in creation order", async () => {
      const a = await store.createConversation();
      const b = await store.createConversation();
      for (const code of ["1", "2", "3"]) {
        await store.saveArtifact({ conversation_id: a.id, code });
      }
      await store.saveArtifact({ conversation_id: b.id, code: "other" });

      expect((await store.listArtifacts(a.id)).map((x) => x.code)).toEqual([
        "1",
        "2",
        "3",
      ]);
      expect(await store.listArtifacts("missing")).toEqual([]);
    });

    test("unknown ids", async () => {
      expect(await store.getArtifact("missing")).toBeNull();
      expect(await storeErrorCode(store.getArtifactState("missing"))).toBe(
        "NOT_FOUND",
      );
      expect(
        await storeErrorCode(
          store.saveArtifact({ conversation_id: "missing", code: "1" }),
        ),
      ).toBe("NOT_FOUND");
    });
  });
});
