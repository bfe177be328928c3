import { describe, expect, test } from "vitest";
import type { Message } from "../../persistence/types.js";
import {
  buildPromptWithHistory,
  buildSystemPrompt,
  withoutCurrentMessage,
} from "../prompts.js";

function message(role: Message["role"], content: string): Message {
  return {
    id: `${role}-${content}`,
    conversation_id: "c1",
    role,
    content,
    created_at: "2026-01-01T00:00:00.000Z",
  };
}

describe("buildPromptWithHistory", () => {
  test("is the bare message without history", () => {
    expect(buildPromptWithHistory("hello", [])).toBe("hello");
  });

  test("folds history as role-labelled blocks", () => {
    expect(
      buildPromptWithHistory("and now?", [
        message("user", "first"),
        message("assistant", "reply"),
      ]),
    ).toBe("User: first\n\nAssistant: reply\n\nUser: and now?");
  });
});

describe("withoutCurrentMessage", () => {
  test("drops a trailing copy of the current message", () => {
    const history = [message("user", "a"), message("assistant", "b"), message("user", "c")];
    expect(withoutCurrentMessage(history, "c")).toEqual(history.slice(0, 2));
  });

  test("keeps history that does not end with it", () => {
    const history = [message("user", "c"), message("assistant", "b")];
    expect(withoutCurrentMessage(history, "c")).toEqual(history);
    expect(withoutCurrentMessage([], "c")).toEqual([]);
  });
});

describe("buildSystemPrompt", () => {
  test("documents the primitives and ends with the schema", () => {
    const prompt = buildSystemPrompt("## Available Tables\n\n### t");
    for (const name of ["fetch(", "count(", "describe(", "tables("]) {
      expect(prompt).toContain(`\`${name}`);
    }
    expect(prompt.endsWith("## Dataset Schema\n\n## Available Tables\n\n### t\n")).toBe(true);
  });
});
