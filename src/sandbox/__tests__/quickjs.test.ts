import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { SqliteAnalyticStore } from "../../analytics/sqlite.js";
import { FunctionRouter } from "../../router/router.js";
import { ExecutionBridge } from "../bridge.js";
import { describeError, QuickJSEngine, splitKeywordArguments } from "../quickjs.js";

describe("QuickJSEngine through ExecutionBridge", () => {
  let store: SqliteAnalyticStore;
  let router: FunctionRouter;
  let bridge: ExecutionBridge;

  beforeEach(() => {
    vi.spyOn(console, "debug").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    store = new SqliteAnalyticStore();
    store.loadTable("t", [
      { id: 1, name: "a" },
      { id: 2, name: "b" },
      { id: 3, name: "c" },
    ]);
    router = new FunctionRouter(store);
    bridge = new ExecutionBridge({
      engine: new QuickJSEngine(),
      router,
      max_duration_ms: 5000,
    });
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  test("fetch honors order_by", async () => {
    const outcome = await bridge.run('fetch("t", { order_by: "id DESC" })[0]');
    expect(outcome.error).toBeNull();
    expect(outcome.output_type).toBe("dict");
    expect(outcome.output).toEqual({ id: 3, name: "c" });
  });

  test("count applies where filters", async () => {
    const outcome = await bridge.run('count("t", { where: { name: "a" } })');
    expect(outcome.output).toBe(1);
    expect(outcome.output_type).toBe("scalar");
    expect(outcome.output_json).toBe("1");
  });

  test("tables lists the catalog", async () => {
    const outcome = await bridge.run("tables()");
    expect(outcome.output).toEqual(["t"]);
  });

  test("describe returns every column", async () => {
    const outcome = await bridge.run('describe("t")');
    expect(outcome.output_type).toBe("table");
    expect(outcome.output).toEqual([
      { column_name: "id", column_type: "INTEGER", nullable: true },
      { column_name: "name", column_type: "TEXT", nullable: true },
    ]);
  });

  test("code can compute over fetched rows", async () => {
    const code = [
      'const rows = fetch("t", { limit: 2 });',
      "const total = rows.reduce((sum, r) => sum + r.id, 0);",
      "({ rows: rows.length, total })",
    ].join("\n");
    const outcome = await bridge.run(code);
    expect(outcome.output).toEqual({ rows: 2, total: 3 });
    expect(outcome.output_type).toBe("dict");
  });

  test("quote injection in where values matches literally", async () => {
    const outcome = await bridge.run(
      `fetch("t", { where: { name: "a' OR '1'='1" } }).length`,
    );
    expect(outcome.error).toBeNull();
    expect(outcome.output).toBe(0);
  });

  test("an invalid column fails the run with the router's message", async () => {
    const spy = vi.spyOn(store, "executeSql");
    const outcome = await bridge.run(
      'fetch("t", { columns: ["; DROP TABLE x"] })',
    );
    expect(outcome.error).toBe(
      "Runtime error: RouterError: Invalid column name: ; DROP TABLE x",
    );
    expect(outcome.output_type).toBe("none");
    expect(spy).not.toHaveBeenCalled();
  });

  test("router failures can be caught inside the code unit", async () => {
    const outcome = await bridge.run(
      'let message = null; try { fetch("missing") } catch (e) { message = e.message } message',
    );
    expect(outcome.error).toBeNull();
    expect(outcome.output).toBe("Unknown table: missing. Available: t");
  });

  test("a parse error never reaches the router", async () => {
    const spy = vi.spyOn(router, "dispatch");
    const outcome = await bridge.run('fetch("t"');
    expect(outcome.error).toMatch(/^Syntax error: SyntaxError/);
    expect(outcome.state).toBeNull();
    expect(spy).toHaveBeenCalledTimes(0);
  });

  test("a NaN result keeps its text", async () => {
    const outcome = await bridge.run("0 / 0");
    expect(outcome.error).toBeNull();
    expect(outcome.output_type).toBe("other");
    expect(outcome.output_json).toBe('"NaN"');
  });

  test("runtime faults are reported as runtime errors", async () => {
    const outcome = await bridge.run("const x = null; x.y");
    expect(outcome.error).toMatch(/^Runtime error: TypeError/);
    expect(outcome.output).toBeNull();
  });

  test("only the four primitives are reachable", async () => {
    const outcome = await bridge.run(
      "[typeof require, typeof process, typeof setTimeout, typeof fetch]",
    );
    expect(outcome.output).toEqual(["undefined", "undefined", "undefined", "function"]);
  });

  test("async code is rejected", async () => {
    const outcome = await bridge.run("(async () => 1)()");
    expect(outcome.error).toBe("Unexpected async pause in sync execution");
  });

  test("an endless loop hits the execution budget", async () => {
    const tight = new ExecutionBridge({
      engine: new QuickJSEngine(),
      router,
      max_duration_ms: 200,
    });
    const outcome = await tight.run("while (true) {}");
    expect(outcome.error).toMatch(/^Runtime error: /);
    expect(outcome.error).toContain("(execution time limit exceeded)");
  });

  test("the state blob records the primitive calls", async () => {
    const outcome = await bridge.run('count("t")');
    const state: unknown = JSON.parse(
      Buffer.from(outcome.state ?? new Uint8Array()).toString("utf8"),
    );
    expect(state).toEqual({
      version: 1,
      code: 'count("t")',
      calls: [
        { function_name: "count", args: ["t"], kwargs: {}, result: { value: 3 } },
      ],
    });
  });
});

describe("splitKeywordArguments", () => {
  test("treats a trailing plain object as keywords", () => {
    expect(splitKeywordArguments(["t", { limit: 5 }])).toEqual({
      args: ["t"],
      kwargs: { limit: 5 },
    });
  });

  test("keeps a lone object positional", () => {
    expect(splitKeywordArguments([{ a: 1 }])).toEqual({
      args: [{ a: 1 }],
      kwargs: {},
    });
  });

  test("keeps trailing arrays positional", () => {
    expect(splitKeywordArguments(["t", ["id"]])).toEqual({
      args: ["t", ["id"]],
      kwargs: {},
    });
  });
});

describe("describeError", () => {
  test("formats dumped errors as name and message", () => {
    expect(describeError({ name: "TypeError", message: "boom" })).toBe(
      "TypeError: boom",
    );
    expect(describeError({ message: "plain" })).toBe("Error: plain");
    expect(describeError("text")).toBe("text");
  });
});
