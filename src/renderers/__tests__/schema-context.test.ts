import { describe, expect, test, vi } from "vitest";
import { SqliteAnalyticStore } from "../../analytics/sqlite.js";
import type { AnalyticStore } from "../../router/types.js";
import { renderSchemaContext } from "../schema-context.js";

describe("renderSchemaContext", () => {
  test("renders each table with its columns", () => {
    const store = new SqliteAnalyticStore();
    store.loadTable("scores", [{ player: "ana", points: 10 }]);

    expect(
      renderSchemaContext(store, [
        { name: "scores", description: "Game scores", rows: 1 },
      ]),
    ).toBe(
      [
        "## Available Tables",
        "",
        "### scores",
        "Game scores",
        "1 rows",
        "",
        "| Column | Type |",
        "|--------|------|",
        "| player | TEXT |",
        "| points | INTEGER |",
        "",
      ].join("\n"),
    );
    store.close();
  });

  test("marks tables whose schema cannot be read", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const broken: AnalyticStore = {
      executeSql: () => [],
      getTableNames: () => ["gone"],
      describeTable: () => {
        throw new Error("no such table");
      },
    };

    expect(renderSchemaContext(broken, [{ name: "gone" }])).toBe(
      ["## Available Tables", "", "### gone", "", "(schema unavailable)", ""].join("\n"),
    );
    expect(warn).toHaveBeenCalledWith(
      "[analytics] schema unavailable for gone: no such table",
    );
    warn.mockRestore();
  });
});
