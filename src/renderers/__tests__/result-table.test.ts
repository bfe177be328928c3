import { describe, expect, test } from "vitest";
import { renderResultData } from "../result-table.js";

describe("renderResultData", () => {
  test("renders a markdown table using the first row's columns", () => {
    const rows = [
      { station: "hill", rainfall_mm: 102.4 },
      { station: "valley", rainfall_mm: null, extra: 1 },
      { rainfall_mm: 3 },
    ];
    expect(renderResultData(rows, 100)).toBe(
      [
        "station | rainfall_mm",
        "--- | ---",
        "hill | 102.4",
        "valley | null",
        " | 3",
      ].join("\n"),
    );
  });

  test("notes truncation past the row cap", () => {
    const rows = Array.from({ length: 5 }, (_, i) => ({ n: i }));
    expect(renderResultData(rows, 3)).toBe(
      "n\n---\n0\n1\n2\n\n(Showing 3 of 5 rows)",
    );
  });

  test("no note when exactly at the cap", () => {
    expect(renderResultData([{ n: 1 }, { n: 2 }], 2)).toBe("n\n---\n1\n2");
  });

  test("nested values are rendered as JSON", () => {
    expect(renderResultData([{ tags: ["a", "b"] }], 10)).toBe(
      'tags\n---\n["a","b"]',
    );
  });

  test("anything else is indented JSON", () => {
    expect(renderResultData({ total: 3 }, 10)).toBe('{\n  "total": 3\n}');
    expect(renderResultData([1, 2], 10)).toBe("[\n  1,\n  2\n]");
    expect(renderResultData([], 10)).toBe("[]");
    expect(renderResultData("north", 10)).toBe('"north"');
  });
});
