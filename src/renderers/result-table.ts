import { isPlainObject } from "../sandbox/classify.js";

function renderCell(row: Record<string, unknown>, column: string): string {
  if (!(column in row)) return "";
  const value = row[column];
  if (typeof value === "object" && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Renders stored result data for the agent.
 *
 * Tables (arrays of objects) become a markdown table of at most `maxRows`
 * rows, columns taken from the first row, with a truncation note when rows
 * were dropped. Anything else is pretty-printed JSON.
 */
export function renderResultData(data: unknown, maxRows: number): string {
  if (!Array.isArray(data) || data.length === 0 || !isPlainObject(data[0])) {
    return JSON.stringify(data, null, 2);
  }

  const columns = Object.keys(data[0]);
  const shown = data.slice(0, maxRows);

  const header = columns.join(" | ");
  const separator = columns.map(() => "---").join(" | ");
  const body = shown
    .map((row: unknown) =>
      columns
        .map((c) => (isPlainObject(row) ? renderCell(row, c) : ""))
        .join(" | "),
    )
    .join("\n");

  const note =
    data.length > maxRows
      ? `\n\n(Showing ${shown.length} of ${data.length} rows)`
      : "";

  return `${header}\n${separator}\n${body}${note}`;
}
