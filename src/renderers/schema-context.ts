import type { AnalyticStore } from "../router/types.js";

export interface SchemaTable {
  name: string;
  description?: string;
  rows?: number;
}

/**
 * Renders the analytic catalog as markdown for the system prompt:
 * one section per table with its description, row count and columns.
 */
export function renderSchemaContext(
  store: AnalyticStore,
  tables: SchemaTable[],
): string {
  const lines: string[] = ["## Available Tables", ""];

  for (const table of tables) {
    lines.push(`### ${table.name}`);
    if (table.description) lines.push(table.description);
    if (table.rows !== undefined) lines.push(`${table.rows} rows`);
    lines.push("");

    try {
      const columns = store.describeTable(table.name);
      lines.push("| Column | Type |");
      lines.push("|--------|------|");
      for (const c of columns) {
        lines.push(`| ${c.column_name} | ${c.column_type} |`);
      }
    } catch (err) {
      console.warn(
        `[analytics] schema unavailable for ${table.name}: ${err instanceof Error ? err.message : String(err)}`,
      );
      lines.push("(schema unavailable)");
    }
    lines.push("");
  }

  return lines.join("\n");
}
