import { isPlainObject } from "../sandbox/classify.js";

const PREVIEW_CHARS = 200;

export interface SummarizableResult {
  output_json: string | null;
  output_type: string;
}

/**
 * Short text describing a stored result, returned to the agent in place of
 * the full payload. The consumer renders the data itself.
 */
export function renderResultSummary(
  uid: string,
  result: SummarizableResult,
): string {
  const header = `Result UID: ${uid}`;
  const json = result.output_json;

  if (json === null) {
    return `${header}\nType: none\nValue: null`;
  }

  switch (result.output_type) {
    case "table": {
      const rows: unknown = JSON.parse(json);
      const count = Array.isArray(rows) ? rows.length : 0;
      const first: unknown = Array.isArray(rows) ? rows[0] : undefined;
      const columns = isPlainObject(first) ? Object.keys(first) : [];
      return `${header}\nType: table\nRows: ${count}\nColumns: ${columns.join(", ")}`;
    }
    case "scalar":
      return `${header}\nType: scalar (displayed as a metric)\nValue: ${json}`;
    case "dict": {
      const data: unknown = JSON.parse(json);
      const keys = isPlainObject(data) ? Object.keys(data) : [];
      return `${header}\nType: dict (displayed as key-value pairs)\nKeys: ${keys.join(", ")}`;
    }
    default:
      return `${header}\nType: ${result.output_type}\nData: ${json.slice(0, PREVIEW_CHARS)}`;
  }
}
