export type OutputType = "table" | "dict" | "scalar" | "other" | "none";

export interface ClassifiedOutput {
  output: unknown;
  output_json: string | null; // null only when output_type is "none"
  output_type: OutputType;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** JSON with bigint rendered as a decimal string */
export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? v.toString() : v,
  );
}

/**
 * Classify a code unit's final value by display shape.
 *
 * - null / undefined                           → none
 * - non-empty array whose first item is a plain object → table
 * - plain object                                → dict
 * - finite number, string, boolean, bigint      → scalar
 * - anything else                               → other (JSON, or the JSON
 *   string of String(value) when JSON cannot carry it: NaN, Infinity,
 *   circular structures)
 */
export function classifyOutput(output: unknown): ClassifiedOutput {
  if (output === null || output === undefined) {
    return { output: null, output_json: null, output_type: "none" };
  }

  if (Array.isArray(output) && output.length > 0 && isPlainObject(output[0])) {
    return { output, output_json: toJson(output), output_type: "table" };
  }

  if (isPlainObject(output)) {
    return { output, output_json: toJson(output), output_type: "dict" };
  }

  if (typeof output === "number" && !Number.isFinite(output)) {
    return {
      output,
      output_json: JSON.stringify(String(output)),
      output_type: "other",
    };
  }

  switch (typeof output) {
    case "number":
    case "string":
    case "boolean":
    case "bigint":
      return { output, output_json: toJson(output), output_type: "scalar" };
  }

  let outputJson: string | undefined;
  try {
    outputJson = toJson(output);
  } catch {
    outputJson = undefined; // circular structures
  }
  if (outputJson === undefined) {
    outputJson = JSON.stringify(String(output));
  }
  return { output, output_json: outputJson, output_type: "other" };
}
