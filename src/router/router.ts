import { z } from "zod";
import { RouterError } from "./errors.js";
import { buildCount, buildSelect } from "./query.js";
import type { AnalyticStore, ColumnInfo, Row } from "./types.js";

/** The only functions reachable from inside a code unit */
export const PRIMITIVE_NAMES = ["fetch", "count", "describe", "tables"] as const;

export type PrimitiveName = (typeof PRIMITIVE_NAMES)[number];

/** Positional order of each primitive's parameters (also the keyword names) */
const PARAMETERS: Record<PrimitiveName, readonly string[]> = {
  fetch: ["table", "columns", "where", "order_by", "limit"],
  count: ["table", "where"],
  describe: ["table"],
  tables: [],
};

const WhereSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean(), z.null()]))
  .nullish();

const FetchArgsSchema = z
  .object({
    table: z.string(),
    columns: z.array(z.string()).nullish(),
    where: WhereSchema,
    order_by: z.string().nullish(),
    limit: z.union([z.number(), z.string()]).nullish(),
  })
  .strict();

const CountArgsSchema = z
  .object({
    table: z.string(),
    where: WhereSchema,
  })
  .strict();

const DescribeArgsSchema = z.object({ table: z.string() }).strict();

export type FetchArgs = z.infer<typeof FetchArgsSchema>;
export type CountArgs = z.infer<typeof CountArgsSchema>;

export function isPrimitiveName(name: string): name is PrimitiveName {
  return PRIMITIVE_NAMES.some((primitive) => primitive === name);
}

/**
 * Bind positional then keyword arguments to a primitive's parameter names.
 */
export function bindArguments(
  name: PrimitiveName,
  args: readonly unknown[],
  kwargs: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const params = PARAMETERS[name];
  if (args.length > params.length) {
    throw new RouterError(
      "INVALID_ARGUMENT",
      `${name}() takes ${params.length} positional argument(s) but ${args.length} were given`,
    );
  }

  const bound: Record<string, unknown> = {};
  args.forEach((value, i) => {
    bound[params[i]] = value;
  });

  for (const [key, value] of Object.entries(kwargs)) {
    if (!params.includes(key)) {
      throw new RouterError(
        "INVALID_ARGUMENT",
        `${name}() got an unexpected keyword argument '${key}'`,
      );
    }
    if (key in bound) {
      throw new RouterError(
        "INVALID_ARGUMENT",
        `${name}() got multiple values for argument '${key}'`,
      );
    }
    bound[key] = value;
  }

  return bound;
}

function parseArgs<T>(
  name: PrimitiveName,
  schema: z.ZodType<T>,
  bound: Record<string, unknown>,
): T {
  const parsed = schema.safeParse(bound);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");
    throw new RouterError("INVALID_ARGUMENT", `${name}(): ${detail}`);
  }
  return parsed.data;
}

function coerceLimit(limit: number | string): number {
  const n = Math.trunc(Number(limit));
  if (!Number.isFinite(n)) {
    throw new RouterError("INVALID_ARGUMENT", `Invalid limit: ${limit}`);
  }
  return n;
}

type Handler = (bound: Record<string, unknown>) => unknown;

/**
 * Validates and executes primitive calls against the analytic store.
 * This is the only place query text is composed.
 */
export class FunctionRouter {
  private readonly handlers: Record<PrimitiveName, Handler> = {
    fetch: (bound) => this.fetch(parseArgs("fetch", FetchArgsSchema, bound)),
    count: (bound) => this.count(parseArgs("count", CountArgsSchema, bound)),
    describe: (bound) =>
      this.describe(parseArgs("describe", DescribeArgsSchema, bound).table),
    tables: () => this.tables(),
  };

  constructor(private readonly store: AnalyticStore) {}

  dispatch(
    functionName: string,
    args: readonly unknown[] = [],
    kwargs: Readonly<Record<string, unknown>> = {},
  ): unknown {
    if (!isPrimitiveName(functionName)) {
      throw new RouterError(
        "UNKNOWN_FUNCTION",
        `Unknown external function: ${functionName}`,
      );
    }
    const bound = bindArguments(functionName, args, kwargs);
    return this.handlers[functionName](bound);
  }

  fetch(args: FetchArgs): Row[] {
    this.assertTable(args.table);
    const sql = buildSelect({
      table: args.table,
      columns: args.columns,
      where: args.where,
      order_by: args.order_by,
      limit:
        args.limit === undefined || args.limit === null
          ? null
          : coerceLimit(args.limit),
    });
    console.debug(`[router] fetch query: ${sql.slice(0, 200)}`);
    return this.store.executeSql(sql);
  }

  count(args: CountArgs): number {
    this.assertTable(args.table);
    const sql = buildCount(args.table, args.where);
    const rows = this.store.executeSql(sql);
    if (rows.length === 0) return 0;
    return Number(rows[0].cnt ?? 0);
  }

  describe(table: string): ColumnInfo[] {
    this.assertTable(table);
    console.debug(`[router] describing table: ${table}`);
    return this.store.describeTable(table);
  }

  tables(): string[] {
    return this.store.getTableNames();
  }

  private assertTable(table: string): void {
    const valid = this.store.getTableNames();
    if (!valid.includes(table)) {
      throw new RouterError(
        "UNKNOWN_TABLE",
        `Unknown table: ${table}. Available: ${valid.join(", ")}`,
      );
    }
  }
}
