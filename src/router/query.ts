import { RouterError } from "./errors.js";
import type { WhereValue } from "./types.js";

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ORDER_BY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\s+(ASC|DESC))?$/i;

export interface SelectQuery {
  table: string;
  columns?: string[] | null;
  where?: Record<string, WhereValue> | null;
  order_by?: string | null;
  limit?: number | null;
}

/**
 * Every identifier interpolated into query text passes through here.
 * Table names are additionally checked against the catalog by the router.
 */
export function assertIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new RouterError("INVALID_IDENTIFIER", `Invalid column name: ${name}`);
  }
  return name;
}

export function assertOrderBy(orderBy: string): string {
  if (!ORDER_BY_PATTERN.test(orderBy)) {
    throw new RouterError("INVALID_ORDER_BY", `Invalid order_by: ${orderBy}`);
  }
  return orderBy;
}

/** Single-quoted SQL string literal with embedded quotes doubled */
export function quoteLiteral(value: string): string {
  return `'${value.replaceAll("'", "''")}'`;
}

/**
 * Equality predicate for one where entry.
 * - string  → col = 'escaped'
 * - number  → col = 42 (finite only)
 * - boolean → col = 1 / col = 0
 * - null    → col IS NULL
 */
export function buildPredicate(column: string, value: WhereValue): string {
  assertIdentifier(column);

  if (value === null) return `${column} IS NULL`;
  if (typeof value === "string") return `${column} = ${quoteLiteral(value)}`;
  if (typeof value === "boolean") return `${column} = ${value ? 1 : 0}`;
  if (!Number.isFinite(value)) {
    throw new RouterError(
      "INVALID_ARGUMENT",
      `Invalid value for ${column}: ${value}`,
    );
  }
  return `${column} = ${value}`;
}

/** Returns "" for an absent or empty mapping, else " WHERE a AND b" */
export function buildWhereClause(
  where: Record<string, WhereValue> | null | undefined,
): string {
  if (!where) return "";
  const conditions = Object.entries(where).map(([column, value]) =>
    buildPredicate(column, value),
  );
  return conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : "";
}

export function buildSelect(q: SelectQuery): string {
  assertIdentifier(q.table);

  const columns = q.columns ?? [];
  const columnExpr =
    columns.length > 0 ? columns.map(assertIdentifier).join(", ") : "*";

  let sql = `SELECT ${columnExpr} FROM ${q.table}${buildWhereClause(q.where)}`;

  if (q.order_by) {
    sql += ` ORDER BY ${assertOrderBy(q.order_by)}`;
  }

  if (q.limit !== undefined && q.limit !== null) {
    sql += ` LIMIT ${Math.trunc(q.limit)}`;
  }

  return sql;
}

export function buildCount(
  table: string,
  where?: Record<string, WhereValue> | null,
): string {
  assertIdentifier(table);
  return `SELECT COUNT(*) AS cnt FROM ${table}${buildWhereClause(where)}`;
}
