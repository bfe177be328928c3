import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import type { AnalyticStore, ColumnInfo, Row } from "../router/types.js";
import { AnalyticsError } from "./errors.js";

const NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

interface SqliteAnalyticStoreOptions {
  dbPath?: string; // default ":memory:"
}

type ColumnType = "INTEGER" | "REAL" | "TEXT";

/** Widest SQLite type needed for the non-null values of one column */
function inferColumnType(values: unknown[]): ColumnType {
  let type: ColumnType = "INTEGER";
  for (const value of values) {
    if (value === null || value === undefined) continue;
    if (typeof value === "boolean" || typeof value === "bigint") continue;
    if (typeof value === "number") {
      if (!Number.isInteger(value)) type = "REAL";
      continue;
    }
    return "TEXT";
  }
  return type;
}

function toSqlValue(value: unknown): string | number | bigint | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number" || typeof value === "bigint") return value;
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}

/**
 * In-memory SQLite catalog of analytic tables.
 * Tables are loaded once at startup; queries are restricted to read statements.
 */
export class SqliteAnalyticStore implements AnalyticStore {
  private db: DatabaseType;
  private stmts: {
    tableNames: Statement;
    tableInfo: Statement;
  };

  constructor(opts: SqliteAnalyticStoreOptions = {}) {
    this.db = new Database(opts.dbPath ?? ":memory:");
    this.stmts = {
      tableNames: this.db.prepare(`
        SELECT name FROM sqlite_master
        WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `),
      tableInfo: this.db.prepare(`
        SELECT name, type, "notnull" AS not_null FROM pragma_table_info(?)
        ORDER BY cid
      `),
    };
  }

  close(): void {
    this.db.close();
  }

  /**
   * Create (or replace) a table from an array of uniform-ish rows.
   * Columns are the union of row keys in first-seen order.
   */
  loadTable(name: string, rows: Row[]): number {
    if (!NAME_PATTERN.test(name)) {
      throw new AnalyticsError("INVALID_DATASET", `Invalid table name: ${name}`);
    }
    if (rows.length === 0) {
      throw new AnalyticsError("INVALID_DATASET", `Dataset ${name} has no rows`);
    }

    const columns: string[] = [];
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (!columns.includes(key)) columns.push(key);
      }
    }
    for (const column of columns) {
      if (!NAME_PATTERN.test(column)) {
        throw new AnalyticsError(
          "INVALID_DATASET",
          `Invalid column name in ${name}: ${column}`,
        );
      }
    }

    const columnDefs = columns
      .map((c) => `${c} ${inferColumnType(rows.map((r) => r[c]))}`)
      .join(", ");
    const placeholders = columns.map(() => "?").join(", ");

    const load = this.db.transaction(() => {
      this.db.exec(`DROP TABLE IF EXISTS ${name}`);
      this.db.exec(`CREATE TABLE ${name} (${columnDefs})`);
      const insert = this.db.prepare(
        `INSERT INTO ${name} (${columns.join(", ")}) VALUES (${placeholders})`,
      );
      for (const row of rows) {
        insert.run(...columns.map((c) => toSqlValue(row[c])));
      }
    });
    load();

    console.info(`[analytics] loaded ${name}: ${rows.length} rows`);
    return rows.length;
  }

  executeSql(query: string): Row[] {
    const stmt = this.db.prepare(query);
    if (!stmt.reader) {
      throw new AnalyticsError(
        "NON_READ_STATEMENT",
        "Only read statements may run against the analytic store",
      );
    }
    return stmt.all() as Row[];
  }

  getTableNames(): string[] {
    const rows = this.stmts.tableNames.all() as { name: string }[];
    return rows.map((r) => r.name);
  }

  describeTable(table: string): ColumnInfo[] {
    const rows = this.stmts.tableInfo.all(table) as {
      name: string;
      type: string;
      not_null: number;
    }[];
    return rows.map((r) => ({
      column_name: r.name,
      column_type: r.type,
      nullable: r.not_null === 0,
    }));
  }
}
