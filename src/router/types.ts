export type Row = Record<string, unknown>;

export interface ColumnInfo {
  column_name: string;
  column_type: string;
  nullable: boolean;
}

/** Scalar accepted as the value of an equality predicate */
export type WhereValue = string | number | boolean | null;

/**
 * Read-only analytic store the router queries.
 * Implementations: SqliteAnalyticStore (in-memory catalog)
 */
export interface AnalyticStore {
  /** Run a read statement and return its rows in order. */
  executeSql(query: string): Row[];

  /** Names of the tables in the current catalog. */
  getTableNames(): string[];

  describeTable(table: string): ColumnInfo[];
}
