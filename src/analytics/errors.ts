export type AnalyticsErrorCode =
  | "INVALID_DATASET"     // bad table name, empty rows, malformed catalog entry
  | "NON_READ_STATEMENT"; // statement would modify the catalog

export class AnalyticsError extends Error {
  constructor(
    public readonly code: AnalyticsErrorCode,
    message: string
  ) {
    super(message);
    this.name = "AnalyticsError";
  }
}
