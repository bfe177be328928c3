/**
 * Error codes for conversation store operations.
 */
export type StoreErrorCode =
  | "NOT_FOUND"        // conversation or artifact doesn't exist
  | "INVALID_REQUEST"; // invalid parameter (empty title, unknown role)

export class StoreError extends Error {
  constructor(
    public readonly code: StoreErrorCode,
    message: string
  ) {
    super(message);
    this.name = "StoreError";
  }
}
