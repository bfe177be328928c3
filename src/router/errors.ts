/**
 * Error codes for primitive calls made from inside a code unit.
 */
export type RouterErrorCode =
  | "UNKNOWN_FUNCTION"   // name is not one of the registered primitives
  | "UNKNOWN_TABLE"      // table is not in the current catalog
  | "INVALID_IDENTIFIER" // column name fails the identifier pattern
  | "INVALID_ORDER_BY"   // order_by fails the "<column> [ASC|DESC]" pattern
  | "INVALID_ARGUMENT";  // argument missing, surplus, duplicated or mistyped

/**
 * Raised by the function router. The message is what the code unit sees
 * when the failure is injected at its call site.
 */
export class RouterError extends Error {
  constructor(
    public readonly code: RouterErrorCode,
    message: string
  ) {
    super(message);
    this.name = "RouterError";
  }
}
