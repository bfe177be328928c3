// Errors
export { RouterError } from "./errors.js";
export type { RouterErrorCode } from "./errors.js";

// Query construction
export {
  assertIdentifier,
  assertOrderBy,
  buildCount,
  buildPredicate,
  buildSelect,
  buildWhereClause,
  quoteLiteral,
} from "./query.js";
export type { SelectQuery } from "./query.js";

// Router
export {
  bindArguments,
  FunctionRouter,
  isPrimitiveName,
  PRIMITIVE_NAMES,
} from "./router.js";
export type { CountArgs, FetchArgs, PrimitiveName } from "./router.js";

// Types
export type { AnalyticStore, ColumnInfo, Row, WhereValue } from "./types.js";
