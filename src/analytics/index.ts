export { AnalyticsError } from "./errors.js";
export type { AnalyticsErrorCode } from "./errors.js";

export { SqliteAnalyticStore } from "./sqlite.js";

export {
  DatasetCatalogSchema,
  DatasetSchema,
  datasetFormat,
  loadDatasets,
  readCsv,
} from "./datasets.js";
export type { Dataset, DatasetFormat, LoadedDataset } from "./datasets.js";
