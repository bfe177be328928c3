import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { AnalyticsError } from "./errors.js";
import type { SqliteAnalyticStore } from "./sqlite.js";

export const DatasetSchema = z
  .object({
    name: z.string().min(1),
    description: z.string(),
    path: z.string().min(1), // relative to the catalog file
    format: z.enum(["csv", "json"]).optional(), // default from the file extension
  })
  .strict();

export const DatasetCatalogSchema = z
  .object({
    datasets: z.array(DatasetSchema),
  })
  .strict();

const RowsSchema = z.array(z.record(z.string(), z.unknown()));

export type Dataset = z.infer<typeof DatasetSchema>;

/** A dataset as loaded into the store */
export interface LoadedDataset extends Dataset {
  rows: number;
}

export type DatasetFormat = NonNullable<Dataset["format"]>;

function readJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(file, "utf8"));
}

export function datasetFormat(ds: Dataset): DatasetFormat {
  if (ds.format) return ds.format;
  return path.extname(ds.path).toLowerCase() === ".csv" ? "csv" : "json";
}

/**
 * Header row names the columns; numeric cells become numbers and empty
 * cells become null.
 */
export function readCsv(file: string): unknown {
  const records: unknown = parse(fs.readFileSync(file, "utf8"), {
    columns: true,
    cast: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(records)) return records;
  return records.map((record: unknown) =>
    record !== null && typeof record === "object"
      ? Object.fromEntries(
          Object.entries(record).map(([key, value]) => [
            key,
            value === "" ? null : value,
          ]),
        )
      : record,
  );
}

function readRows(file: string, format: DatasetFormat): unknown {
  try {
    return format === "csv" ? readCsv(file) : readJson(file);
  } catch (err) {
    throw new AnalyticsError(
      "INVALID_DATASET",
      `Dataset file ${file} could not be read: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Load every dataset listed in a catalog file into the analytic store.
 * Datasets are CSV files with a header row or JSON arrays of row objects.
 * A missing catalog loads nothing; a malformed one throws INVALID_DATASET.
 */
export function loadDatasets(
  store: SqliteAnalyticStore,
  catalogPath: string,
): LoadedDataset[] {
  if (!fs.existsSync(catalogPath)) {
    console.warn(`[analytics] no dataset catalog at ${catalogPath}`);
    return [];
  }

  const catalog = DatasetCatalogSchema.safeParse(readJson(catalogPath));
  if (!catalog.success) {
    throw new AnalyticsError(
      "INVALID_DATASET",
      `Invalid dataset catalog ${catalogPath}: ${catalog.error.message}`,
    );
  }

  const baseDir = path.dirname(catalogPath);
  const loaded: LoadedDataset[] = [];

  for (const ds of catalog.data.datasets) {
    const file = path.resolve(baseDir, ds.path);
    const rows = RowsSchema.safeParse(readRows(file, datasetFormat(ds)));
    if (!rows.success) {
      throw new AnalyticsError(
        "INVALID_DATASET",
        `Dataset ${ds.name} (${file}) is not an array of row objects`,
      );
    }
    const count = store.loadTable(ds.name, rows.data);
    loaded.push({ ...ds, rows: count });
  }

  console.info(`[analytics] all ${loaded.length} datasets loaded`);
  return loaded;
}
