import fs from "fs";
import path from "path";
import { config } from "./config";
import { Dataset, ListingRecord } from "./types";
import { formatRunDate, toFileSegment } from "./scraping/http-cache";

// Column order of the written records
export const DATASET_FIELDS: (keyof ListingRecord)[] = [
  "price",
  "title",
  "subtitle",
  "year",
  "style",
  "mileage",
  "engine",
  "transmission",
  "fuel",
  "make",
  "model",
];

export function datasetFileName(runAt: Date, make: string, model: string): string {
  return `${formatRunDate(runAt)}_${toFileSegment(make)}_${toFileSegment(model)}.json`;
}

export function serializeDataset(dataset: Dataset): string {
  const rows = dataset.map((record) =>
    Object.fromEntries(DATASET_FIELDS.map((field) => [field, record[field]]))
  );
  return JSON.stringify(rows, null, 2) + "\n";
}

/**
 * Write the dataset as a JSON array of records, one file per
 * (run date, make, model). Returns the written path.
 */
export function writeDataset(
  dataset: Dataset,
  options: { runAt: Date; make: string; model: string; outputDir?: string }
): string {
  const outputDir = options.outputDir ?? path.join(config.dataDir, "clean");
  fs.mkdirSync(outputDir, { recursive: true });

  const filePath = path.join(outputDir, datasetFileName(options.runAt, options.make, options.model));
  fs.writeFileSync(filePath, serializeDataset(dataset), "utf-8");
  return filePath;
}
