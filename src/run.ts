import type { SchemaObject } from "ajv";
import type { CrawlManifest, CrawlOutcome } from "./types";
import { crawlCatalog } from "./core/crawler";
import { type FetcherFactory, createFetcher, withFetcher } from "./core/fetcher";
import { createRecordValidator } from "./product/validator";
import { exportBikesCsv, exportBikesJson } from "./product/exporter";

export interface RunResult extends CrawlOutcome {
  jsonPath: string;
  /** null when nothing was accepted */
  csvPath: string | null;
  elapsedMs: number;
}

/**
 * Crawl the catalog described by the manifest and write bikes.json and
 * bikes.csv into outputDir. The fetch session is closed before the files
 * are written.
 */
export async function runCrawl(
  manifest: CrawlManifest,
  schema: SchemaObject | null,
  outputDir: string,
  factory: FetcherFactory = createFetcher
): Promise<RunResult> {
  const isValid = createRecordValidator(schema);
  const startTime = Date.now();

  const outcome = await withFetcher(
    manifest,
    (fetcher) => crawlCatalog(manifest, fetcher, isValid),
    factory
  );

  const elapsedMs = Date.now() - startTime;
  const jsonPath = exportBikesJson(outcome.records, outputDir);
  const csvPath = exportBikesCsv(outcome.records, outputDir);

  return { ...outcome, jsonPath, csvPath, elapsedMs };
}
