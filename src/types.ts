/** One bike listing pulled from a catalog page */
export interface ProductRecord {
  name: string | null;
  price: number | null;
  availability: string;
  image_url: string | null;
  detail_url: string | null;
  specs: Record<string, unknown> | unknown[];
}

/** Crawl manifest, as read from specs/manifest.json */
export interface CrawlManifest {
  base_url: string;
  /** Appended to base_url for every page after the first, e.g. "?page={page_num}" */
  pagination_param: string;
  start_page: number;
  end_page: number | null;
  fetch_mode: string;
  timeout_seconds: number;
  block_resources: boolean;
  settle_ms: number;
}

/** CLI options parsed from command-line arguments */
export interface CliOptions {
  manifestPath: string;
  schemaPath: string;
  outputDir: string;
}

/** Counters collected while walking the catalog */
export interface CrawlSummary {
  pages_fetched: number;
  records_extracted: number;
  records_accepted: number;
  records_rejected: number;
  last_page: number | null;
}

export interface CrawlOutcome {
  records: ProductRecord[];
  summary: CrawlSummary;
}
