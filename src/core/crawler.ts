import type { CrawlManifest, CrawlOutcome, CrawlSummary, ProductRecord } from "../types";
import { extractProducts } from "../product/extractor";
import type { RecordValidator } from "../product/validator";
import type { PageFetcher } from "./fetcher";

const PAGE_PLACEHOLDER = /\{page_num\}/g;

/**
 * URL of a catalog page. The first page is the bare base URL; later pages
 * append the pagination template with {page_num} filled in.
 */
export function buildPageUrl(manifest: CrawlManifest, pageNum: number): string {
  if (pageNum === manifest.start_page) return manifest.base_url;
  return (
    manifest.base_url +
    manifest.pagination_param.replace(PAGE_PLACEHOLDER, String(pageNum))
  );
}

/**
 * Walk the catalog one page at a time starting at start_page.
 *
 * Stops on the first page that cannot be fetched, the first page that
 * yields no listings, or after end_page. There are no retries: one failed
 * fetch ends the run with whatever was collected so far.
 *
 * @param manifest - Crawl settings
 * @param fetcher - Page source; closing it is the caller's job
 * @param isValid - Accept/reject check for each extracted record
 */
export async function crawlCatalog(
  manifest: CrawlManifest,
  fetcher: PageFetcher,
  isValid: RecordValidator
): Promise<CrawlOutcome> {
  const records: ProductRecord[] = [];
  const summary: CrawlSummary = {
    pages_fetched: 0,
    records_extracted: 0,
    records_accepted: 0,
    records_rejected: 0,
    last_page: null,
  };

  let pageNum = manifest.start_page;
  for (;;) {
    const url = buildPageUrl(manifest, pageNum);
    const html = await fetcher.fetch(url);
    if (!html) break;

    summary.pages_fetched++;
    summary.last_page = pageNum;

    const candidates = extractProducts(html, manifest.base_url);
    for (const record of candidates) {
      if (isValid(record)) {
        records.push(record);
      } else {
        summary.records_rejected++;
      }
    }
    summary.records_extracted += candidates.length;
    console.log(`   Page ${pageNum}: ${candidates.length} bikes`);

    if (candidates.length === 0) break;
    pageNum++;
    if (manifest.end_page !== null && pageNum > manifest.end_page) break;
  }

  summary.records_accepted = records.length;
  return { records, summary };
}
