import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { buildPageUrl, crawlCatalog } from "../core/crawler";
import type { PageFetcher } from "../core/fetcher";
import { createRecordValidator } from "../product/validator";
import type { CrawlManifest } from "../types";

function manifest(overrides: Partial<CrawlManifest> = {}): CrawlManifest {
  return {
    base_url: "http://example.com",
    pagination_param: "?page={page_num}",
    start_page: 1,
    end_page: null,
    fetch_mode: "http",
    timeout_seconds: 10,
    block_resources: true,
    settle_ms: 0,
    ...overrides,
  };
}

function bikePage(...names: string[]): string {
  const items = names.map((name) => ({
    "@type": "Product",
    name,
    url: `http://example.com/bikes/${name.toLowerCase().replace(/\s+/g, "-")}`,
    offers: { price: "1.000,00", availability: "InStock" },
  }));
  return `<html><head><script type="application/ld+json">${JSON.stringify(
    items
  )}</script></head><body></body></html>`;
}

/** Serves fixed markup per URL; anything else is a failed fetch */
class MemoryFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string>) {}

  async fetch(url: string): Promise<string | null> {
    this.requested.push(url);
    return this.pages[url] ?? null;
  }

  async close(): Promise<void> {}
}

const acceptAll = createRecordValidator();

describe("buildPageUrl", () => {
  it("uses the bare base URL for the start page", () => {
    expect(buildPageUrl(manifest(), 1)).toBe("http://example.com");
  });

  it("appends the filled-in template for later pages", () => {
    expect(buildPageUrl(manifest(), 3)).toBe("http://example.com?page=3");
  });

  it("treats a non-default start page as the bare URL", () => {
    const m = manifest({ start_page: 4, pagination_param: "/p/{page_num}?size={page_num}0" });
    expect(buildPageUrl(m, 4)).toBe("http://example.com");
    expect(buildPageUrl(m, 5)).toBe("http://example.com/p/5?size=50");
  });
});

describe("crawlCatalog", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("fetches exactly one page when end_page equals start_page", async () => {
    const fetcher = new MemoryFetcher({
      "http://example.com": bikePage("Bike A"),
      "http://example.com?page=2": bikePage("Bike B"),
    });
    const { records, summary } = await crawlCatalog(
      manifest({ end_page: 1 }),
      fetcher,
      acceptAll
    );
    expect(fetcher.requested).toEqual(["http://example.com"]);
    expect(records.map((r) => r.name)).toEqual(["Bike A"]);
    expect(summary.last_page).toBe(1);
  });

  it("stops at the first empty page when end_page is unset", async () => {
    const fetcher = new MemoryFetcher({
      "http://example.com": bikePage("Bike A", "Bike B"),
      "http://example.com?page=2": bikePage("Bike C"),
      "http://example.com?page=3": "<html><body>No results</body></html>",
      "http://example.com?page=4": bikePage("Bike D"),
    });
    const { records, summary } = await crawlCatalog(manifest(), fetcher, acceptAll);
    expect(fetcher.requested).toEqual([
      "http://example.com",
      "http://example.com?page=2",
      "http://example.com?page=3",
    ]);
    expect(records.map((r) => r.name)).toEqual(["Bike A", "Bike B", "Bike C"]);
    expect(summary).toEqual({
      pages_fetched: 3,
      records_extracted: 3,
      records_accepted: 3,
      records_rejected: 0,
      last_page: 3,
    });
    expect(console.log).toHaveBeenCalledWith("   Page 3: 0 bikes");
  });

  it("stops without error when a page cannot be fetched", async () => {
    const fetcher = new MemoryFetcher({
      "http://example.com": bikePage("Bike A"),
    });
    const { records, summary } = await crawlCatalog(
      manifest({ end_page: 10 }),
      fetcher,
      acceptAll
    );
    expect(fetcher.requested).toEqual([
      "http://example.com",
      "http://example.com?page=2",
    ]);
    expect(records).toHaveLength(1);
    expect(summary.pages_fetched).toBe(1);
  });

  it("returns nothing when the first page fails", async () => {
    const { records, summary } = await crawlCatalog(
      manifest(),
      new MemoryFetcher({}),
      acceptAll
    );
    expect(records).toEqual([]);
    expect(summary.last_page).toBeNull();
  });

  it("drops rejected records and keeps crawling", async () => {
    const isValid = createRecordValidator({
      type: "object",
      properties: { price: { type: "number" } },
      required: ["name", "price", "availability"],
    });
    const fetcher = new MemoryFetcher({
      "http://example.com": `<html><body>
        <a href="/bikes/cheap">Cheap Bike</a>
      </body></html>`,
      "http://example.com?page=2": bikePage("Bike B"),
    });
    const { records, summary } = await crawlCatalog(
      manifest({ end_page: 2 }),
      fetcher,
      isValid
    );
    expect(fetcher.requested).toHaveLength(2);
    expect(records.map((r) => r.name)).toEqual(["Bike B"]);
    expect(summary.records_rejected).toBe(1);
    expect(summary.records_extracted).toBe(2);
  });

  it("keeps an accumulator per run", async () => {
    const pages = { "http://example.com": bikePage("Bike A") };
    const m = manifest({ end_page: 1 });
    const first = await crawlCatalog(m, new MemoryFetcher(pages), acceptAll);
    const second = await crawlCatalog(m, new MemoryFetcher(pages), acceptAll);
    expect(first.records).toHaveLength(1);
    expect(second.records).toHaveLength(1);
    expect(first.records).not.toBe(second.records);
  });
});
