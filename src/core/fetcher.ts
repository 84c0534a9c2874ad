import type { AxiosInstance } from "axios";
import { chromium, type Browser, type BrowserContext, type Page } from "playwright";
import type { CrawlManifest } from "../types";
import { UnsupportedFetchModeError } from "./errors";
import { createHttpClient, getErrorMessage, randomUA, sleep } from "./utils";

/**
 * Source of raw page markup. null means "no page here": a network error,
 * a bad status and running past the last page all look the same.
 */
export interface PageFetcher {
  fetch(url: string): Promise<string | null>;
  /** Release anything the fetcher holds open. Safe to call more than once. */
  close(): Promise<void>;
}

export type FetcherFactory = (manifest: CrawlManifest) => PageFetcher;

/** Resource types aborted when block_resources is on */
export const BLOCKED_RESOURCE_TYPES = new Set([
  "image",
  "media",
  "font",
  "stylesheet",
]);

const LAUNCH_ARGS = [
  "--disable-blink-features=AutomationControlled",
  "--no-sandbox",
  "--disable-setuid-sandbox",
];

/**
 * Plain HTTP GET. Fails on any non-2xx status; never retries.
 */
export class HttpFetcher implements PageFetcher {
  constructor(private readonly http: AxiosInstance) {}

  async fetch(url: string): Promise<string | null> {
    try {
      const response = await this.http.get<string>(url, {
        responseType: "text",
      });
      return response.data;
    } catch (err) {
      console.error(`Failed to fetch ${url}: ${getErrorMessage(err)}`);
      return null;
    }
  }

  async close(): Promise<void> {}
}

export interface BrowserFetchOptions {
  timeoutMs: number;
  blockResources: boolean;
  /** Extra wait after network idle, for late client-side rendering */
  settleMs: number;
}

interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
}

/**
 * Headless Chromium that renders each page before handing back its HTML.
 * One browser, context and page serve the whole run. They are launched on
 * the first fetch and torn down by close().
 */
export class BrowserFetcher implements PageFetcher {
  private session: Promise<BrowserSession> | null = null;

  constructor(private readonly options: BrowserFetchOptions) {}

  async fetch(url: string): Promise<string | null> {
    // Launch failures are setup problems, not missing pages: let them throw
    const { page } = await this.getSession();

    try {
      const response = await page.goto(url, {
        waitUntil: "networkidle",
        timeout: this.options.timeoutMs,
      });
      if (response && !response.ok()) {
        console.error(`Failed to fetch ${url}: HTTP ${response.status()}`);
        return null;
      }
      await sleep(this.options.settleMs);
      return await page.content();
    } catch (err) {
      console.error(`Failed to fetch ${url}: ${getErrorMessage(err)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    const pending = this.session;
    this.session = null;
    if (!pending) return;

    let session: BrowserSession;
    try {
      session = await pending;
    } catch {
      // launch never completed, nothing to tear down
      return;
    }
    await session.context
      .close()
      .catch((err: unknown) =>
        console.warn(`Failed to close browser context: ${getErrorMessage(err)}`)
      );
    await session.browser
      .close()
      .catch((err: unknown) =>
        console.warn(`Failed to close browser: ${getErrorMessage(err)}`)
      );
  }

  private getSession(): Promise<BrowserSession> {
    if (!this.session) {
      this.session = this.launch();
    }
    return this.session;
  }

  private async launch(): Promise<BrowserSession> {
    const browser = await chromium.launch({ headless: true, args: LAUNCH_ARGS });
    try {
      const context = await browser.newContext({
        userAgent: randomUA(),
        viewport: { width: 1280, height: 720 },
      });
      const page = await context.newPage();

      if (this.options.blockResources) {
        await page.route("**/*", (route) => {
          const type = route.request().resourceType();
          if (BLOCKED_RESOURCE_TYPES.has(type)) {
            return route.abort();
          }
          return route.continue();
        });
      }

      return { browser, context, page };
    } catch (err) {
      await browser.close();
      throw err;
    }
  }
}

/**
 * Pick the fetch backend named by the manifest's fetch_mode.
 * @throws UnsupportedFetchModeError for anything but "http" or "browser"
 */
export function createFetcher(manifest: CrawlManifest): PageFetcher {
  const timeoutMs = manifest.timeout_seconds * 1000;
  switch (manifest.fetch_mode) {
    case "http":
      return new HttpFetcher(createHttpClient(timeoutMs));
    case "browser":
      return new BrowserFetcher({
        timeoutMs,
        blockResources: manifest.block_resources,
        settleMs: manifest.settle_ms,
      });
    default:
      throw new UnsupportedFetchModeError(manifest.fetch_mode);
  }
}

/**
 * Run fn with a fetcher for this manifest and close the fetcher afterwards,
 * whether fn returns or throws.
 */
export async function withFetcher<T>(
  manifest: CrawlManifest,
  fn: (fetcher: PageFetcher) => Promise<T>,
  factory: FetcherFactory = createFetcher
): Promise<T> {
  const fetcher = factory(manifest);
  try {
    return await fn(fetcher);
  } finally {
    await fetcher.close();
  }
}
