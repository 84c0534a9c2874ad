import * as cheerio from "cheerio";
import type { ProductRecord } from "../types";
import { cleanText, resolveUrl } from "../core/utils";
import { parsePrice } from "./price";

/** JSON-LD @type values (lower-cased) that describe a bike listing */
const PRODUCT_TYPES = new Set(["product", "bike", "bicycle"]);

/** Listing links point at detail pages under this path */
const PRODUCT_LINK_SELECTOR = 'a[href*="/bikes/"]';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

/**
 * Extract every bike listing on a catalog page.
 * JSON-LD records come first, then records scraped from product links.
 * The same bike can appear in both lists; nothing is deduplicated.
 * @param html - Raw page markup
 * @param baseUrl - Catalog base URL, used to absolutize links and images
 */
export function extractProducts(html: string, baseUrl: string): ProductRecord[] {
  const $ = cheerio.load(html);
  return [...extractFromJsonLd($), ...extractFromLinks($, baseUrl)];
}

/**
 * Read Product/Bike/Bicycle objects from every JSON-LD block.
 * Blocks that fail to parse are skipped.
 */
export function extractFromJsonLd($: cheerio.CheerioAPI): ProductRecord[] {
  const records: ProductRecord[] = [];

  $('script[type="application/ld+json"]').each((_, el) => {
    const data = parseJsonLd($(el).html());
    if (data === undefined) return;

    const entries: unknown[] = Array.isArray(data) ? data : [data];
    for (const entry of entries) {
      if (!isJsonObject(entry) || !isProductType(entry["@type"])) continue;

      const offers = resolveOffers(entry);
      records.push({
        name: stringOrNull(entry.name),
        price: parsePrice(String(offers.price)),
        availability: stringOrNull(offers.availability) ?? "",
        image_url: resolveImage(entry.image),
        detail_url: stringOrNull(entry.url),
        specs: resolveSpecs(entry.additionalProperty),
      });
    }
  });

  return records;
}

/**
 * Scrape listing cards: any link into /bikes/ with its text as the name.
 * Links without text are skipped.
 */
export function extractFromLinks(
  $: cheerio.CheerioAPI,
  baseUrl: string
): ProductRecord[] {
  const records: ProductRecord[] = [];

  $(PRODUCT_LINK_SELECTOR).each((_, el) => {
    const $link = $(el);
    const name = cleanText($link.text());
    const href = $link.attr("href");
    const detailUrl = href ? resolveUrl(href, baseUrl) : null;
    if (!name || !detailUrl) return;

    const src = $link.find("img").first().attr("src");
    const $price = $link.find(".price").first();

    records.push({
      name,
      price: parsePrice($price.length ? $price.text() : ""),
      availability: "",
      image_url: src ? resolveUrl(src, baseUrl) : null,
      detail_url: detailUrl,
      specs: {},
    });
  });

  return records;
}

// ── Internals ────────────────────────────────────────────────────────────────

/** Parse one JSON-LD block. undefined means "skip this block". */
function parseJsonLd(text: string | null): unknown {
  if (!text || !text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isProductType(type: unknown): boolean {
  if (type === undefined || type === null) return false;
  return PRODUCT_TYPES.has(String(type).toLowerCase());
}

/**
 * Dig into a JSON-LD product to find its offer.
 * An offers array contributes its first object.
 */
function resolveOffers(entry: JsonObject): JsonObject {
  const offers = entry.offers;
  if (Array.isArray(offers)) return offers.find(isJsonObject) ?? {};
  return isJsonObject(offers) ? offers : {};
}

/** image may be a URL, a list of URLs or an ImageObject */
function resolveImage(image: unknown): string | null {
  if (typeof image === "string") return image;
  if (Array.isArray(image)) {
    const first = image.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  if (isJsonObject(image)) return stringOrNull(image.url);
  return null;
}

function resolveSpecs(value: unknown): ProductRecord["specs"] {
  if (Array.isArray(value)) return value.length > 0 ? value : {};
  return isJsonObject(value) ? value : {};
}
