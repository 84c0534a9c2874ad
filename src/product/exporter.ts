import * as fs from "fs";
import * as path from "path";
import type { ProductRecord } from "../types";

/** UTF-8 BOM for Excel compatibility */
const BOM = "\uFEFF";

export const JSON_FILENAME = "bikes.json";
export const CSV_FILENAME = "bikes.csv";

/**
 * Render a value for a CSV cell. null becomes an empty cell; objects and
 * arrays (specs) are written as JSON.
 */
function formatCell(value: unknown): string {
  if (value == null) return "";
  if (typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * Escape a value for safe inclusion in a CSV cell.
 * Wraps in double quotes if the value contains commas, quotes, or newlines.
 */
function escapeCsv(str: string): string {
  if (
    str.includes('"') ||
    str.includes(",") ||
    str.includes("\n") ||
    str.includes("\r")
  ) {
    return `"${str.replace(/"/g, '""')}"`;
  }
  return str;
}

/**
 * Export accepted records to bikes.json, in crawl order.
 * @returns Path of the written file
 */
export function exportBikesJson(
  records: ProductRecord[],
  outputDir: string
): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, JSON_FILENAME);
  fs.writeFileSync(filePath, JSON.stringify(records, null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Export accepted records to bikes.csv. Columns follow the keys of the
 * first record. An empty list writes no file and returns null.
 */
export function exportBikesCsv(
  records: ProductRecord[],
  outputDir: string
): string | null {
  if (records.length === 0) return null;

  fs.mkdirSync(outputDir, { recursive: true });
  const filePath = path.join(outputDir, CSV_FILENAME);

  const headers = Object.keys(records[0]);
  const lines: string[] = [BOM + headers.map(escapeCsv).join(",")];

  for (const record of records) {
    const row: Record<string, unknown> = { ...record };
    lines.push(headers.map((key) => escapeCsv(formatCell(row[key]))).join(","));
  }

  fs.writeFileSync(filePath, lines.join("\n") + "\n", "utf-8");
  return filePath;
}
