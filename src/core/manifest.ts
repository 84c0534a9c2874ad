import * as fs from "fs";
import type { SchemaObject } from "ajv";
import { z } from "zod";
import type { CrawlManifest } from "../types";
import { ManifestError, SchemaError } from "./errors";
import { getErrorMessage } from "./utils";

const ManifestSchema = z.object({
  base_url: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  pagination_param: z
    .string()
    .refine((template) => template.includes("{page_num}"), {
      message: 'must contain "{page_num}"',
    }),
  start_page: z.number().int().nonnegative().default(1),
  end_page: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    // 0 means no upper bound, same as leaving it out
    .transform((page) => page || null),
  fetch_mode: z.string().default("http"),
  timeout_seconds: z.number().positive().default(10),
  block_resources: z.boolean().default(true),
  settle_ms: z.number().int().nonnegative().default(2000),
});

/**
 * Validate a raw manifest object and fill in defaults.
 * Throws ManifestError listing every offending field.
 */
export function parseManifest(raw: unknown): CrawlManifest {
  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ManifestError("Invalid manifest", issues);
  }
  return result.data;
}

/**
 * Read and validate the crawl manifest.
 * @param filePath - Path to manifest.json
 */
export function loadManifest(filePath: string): CrawlManifest {
  let raw: unknown;
  try {
    raw = readJsonFile(filePath);
  } catch (err) {
    throw new ManifestError(
      `Could not read manifest "${filePath}": ${getErrorMessage(err)}`
    );
  }
  return parseManifest(raw);
}

/**
 * Read the JSON Schema every accepted record must satisfy.
 * @param filePath - Path to output_schema.json
 */
export function loadOutputSchema(filePath: string): SchemaObject {
  let raw: unknown;
  try {
    raw = readJsonFile(filePath);
  } catch (err) {
    throw new SchemaError(
      `Could not read schema "${filePath}": ${getErrorMessage(err)}`
    );
  }
  if (!isSchemaObject(raw)) {
    throw new SchemaError(`Schema "${filePath}" must be a JSON object.`);
  }
  return raw;
}

export function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── Internals ────────────────────────────────────────────────────────────────

function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new Error("file not found");
  }
  const raw = fs.readFileSync(filePath, "utf-8");
  // Strip BOM if present
  const content = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  return JSON.parse(content);
}
