#!/usr/bin/env node
import * as fs from "fs";
import * as path from "path";
import type { CliOptions } from "./types";
import { CrawlerConfigError } from "./core/errors";
import { loadManifest, loadOutputSchema } from "./core/manifest";
import { formatDuration, getErrorMessage } from "./core/utils";
import { runCrawl } from "./run";

const USAGE =
  "Usage: bike-crawler [--manifest=<path>] [--schema=<path>] [--output=<dir>]";

/**
 * Parse CLI arguments into CliOptions.
 * Supports --manifest, --schema, --output; relative paths resolve against
 * the working directory.
 */
function parseArgs(argv: string[]): CliOptions {
  const opts: Record<string, string> = {};

  for (const arg of argv) {
    const eqIdx = arg.indexOf("=");
    if (arg.startsWith("--") && eqIdx !== -1) {
      opts[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
    }
  }

  return {
    manifestPath: path.resolve(opts.manifest || "specs/manifest.json"),
    schemaPath: path.resolve(opts.schema || "specs/output_schema.json"),
    outputDir: path.resolve(opts.output || "./output"),
  };
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  if (argv.includes("--help") || argv.includes("-h")) {
    console.log(USAGE);
    return;
  }
  const options = parseArgs(argv);

  for (const [label, file] of [
    ["Manifest", options.manifestPath],
    ["Schema", options.schemaPath],
  ]) {
    if (!fs.existsSync(file)) {
      console.error(`Error: ${label} file not found: ${file}`);
      console.error(USAGE);
      process.exit(1);
    }
  }

  const manifest = loadManifest(options.manifestPath);
  const schema = loadOutputSchema(options.schemaPath);

  console.log(`Bike Crawler  [Mode: ${manifest.fetch_mode}]\n`);
  console.log(`Step 1: Crawling ${manifest.base_url}...`);

  const result = await runCrawl(manifest, schema, options.outputDir);
  const { summary } = result;

  console.log("\nStep 2: Exporting...");
  console.log(`   ${result.jsonPath} (${result.records.length} bikes)`);
  if (result.csvPath) {
    console.log(`   ${result.csvPath} (${result.records.length} bikes)`);
  } else {
    console.log("   No bikes accepted, CSV skipped");
  }

  console.log(`\nDone in ${formatDuration(result.elapsedMs)}`);
  console.log(`   Pages:     ${summary.pages_fetched}`);
  console.log(`   Extracted: ${summary.records_extracted}`);
  console.log(`   Accepted:  ${summary.records_accepted}`);
  console.log(`   Rejected:  ${summary.records_rejected}`);
  console.log(`   Output:    ${options.outputDir}/`);
}

main().catch((err: unknown) => {
  if (err instanceof CrawlerConfigError) {
    console.error(`\n   Error: ${err.message}`);
  } else {
    console.error(`\n   Unexpected error: ${getErrorMessage(err)}`);
  }
  process.exit(1);
});
