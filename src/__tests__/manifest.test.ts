import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadManifest, loadOutputSchema, parseManifest } from "../core/manifest";
import { ManifestError, SchemaError } from "../core/errors";

describe("parseManifest", () => {
  it("fills in defaults", () => {
    expect(
      parseManifest({
        base_url: "https://shop.example/bikes/",
        pagination_param: "?page={page_num}",
      })
    ).toEqual({
      base_url: "https://shop.example/bikes",
      pagination_param: "?page={page_num}",
      start_page: 1,
      end_page: null,
      fetch_mode: "http",
      timeout_seconds: 10,
      block_resources: true,
      settle_ms: 2000,
    });
  });

  it("keeps explicit values", () => {
    const manifest = parseManifest({
      base_url: "https://shop.example",
      pagination_param: "/page/{page_num}",
      start_page: 2,
      end_page: 4,
      fetch_mode: "browser",
      timeout_seconds: 30,
      block_resources: false,
      settle_ms: 500,
    });
    expect(manifest.start_page).toBe(2);
    expect(manifest.end_page).toBe(4);
    expect(manifest.fetch_mode).toBe("browser");
    expect(manifest.block_resources).toBe(false);
  });

  it("accepts an unknown fetch mode so the fetcher can reject it", () => {
    expect(
      parseManifest({
        base_url: "https://shop.example",
        pagination_param: "?p={page_num}",
        fetch_mode: "ftp",
      }).fetch_mode
    ).toBe("ftp");
  });

  it("rejects a pagination template without {page_num}", () => {
    for (const template of ["?page={page}", "?page="]) {
      expect(() =>
        parseManifest({ base_url: "http://example.com", pagination_param: template })
      ).toThrow('pagination_param: must contain "{page_num}"');
    }
  });

  it("treats end_page 0 as no upper bound", () => {
    expect(
      parseManifest({
        base_url: "http://example.com",
        pagination_param: "?page={page_num}",
        end_page: 0,
      }).end_page
    ).toBeNull();
  });

  it("lists every bad field", () => {
    try {
      parseManifest({ base_url: "not a url", start_page: "one" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ManifestError);
      if (!(err instanceof ManifestError)) return;
      expect(err.issues.map((issue) => issue.split(":")[0])).toEqual([
        "base_url",
        "pagination_param",
        "start_page",
      ]);
    }
  });
});

describe("loadManifest / loadOutputSchema", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "bike-crawler-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("reads a manifest file with a BOM", () => {
    const file = write(
      "manifest.json",
      "\uFEFF" +
        '{"base_url": "http://example.com", "pagination_param": "?page={page_num}", "end_page": 1}'
    );
    expect(loadManifest(file).end_page).toBe(1);
  });

  it("raises ManifestError for a missing or broken file", () => {
    expect(() => loadManifest(path.join(dir, "missing.json"))).toThrow(ManifestError);
    expect(() => loadManifest(write("bad.json", "{"))).toThrow(ManifestError);
  });

  it("reads a schema object", () => {
    const file = write("schema.json", '{"type": "object", "required": ["name"]}');
    expect(loadOutputSchema(file)).toEqual({ type: "object", required: ["name"] });
  });

  it("rejects a schema that is not an object", () => {
    expect(() => loadOutputSchema(write("schema.json", "[]"))).toThrow(SchemaError);
    expect(() => loadOutputSchema(path.join(dir, "none.json"))).toThrow(SchemaError);
  });
});
