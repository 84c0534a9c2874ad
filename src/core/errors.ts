/**
 * Configuration problems that stop a run before the first page is fetched.
 * Fetch failures and rejected records are not errors: they are logged and
 * folded into the crawl result.
 */
export class CrawlerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Manifest file is missing, unreadable or fails its schema */
export class ManifestError extends CrawlerConfigError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n   ${issues.join("\n   ")}` : message);
  }
}

/** Output schema file is missing, unreadable or does not compile */
export class SchemaError extends CrawlerConfigError {}

export class UnsupportedFetchModeError extends CrawlerConfigError {
  constructor(readonly fetchMode: string) {
    super(
      `Unsupported fetch_mode "${fetchMode}". Expected "http" or "browser".`
    );
  }
}
