/**
 * Error taxonomy of a crawl run.
 *
 * InputError aborts the run. FetchError, ParseError and StorageError are
 * per-match failures: the pipeline records them and moves on.
 */

export class CrawlerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unusable seed file. */
export class InputError extends CrawlerError {}

export interface FetchErrorOptions extends ErrorOptions {
  url: string;
  status?: number;
  retryable?: boolean;
}

export class FetchError extends CrawlerError {
  readonly url: string;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(message: string, options: FetchErrorOptions) {
    super(message, options);
    this.url = options.url;
    this.status = options.status ?? null;
    this.retryable = options.retryable ?? false;
  }
}

/** Any 4xx answer. Never retried. */
export class NotFoundError extends FetchError {
  constructor(url: string, status: number) {
    super(`HTTP ${status} for ${url}`, { url, status, retryable: false });
  }
}

/** The page cannot be turned into a match (no team names). */
export class ParseError extends CrawlerError {
  readonly url: string | null;

  constructor(message: string, options?: ErrorOptions & { url?: string }) {
    super(message, options);
    this.url = options?.url ?? null;
  }
}

export class StorageError extends CrawlerError {}

/** Degraded data on an otherwise usable page. Recorded, never thrown. */
export interface PartialParseWarning {
  field: string;
  message: string;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
