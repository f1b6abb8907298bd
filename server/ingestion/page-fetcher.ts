import axios from "axios";
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from "axios";
import { ENV } from "../_core/env";
import { FetchError, NotFoundError } from "../_core/errors";
import { createLogger } from "../_core/logger";
import { backoffDelay, DEFAULT_RETRY_POLICY } from "./retry-policy";
import type { RetryPolicy } from "./retry-policy";
import { RateLimiter, sleep } from "./rate-limiter";
import type { Sleep } from "./rate-limiter";

const log = createLogger("page-fetcher");

/** Anything that can turn a match page URL into HTML. */
export interface HtmlSource {
  fetch(url: string): Promise<string>;
}

export interface PageFetcherOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryPolicy?: RetryPolicy;
  minIntervalMs?: number;
  userAgent?: string;
  /** Replaces the axios transport; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
  sleep?: Sleep;
  rateLimiter?: RateLimiter;
}

export class PageFetcher implements HtmlSource {
  private client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;

  constructor(options: PageFetcherOptions = {}) {
    this.maxRetries = options.maxRetries ?? ENV.MAX_RETRIES;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = options.sleep ?? sleep;
    const rateLimiter =
      options.rateLimiter ?? new RateLimiter(options.minIntervalMs ?? ENV.MIN_REQUEST_INTERVAL_MS, this.sleep);

    this.client = axios.create({
      timeout: options.timeoutMs ?? ENV.REQUEST_TIMEOUT_MS,
      responseType: "text",
      // Status codes are classified below, not by axios
      validateStatus: () => true,
      adapter: options.adapter,
      headers: {
        "User-Agent": options.userAgent ?? ENV.USER_AGENT,
        Accept: "text/html,application/xhtml+xml",
      },
    });

    // Rate limit handling, shared by every worker using this fetcher
    this.client.interceptors.request.use(async (config) => {
      await rateLimiter.acquire();
      return config;
    });
  }

  async fetch(url: string): Promise<string> {
    let retry = 0;

    while (true) {
      try {
        return await this.attempt(url);
      } catch (error) {
        if (!(error instanceof FetchError) || !error.retryable) {
          throw error;
        }
        if (retry >= this.maxRetries) {
          throw new FetchError(`Giving up on ${url} after ${retry + 1} attempts: ${error.message}`, {
            url,
            status: error.status ?? undefined,
            cause: error,
          });
        }

        retry += 1;
        const waitMs = backoffDelay(retry, this.retryPolicy);
        log.warn(`${error.message} (attempt ${retry}/${this.maxRetries + 1}). Retrying in ${waitMs}ms...`);
        await this.sleep(waitMs);
      }
    }
  }

  private async attempt(url: string): Promise<string> {
    let response: AxiosResponse<unknown>;
    try {
      log.debug(`Fetching ${url}`);
      response = await this.client.get<unknown>(url);
    } catch (error) {
      // No response at all: timeout, DNS, connection reset
      const reason = axios.isAxiosError(error) ? `${error.code ?? "network error"}: ${error.message}` : String(error);
      throw new FetchError(`Request to ${url} failed (${reason})`, { url, retryable: true, cause: error });
    }

    const { status } = response;
    if (status >= 400 && status < 500) {
      throw new NotFoundError(url, status);
    }
    if (status >= 500) {
      throw new FetchError(`HTTP ${status} for ${url}`, { url, status, retryable: true });
    }
    if (status < 200 || status >= 300) {
      throw new FetchError(`Unexpected HTTP ${status} for ${url}`, { url, status });
    }
    if (typeof response.data !== "string") {
      throw new FetchError(`Response for ${url} is not text`, { url, status });
    }
    return response.data;
  }
}
