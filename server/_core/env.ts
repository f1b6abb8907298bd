import "dotenv/config";

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const ENV = {
  FACR_BASE_URL: process.env.FACR_BASE_URL || "https://www.fotbal.cz/souteze",
  DATABASE_DIR: process.env.DATABASE_DIR || "./data/games-db",

  CRAWL_CONCURRENCY: intFromEnv("CRAWL_CONCURRENCY", 4),
  REQUEST_TIMEOUT_MS: intFromEnv("REQUEST_TIMEOUT_MS", 20000),
  MAX_RETRIES: intFromEnv("MAX_RETRIES", 3),
  RETRY_BASE_DELAY_MS: intFromEnv("RETRY_BASE_DELAY_MS", 1000),
  RETRY_MAX_DELAY_MS: intFromEnv("RETRY_MAX_DELAY_MS", 15000),
  MIN_REQUEST_INTERVAL_MS: intFromEnv("MIN_REQUEST_INTERVAL_MS", 1000),
  USER_AGENT:
    process.env.USER_AGENT ||
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",

  LOG_LEVEL: process.env.LOG_LEVEL || "info",
};
