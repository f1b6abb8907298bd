/**
 * Matches Crawl Worker
 *
 * Fetches every referenced match page, parses it and commits the match,
 * resolving team and player ids inside the commit's transaction. Each match
 * runs Fetch → Parse → Commit on its own; a failure at any stage is logged
 * and counted, and the worker moves on to the next reference.
 */

import type { Database } from "../db";
import { ENV } from "../_core/env";
import { errorMessage } from "../_core/errors";
import type { PartialParseWarning } from "../_core/errors";
import { createLogger } from "../_core/logger";
import type { MatchReference } from "../ingestion/link-store";
import { PageFetcher } from "../ingestion/page-fetcher";
import type { HtmlSource } from "../ingestion/page-fetcher";
import { parseMatch } from "../ingestion/parsers/match-parser";
import type { ParsedMatch } from "../ingestion/parsers/match-parser";
import { commitMatch } from "../ingestion/persistence";
import type { CommitResult } from "../ingestion/persistence";
import { syncLogger, syncStatus } from "../ingestion/utils/sync-logger";
import type { SyncStatus } from "../ingestion/utils/sync-logger";

const WORKER_NAME = "matches-crawl";
const SOURCE = "fotbal.cz";
const MAX_CONCURRENCY = 8;

const log = createLogger(WORKER_NAME);

export type MatchState = "Committed" | "FetchFailed" | "ParseFailed" | "CommitFailed";

export interface MatchOutcome {
  reference: MatchReference;
  state: MatchState;
  warnings: PartialParseWarning[];
  commit?: CommitResult;
  error?: string;
}

export interface CrawlSummary {
  total: number;
  committed: number;
  fetchFailed: number;
  parseFailed: number;
  commitFailed: number;
  warned: number;
  status: SyncStatus;
  outcomes: MatchOutcome[];
}

export interface CrawlOptions {
  db: Database;
  references: MatchReference[];
  fetcher?: HtmlSource;
  concurrency?: number;
}

export function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) return 1;
  return Math.min(MAX_CONCURRENCY, Math.max(1, Math.floor(value)));
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`.
 */
export async function runPool<T, R>(items: T[], concurrency: number, worker: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let next = 0;

  const runners = Array.from({ length: Math.min(concurrency, items.length) }, async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index]);
    }
  });

  await Promise.all(runners);
  return results;
}

function checkGoalTotals(reference: MatchReference, match: ParsedMatch): void {
  if (match.homeScore === null || match.awayScore === null) return;
  const scored = match.scorers.reduce((sum, scorer) => sum + scorer.goals, 0);
  const final = match.homeScore + match.awayScore;
  if (scored !== final) {
    log.debug(`Scorers account for ${scored} of ${final} goals in ${reference.url}`);
  }
}

async function processMatch(db: Database, fetcher: HtmlSource, reference: MatchReference): Promise<MatchOutcome> {
  let html: string;
  try {
    html = await fetcher.fetch(reference.url);
  } catch (error) {
    log.error(`Fetch failed for ${reference.url}: ${errorMessage(error)}`);
    return { reference, state: "FetchFailed", warnings: [], error: errorMessage(error) };
  }

  let parsed: ParsedMatch;
  try {
    parsed = parseMatch(html, reference.url);
  } catch (error) {
    log.error(`Parse failed for ${reference.url}: ${errorMessage(error)}`);
    return { reference, state: "ParseFailed", warnings: [], error: errorMessage(error) };
  }

  const warnings = [...parsed.warnings];
  if (parsed.facrGameId === null) {
    warnings.push({ field: "matchNumber", message: `using reference id ${reference.externalId} as match number` });
  }
  for (const warning of warnings) {
    log.warn(`${reference.url}: ${warning.field}: ${warning.message}`);
  }
  checkGoalTotals(reference, parsed);

  try {
    const commit = await commitMatch(db, parsed, reference);
    log.info(
      `Stored ${commit.facrGameId}: ${parsed.homeTeam} vs ${parsed.awayTeam} ` +
        `(${commit.rowsAffected.goalsInserted} goal rows, ${commit.totalRows} rows affected)`,
    );
    return { reference, state: "Committed", warnings, commit };
  } catch (error) {
    log.error(`Commit failed for ${reference.url}: ${errorMessage(error)}`);
    return { reference, state: "CommitFailed", warnings, error: errorMessage(error) };
  }
}

export async function crawlMatches(options: CrawlOptions): Promise<CrawlSummary> {
  const context = syncLogger.startSync(WORKER_NAME, "matches");
  const fetcher = options.fetcher ?? new PageFetcher();
  const concurrency = clampConcurrency(options.concurrency ?? ENV.CRAWL_CONCURRENCY);

  log.info(`Crawling ${options.references.length} matches with ${concurrency} workers`);

  const outcomes = await runPool(options.references, concurrency, async (reference) => {
    const outcome = await processMatch(options.db, fetcher, reference);
    context.recordsProcessed++;
    if (outcome.commit) {
      if (outcome.commit.matchInserted) context.recordsInserted++;
      else context.recordsUpdated++;
    }
    if (outcome.error) {
      context.errors.push(`${outcome.state} ${reference.url}: ${outcome.error}`);
    }
    return outcome;
  });

  const summary: CrawlSummary = {
    total: outcomes.length,
    committed: outcomes.filter((o) => o.state === "Committed").length,
    fetchFailed: outcomes.filter((o) => o.state === "FetchFailed").length,
    parseFailed: outcomes.filter((o) => o.state === "ParseFailed").length,
    commitFailed: outcomes.filter((o) => o.state === "CommitFailed").length,
    warned: outcomes.filter((o) => o.state === "Committed" && o.warnings.length > 0).length,
    status: syncStatus(context),
    outcomes,
  };

  try {
    await syncLogger.endSync(options.db, context, SOURCE);
  } catch (error) {
    log.error(`Could not record run in ingestion_log: ${errorMessage(error)}`);
  }

  return summary;
}
