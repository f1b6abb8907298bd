#!/usr/bin/env node
import process from "process";
import { openDatabase } from "./db";
import type { DatabaseHandle } from "./db";
import { ENV } from "./_core/env";
import { InputError, StorageError, errorMessage } from "./_core/errors";
import { createLogger } from "./_core/logger";
import { loadMatchReferences } from "./ingestion/link-store";
import { PageFetcher } from "./ingestion/page-fetcher";
import type { HtmlSource } from "./ingestion/page-fetcher";
import { calculateStandings } from "./reports/standings";
import { countTableRows } from "./reports/table-counts";
import { getTopScorers } from "./reports/top-scorers";
import { crawlMatches } from "./workers/matches-crawl";
import type { CrawlSummary } from "./workers/matches-crawl";

const log = createLogger("cli");

export const EXIT_OK = 0;
export const EXIT_INPUT = 1;
export const EXIT_STORAGE = 2;

// ── CLI Argument Parsing ──

export interface CliArgs {
  command: string;
  gamesUrl?: string;
  concurrency?: number;
  leagueId?: string;
  teamId?: number;
  limit?: number;
  dbDir?: string;
  help: boolean;
}

export class UsageError extends Error {}

function parsePositiveInteger(flag: string, raw: string | undefined): number {
  const value = raw === undefined ? NaN : parseInt(raw, 10);
  if (!Number.isFinite(value)) {
    throw new UsageError(`${flag} expects a number`);
  }
  if (value < 1) {
    throw new UsageError(`${flag} expects a positive number`);
  }
  return value;
}

function requireValue(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith("--")) {
    throw new UsageError(`${flag} expects a value`);
  }
  return raw;
}

export function parseArgs(argv: string[]): CliArgs {
  const result: CliArgs = { command: argv[0] ?? "", help: false };

  for (let i = 1; i < argv.length; i++) {
    switch (argv[i]) {
      case "--games-url":
        result.gamesUrl = requireValue("--games-url", argv[++i]);
        break;
      case "--concurrency":
        result.concurrency = parsePositiveInteger("--concurrency", argv[++i]);
        break;
      case "--league-id":
        result.leagueId = requireValue("--league-id", argv[++i]);
        break;
      case "--team-id":
        result.teamId = parsePositiveInteger("--team-id", argv[++i]);
        break;
      case "--limit":
        result.limit = parsePositiveInteger("--limit", argv[++i]);
        break;
      case "--db":
        result.dbDir = requireValue("--db", argv[++i]);
        break;
      case "--help":
        result.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${argv[i]}`);
    }
  }

  if (result.command === "--help") {
    result.help = true;
  }
  return result;
}

export const USAGE = [
  "Usage: facr-crawler <command> [options]",
  "",
  "Commands:",
  "  crawl --games-url <path> [--concurrency <n>]   Fetch and store every match listed in <path>",
  "  standings --league-id <prefix>                  League table for matches numbered <prefix>…",
  "  scorers --league-id <prefix> [--team-id <id>] [--limit <n>]",
  "                                                  Top scorers with goals and games",
  "  counts                                          Row counts of matches, teams, players, goals",
  "",
  "Options:",
  `  --db <dir>   Database directory (default ${ENV.DATABASE_DIR})`,
  "  --help       Show this message",
].join("\n");

// ── Output ──

export interface CliOutput {
  print(line: string): void;
}

const consoleOutput: CliOutput = {
  print: (line) => console.log(line),
};

function printSummary(out: CliOutput, summary: CrawlSummary) {
  out.print(
    `Run complete (${summary.status}). Matches: ${summary.total}, committed: ${summary.committed}, ` +
      `warned: ${summary.warned}, failed: ${summary.fetchFailed + summary.parseFailed + summary.commitFailed} ` +
      `(fetch ${summary.fetchFailed}, parse ${summary.parseFailed}, commit ${summary.commitFailed})`,
  );
}

// ── Commands ──

export interface CliDependencies {
  openDatabase(dataDir: string): Promise<DatabaseHandle>;
  createFetcher(): HtmlSource;
  output: CliOutput;
}

const defaultDependencies: CliDependencies = {
  openDatabase,
  createFetcher: () => new PageFetcher(),
  output: consoleOutput,
};

async function withDatabase(
  deps: CliDependencies,
  dataDir: string,
  action: (handle: DatabaseHandle) => Promise<void>,
): Promise<void> {
  const handle = await deps.openDatabase(dataDir);
  try {
    await action(handle);
  } finally {
    await handle.close();
  }
}

async function runCommand(args: CliArgs, deps: CliDependencies): Promise<void> {
  const dataDir = args.dbDir ?? ENV.DATABASE_DIR;
  const out = deps.output;

  switch (args.command) {
    case "crawl": {
      if (!args.gamesUrl) throw new UsageError("crawl requires --games-url <path>");
      const references = loadMatchReferences(args.gamesUrl);
      await withDatabase(deps, dataDir, async ({ db }) => {
        const summary = await crawlMatches({
          db,
          references,
          fetcher: deps.createFetcher(),
          concurrency: args.concurrency,
        });
        printSummary(out, summary);
      });
      return;
    }

    case "standings": {
      const leagueId = args.leagueId;
      if (!leagueId) throw new UsageError("standings requires --league-id <prefix>");
      await withDatabase(deps, dataDir, async ({ db }) => {
        const rows = await calculateStandings(db, leagueId);
        out.print(`Standings for league_id LIKE '${leagueId}%'`);
        for (const row of rows) {
          out.print(`${row.teamName.padEnd(25)} ${String(row.points).padStart(3)} pts`);
        }
      });
      return;
    }

    case "scorers": {
      const leagueId = args.leagueId;
      if (!leagueId) throw new UsageError("scorers requires --league-id <prefix>");
      await withDatabase(deps, dataDir, async ({ db }) => {
        const rows = await getTopScorers(db, { leaguePrefix: leagueId, teamId: args.teamId, limit: args.limit });
        out.print(`${"Player Name".padEnd(30)} ${"Team Name".padEnd(36)} ${"Goals".padStart(5)} ${"Games".padStart(6)}`);
        out.print("-".repeat(80));
        for (const row of rows) {
          out.print(
            `${row.playerName.padEnd(30)} ${row.teamName.padEnd(36)} ` +
              `${String(row.totalGoals).padStart(5)} ${String(row.totalGames).padStart(6)}`,
          );
        }
      });
      return;
    }

    case "counts": {
      await withDatabase(deps, dataDir, async ({ db }) => {
        const counts = await countTableRows(db);
        for (const [table, value] of Object.entries(counts)) {
          out.print(`${table}: ${value}`);
        }
      });
      return;
    }

    default:
      throw new UsageError(args.command ? `Unknown command: ${args.command}` : "Missing command");
  }
}

/**
 * Runs one CLI invocation and returns its exit code. Per-match crawl failures
 * do not change the code; a bad seed file or arguments give 1, a store that
 * cannot be opened gives 2.
 */
export async function runCli(argv: string[], overrides: Partial<CliDependencies> = {}): Promise<number> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides };

  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    log.error(errorMessage(error));
    deps.output.print(USAGE);
    return EXIT_INPUT;
  }

  if (args.help) {
    deps.output.print(USAGE);
    return EXIT_OK;
  }

  try {
    await runCommand(args, deps);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(error.message);
      deps.output.print(USAGE);
      return EXIT_INPUT;
    }
    if (error instanceof InputError) {
      log.error(error.message);
      return EXIT_INPUT;
    }
    if (error instanceof StorageError) {
      log.error(`${error.message}: ${errorMessage(error.cause)}`);
      return EXIT_STORAGE;
    }
    throw error;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      log.error("Fatal error:", error);
      process.exitCode = 1;
    });
}
