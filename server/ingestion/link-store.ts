import fs from "fs";
import { ENV } from "../_core/env";
import { InputError } from "../_core/errors";
import { createLogger } from "../_core/logger";

const log = createLogger("link-store");

// "zapasy/zapas/<id>" optionally followed by one more path segment
const MATCH_REFERENCE_PATTERN = /zapasy\/zapas\/([A-Za-z0-9-]+(?:\/[A-Za-z0-9-]+)?)/g;

export interface MatchReference {
  /** Path tail after `zapasy/zapas/`, used as the dedupe key. */
  externalId: string;
  url: string;
}

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

/**
 * Every match reference embedded in one line of text, in order of appearance.
 * Lines without a reference yield an empty list.
 */
export function extractMatchReferences(line: string, baseUrl: string = ENV.FACR_BASE_URL): MatchReference[] {
  const base = trimTrailingSlash(baseUrl);
  return Array.from(line.matchAll(MATCH_REFERENCE_PATTERN), (match) => ({
    externalId: match[1],
    url: `${base}/zapasy/zapas/${match[1]}`,
  }));
}

export function collectMatchReferences(text: string, baseUrl: string = ENV.FACR_BASE_URL): MatchReference[] {
  const seen = new Set<string>();
  const references: MatchReference[] = [];

  for (const line of text.split(/\r?\n/)) {
    for (const reference of extractMatchReferences(line, baseUrl)) {
      if (seen.has(reference.externalId)) continue;
      seen.add(reference.externalId);
      references.push(reference);
    }
  }

  return references;
}

/**
 * Reads the seed file (typically raw grep output of a competition's listing
 * pages) and returns its distinct match references in first-seen order.
 */
export function loadMatchReferences(filePath: string, baseUrl: string = ENV.FACR_BASE_URL): MatchReference[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf8");
  } catch (error) {
    throw new InputError(`Cannot read games file ${filePath}`, { cause: error });
  }

  const references = collectMatchReferences(text, baseUrl);
  if (references.length === 0) {
    throw new InputError(`No match references found in ${filePath}`);
  }

  log.info(`Loaded ${references.length} match references from ${filePath}`);
  return references;
}
