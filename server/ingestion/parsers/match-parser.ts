import * as cheerio from "cheerio";
import { ParseError } from "../../_core/errors";
import type { PartialParseWarning } from "../../_core/errors";
import {
  competitionFromMatchNumber,
  extractDate,
  extractFinalScore,
  extractHalftimeScore,
  extractMatchNumber,
  extractRound,
  extractScorers,
  extractSpectators,
  extractSquads,
  extractTeams,
  extractVenue,
} from "./extractors";
import type { FieldResult, ScorerLine, SquadEntry } from "./extractors";

export type { ScorerLine, SquadEntry, TeamSide } from "./extractors";

export interface ParsedMatch {
  facrGameId: string | null;
  competitionId: string | null;
  date: string | null;
  round: string | null;
  homeTeam: string;
  awayTeam: string;
  homeScore: number | null;
  awayScore: number | null;
  halftimeScore: string | null;
  venue: string | null;
  spectators: number | null;
  scorers: ScorerLine[];
  squad: SquadEntry[];
  warnings: PartialParseWarning[];
}

/**
 * Turns one match page into a ParsedMatch.
 *
 * Only the team names are mandatory: without them the page is unusable and a
 * ParseError is thrown. Every other field that cannot be read is left null and
 * reported in `warnings`.
 */
export function parseMatch(html: string, sourceUrl?: string): ParsedMatch {
  const $ = cheerio.load(html);
  const warnings: PartialParseWarning[] = [];

  function optional<T>(field: string, result: FieldResult<T>, fallback: T): T {
    if (result.ok) return result.value;
    warnings.push({ field, message: result.reason });
    return fallback;
  }

  const teams = extractTeams($);
  if (!teams.ok) {
    throw new ParseError(`Unusable match page${sourceUrl ? ` ${sourceUrl}` : ""}: ${teams.reason}`, { url: sourceUrl });
  }

  const facrGameId = optional<string | null>("matchNumber", extractMatchNumber($), null);
  const score = optional<{ home: number; away: number } | null>("finalScore", extractFinalScore($), null);
  const scorers = optional("scorers", extractScorers($), { scorers: [], skipped: [] });
  for (const reason of scorers.skipped) {
    warnings.push({ field: "scorers", message: reason });
  }

  return {
    facrGameId,
    competitionId: facrGameId ? competitionFromMatchNumber(facrGameId) : null,
    date: optional<string | null>("date", extractDate($), null),
    round: optional("round", extractRound($), null),
    homeTeam: teams.value.home,
    awayTeam: teams.value.away,
    homeScore: score ? score.home : null,
    awayScore: score ? score.away : null,
    halftimeScore: optional("halftimeScore", extractHalftimeScore($), null),
    venue: optional("venue", extractVenue($), null),
    spectators: optional("spectators", extractSpectators($), null),
    scorers: scorers.scorers,
    squad: optional("squad", extractSquads($, teams.value), []),
    warnings,
  };
}
