import type { CheerioAPI } from "cheerio";
import { normalizeNameKey } from "../../_core/normalizers";
import { parseMatchDate } from "./dates";

/**
 * Field extractors for a federation match page. Each one looks at its own
 * part of the document and reports success or failure independently; the
 * match parser decides which failures are fatal.
 */

export type FieldResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export type TeamSide = "home" | "away";

export interface ScorerLine {
  playerName: string;
  side: TeamSide;
  goals: number;
}

export interface SquadEntry {
  playerName: string;
  side: TeamSide;
}

function ok<T>(value: T): FieldResult<T> {
  return { ok: true, value };
}

function fail<T>(reason: string): FieldResult<T> {
  return { ok: false, reason };
}

export function cleanText(value: string): string {
  return value.normalize("NFC").replace(/\s+/g, " ").trim();
}

/** Text of the first match of `selector`, with a space after every element. */
function spacedText($: CheerioAPI, selector: string): string | null {
  const root = $(selector).first();
  if (root.length === 0) return null;
  const copy = root.clone();
  copy.find("*").each((_, element) => {
    $(element).append(" ");
  });
  return cleanText(copy.text());
}

const SCORE_PATTERN = /^(\d{1,2})\s*[:\-–]\s*(\d{1,2})$/;

function parseScore(raw: string): { home: number; away: number } | null {
  const match = cleanText(raw).match(SCORE_PATTERN);
  if (!match) return null;
  return { home: Number(match[1]), away: Number(match[2]) };
}

// ── meta line: "12. 5. 2024 10:00, 3. kolo" ─────────────────────────────────

export function extractMeta($: CheerioAPI): FieldResult<{ dateRaw: string; round: string | null }> {
  const meta = $("h1.Match-meta").first();
  if (meta.length === 0) return fail("meta line (h1.Match-meta) not found");

  const segments = meta
    .contents()
    .map((_, node) => $(node).text())
    .get()
    .flatMap((text) => text.split(","))
    .map(cleanText)
    .filter(Boolean);

  if (segments.length === 0) return fail("meta line is empty");
  return ok({ dateRaw: segments[0], round: segments[1] ?? null });
}

export function extractDate($: CheerioAPI): FieldResult<string> {
  const meta = extractMeta($);
  if (!meta.ok) return meta;
  const date = parseMatchDate(meta.value.dateRaw);
  return date ? ok(date) : fail(`unrecognized date "${meta.value.dateRaw}"`);
}

// Column limits of the matches table
const MAX_ROUND_LENGTH = 100;
const MAX_INT4 = 2147483647;

export function extractRound($: CheerioAPI): FieldResult<string | null> {
  const meta = extractMeta($);
  if (!meta.ok || meta.value.round === null) return ok(null);
  if (meta.value.round.length > MAX_ROUND_LENGTH) {
    return fail(`round longer than ${MAX_ROUND_LENGTH} characters`);
  }
  return ok(meta.value.round);
}

// ── teams ────────────────────────────────────────────────────────────────────

export function extractTeams($: CheerioAPI): FieldResult<{ home: string; away: string }> {
  let names = $(".Match-teams .Match-team a")
    .map((_, element) => cleanText($(element).text()))
    .get()
    .filter(Boolean);

  if (names.length < 2) {
    names = $(".Match-teams .Match-team")
      .map((_, element) => cleanText($(element).text()))
      .get()
      .filter(Boolean);
  }

  if (names.length < 2) return fail("home and away team names not found");
  return ok({ home: names[0], away: names[1] });
}

// ── details block ────────────────────────────────────────────────────────────

export function extractMatchNumber($: CheerioAPI): FieldResult<string> {
  const details = spacedText($, ".Match-detailsContainer");
  if (details === null) return fail("details block not found");
  const match = details.match(/Číslo utkání:\s*([0-9A-Z.]+)/);
  const number = match?.[1].replace(/\.+$/, "");
  return number ? ok(number) : fail("match number not found");
}

/** Competition code: the match number without its trailing round/match sequence. */
export function competitionFromMatchNumber(matchNumber: string): string {
  const match = matchNumber.match(/^(.+?)\d{4}$/);
  return match ? match[1] : matchNumber;
}

export function extractVenue($: CheerioAPI): FieldResult<string | null> {
  const details = spacedText($, ".Match-detailsContainer");
  if (details === null) return ok(null);
  const match = details.match(/Hřiště:\s*(.+?)(?=\s+\p{Lu}\p{Ll}+(?:\s\p{Ll}+)?:|$)/u);
  const venue = match ? match[1].replace(/\.+$/, "").trim() : "";
  return ok(venue || null);
}

export function extractSpectators($: CheerioAPI): FieldResult<number | null> {
  const details = spacedText($, ".Match-detailsContainer");
  if (details === null) return ok(null);
  const match = details.match(/Diváků:\s*(\d+)/);
  if (!match) return ok(null);
  const spectators = Number(match[1]);
  return Number.isSafeInteger(spectators) && spectators <= MAX_INT4 ? ok(spectators) : fail("spectators out of range");
}

// ── result ───────────────────────────────────────────────────────────────────

export function extractFinalScore($: CheerioAPI): FieldResult<{ home: number; away: number }> {
  const node = $(".Match-result strong").first();
  if (node.length === 0) return fail("final score not found");
  const raw = cleanText(node.text());
  const score = parseScore(raw);
  return score ? ok(score) : fail(`malformed final score "${raw}"`);
}

export function extractHalftimeScore($: CheerioAPI): FieldResult<string | null> {
  const node = $(".Match-result p").first();
  if (node.length === 0) return ok(null);
  const raw = cleanText(node.text()).replace(/^\(|\)$/g, "");
  const score = parseScore(raw);
  return score ? ok(`${score.home}:${score.away}`) : fail(`malformed halftime score "${raw}"`);
}

// ── scorers (timeline) ───────────────────────────────────────────────────────

export interface ScorerExtraction {
  scorers: ScorerLine[];
  skipped: string[];
}

/**
 * One timeline item is one goal. Items are grouped per side and normalized
 * player name, keeping the first spelling seen and first-seen order.
 * Items without a usable name are skipped and reported.
 */
export function extractScorers($: CheerioAPI): FieldResult<ScorerExtraction> {
  const scorers: ScorerLine[] = [];
  const skipped: string[] = [];
  const byKey = new Map<string, ScorerLine>();

  $(".MatchTimeline-item").each((index, element) => {
    const item = $(element);
    const name = cleanText(item.find("p").first().text());
    if (!/\p{L}/u.test(name)) {
      skipped.push(`timeline item ${index + 1} has no player name`);
      return;
    }

    const side: TeamSide = item.hasClass("MatchTimeline-item--home") ? "home" : "away";
    const key = `${side}|${normalizeNameKey(name)}`;
    const existing = byKey.get(key);
    if (existing) {
      existing.goals += 1;
      return;
    }

    const line: ScorerLine = { playerName: name, side, goals: 1 };
    byKey.set(key, line);
    scorers.push(line);
  });

  return ok({ scorers, skipped });
}

// ── squads (lineup tables) ───────────────────────────────────────────────────

export function extractSquads($: CheerioAPI, teamNames: { home: string; away: string }): FieldResult<SquadEntry[]> {
  const sections = $(".Match-statsGrid section");
  if (sections.length === 0) return ok([]);

  const homeKey = normalizeNameKey(teamNames.home);
  const awayKey = normalizeNameKey(teamNames.away);
  const squad: SquadEntry[] = [];
  const unmatched: string[] = [];

  sections.each((index, element) => {
    const section = $(element);
    const heading = cleanText(section.find("h2").first().text());
    const headingKey = normalizeNameKey(heading);

    let side: TeamSide | null = null;
    if (headingKey === homeKey) side = "home";
    else if (headingKey === awayKey) side = "away";
    else if (!heading && index < 2) side = index === 0 ? "home" : "away";

    if (!side) {
      unmatched.push(heading || `section ${index + 1}`);
      return;
    }

    const teamSide = side;
    section.find("tbody tr").each((_, row) => {
      const cells = $(row).find("td");
      if (cells.length < 3) return;
      // drop captain/goalkeeper markers such as "[K]"
      const name = cleanText(cells.eq(2).text().replace(/\s*\[.*?\]/g, ""));
      if (name) squad.push({ playerName: name, side: teamSide });
    });
  });

  if (unmatched.length > 0 && squad.length === 0) {
    return fail(`squad sections do not match either team: ${unmatched.join(", ")}`);
  }
  return ok(squad);
}
