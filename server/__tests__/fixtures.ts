import { asc, eq, sql } from "drizzle-orm";
import { goals, players, teams } from "../../drizzle/schema";
import { IN_MEMORY, openDatabase } from "../db";
import type { Database, DatabaseHandle } from "../db";
import type { HtmlSource } from "../ingestion/page-fetcher";
import type { MatchReference } from "../ingestion/link-store";
import { parseMatch } from "../ingestion/parsers/match-parser";
import { commitMatch } from "../ingestion/persistence";
import type { CommitResult } from "../ingestion/persistence";

export const BASE_URL = "https://example.test/souteze";

export function reference(externalId: string): MatchReference {
  return { externalId, url: `${BASE_URL}/zapasy/zapas/${externalId}` };
}

export async function openTestDatabase(): Promise<DatabaseHandle> {
  return openDatabase(IN_MEMORY);
}

export async function resetDatabase(db: Database): Promise<void> {
  await db.execute(sql.raw("TRUNCATE goals, matches, players, teams, ingestion_log RESTART IDENTITY CASCADE"));
}

export async function storePage(db: Database, html: string, ref: MatchReference): Promise<CommitResult> {
  return commitMatch(db, parseMatch(html, ref.url), ref);
}

export interface GoalLine {
  player: string;
  team: string;
  goals: number;
}

/** Goal rows, of one match when `gameId` is given, ordered by player. */
export async function goalLines(db: Database, gameId?: string): Promise<GoalLine[]> {
  return db
    .select({ player: players.name, team: teams.name, goals: goals.goalsScored })
    .from(goals)
    .innerJoin(players, eq(goals.playerId, players.playerId))
    .innerJoin(teams, eq(goals.teamId, teams.teamId))
    .where(gameId === undefined ? undefined : eq(goals.gameId, gameId))
    .orderBy(asc(players.name), asc(teams.name));
}

export interface TimelineGoal {
  side: "home" | "away";
  name: string;
}

export interface MatchPageOptions {
  meta?: string | null;
  home?: string;
  away?: string;
  result?: string | null;
  halftime?: string | null;
  matchNumber?: string | null;
  venue?: string | null;
  spectators?: number | null;
  timeline?: TimelineGoal[] | null;
  squads?: { home: string[]; away: string[] } | null;
}

/** A match page shaped like the federation's markup. */
export function matchPageHtml(options: MatchPageOptions = {}): string {
  const meta = options.meta === undefined ? "12. 5. 2024 10:00, 3. kolo" : options.meta;
  const home = options.home ?? "FK A";
  const away = options.away ?? "FK B";
  const result = options.result === undefined ? "3:1" : options.result;
  const halftime = options.halftime === undefined ? "(1:0)" : options.halftime;
  const matchNumber = options.matchNumber === undefined ? "2024623H1A0101" : options.matchNumber;
  const venue = options.venue === undefined ? "Brno Tuřany UT" : options.venue;
  const spectators = options.spectators === undefined ? 120 : options.spectators;
  const timeline =
    options.timeline === undefined
      ? [
          { side: "home" as const, name: "Petr Novak" },
          { side: "away" as const, name: "Jan Dvorak" },
          { side: "home" as const, name: "Petr Novak" },
        ]
      : options.timeline;

  const parts: string[] = ["<html><head><meta charset=\"utf-8\"></head><body>"];
  if (meta !== null) parts.push(`<h1 class="Match-meta">${meta}</h1>`);

  parts.push('<div class="Match-teams">');
  if (home) parts.push(`<div class="Match-team"><a href="/club/home">${home}</a></div>`);
  if (result !== null || halftime !== null) {
    parts.push('<div class="Match-result">');
    if (result !== null) parts.push(`<strong>${result}</strong>`);
    if (halftime !== null) parts.push(`<p>${halftime}</p>`);
    parts.push("</div>");
  }
  if (away) parts.push(`<div class="Match-team"><a href="/club/away">${away}</a></div>`);
  parts.push("</div>");

  const details: string[] = [];
  if (matchNumber !== null) details.push(`<p><strong>Číslo utkání:</strong> ${matchNumber}</p>`);
  if (venue !== null) details.push(`<p>Hřiště: ${venue}</p>`);
  if (spectators !== null) details.push(`<p>Diváků: ${spectators}</p>`);
  parts.push(`<div class="Match-detailsContainer">${details.join("")}</div>`);

  if (timeline !== null) {
    parts.push('<ul class="MatchTimeline">');
    timeline.forEach((goal, index) => {
      parts.push(
        `<li class="MatchTimeline-item MatchTimeline-item--${goal.side}"><span>${10 + index * 10}'</span><p>${goal.name}</p></li>`,
      );
    });
    parts.push("</ul>");
  }

  if (options.squads) {
    parts.push('<div class="Match-statsGrid">');
    for (const [teamName, names] of [
      [home, options.squads.home],
      [away, options.squads.away],
    ] as const) {
      const rows = names.map((name, index) => `<tr><td>${index + 1}</td><td>Z</td><td>${name}</td></tr>`).join("");
      parts.push(`<section><h2>${teamName}</h2><table><tbody>${rows}</tbody></table></section>`);
    }
    parts.push("</div>");
  }

  parts.push("</body></html>");
  return parts.join("\n");
}

/** In-process page source: known URLs return HTML, a thrown error fails the fetch. */
export function stubPages(pages: Record<string, string | Error>): HtmlSource & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async fetch(url: string) {
      calls.push(url);
      const page = pages[url];
      if (page === undefined) throw new Error(`No stub page for ${url}`);
      if (page instanceof Error) throw page;
      return page;
    },
  };
}
