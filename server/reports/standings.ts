import { and, isNotNull, like, eq } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import { matches, teams } from "../../drizzle/schema";
import type { Executor } from "../db";
import { likePrefix } from "./like-prefix";

export interface StandingRow {
  teamId: number;
  teamName: string;
  played: number;
  wins: number;
  draws: number;
  losses: number;
  goalsFor: number;
  goalsAgainst: number;
  points: number;
}

/**
 * League table for every match whose number starts with `leaguePrefix`
 * (e.g. "2024623H1"). 3 points a win, 1 a draw; unplayed matches are skipped.
 * Sorted by points, then team name.
 */
export async function calculateStandings(db: Executor, leaguePrefix: string): Promise<StandingRow[]> {
  const homeTeam = alias(teams, "home_team");
  const awayTeam = alias(teams, "away_team");

  const results = await db
    .select({
      homeTeamId: matches.homeTeamId,
      homeTeamName: homeTeam.name,
      awayTeamId: matches.awayTeamId,
      awayTeamName: awayTeam.name,
      homeScore: matches.homeScore,
      awayScore: matches.awayScore,
    })
    .from(matches)
    .innerJoin(homeTeam, eq(matches.homeTeamId, homeTeam.teamId))
    .innerJoin(awayTeam, eq(matches.awayTeamId, awayTeam.teamId))
    .where(
      and(
        like(matches.facrGameId, likePrefix(leaguePrefix)),
        isNotNull(matches.homeScore),
        isNotNull(matches.awayScore),
      ),
    );

  const table = new Map<number, StandingRow>();
  const rowFor = (teamId: number, teamName: string): StandingRow => {
    let row = table.get(teamId);
    if (!row) {
      row = { teamId, teamName, played: 0, wins: 0, draws: 0, losses: 0, goalsFor: 0, goalsAgainst: 0, points: 0 };
      table.set(teamId, row);
    }
    return row;
  };

  for (const result of results) {
    if (result.homeScore === null || result.awayScore === null) continue;
    const sides = [
      { row: rowFor(result.homeTeamId, result.homeTeamName), scored: result.homeScore, conceded: result.awayScore },
      { row: rowFor(result.awayTeamId, result.awayTeamName), scored: result.awayScore, conceded: result.homeScore },
    ];
    for (const { row, scored, conceded } of sides) {
      row.played++;
      row.goalsFor += scored;
      row.goalsAgainst += conceded;
      if (scored > conceded) {
        row.wins++;
        row.points += 3;
      } else if (scored === conceded) {
        row.draws++;
        row.points += 1;
      } else {
        row.losses++;
      }
    }
  }

  return Array.from(table.values()).sort(
    (a, b) => b.points - a.points || a.teamName.localeCompare(b.teamName),
  );
}
