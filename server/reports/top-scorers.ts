import { and, asc, countDistinct, desc, eq, like, sql } from "drizzle-orm";
import { goals, players, teams } from "../../drizzle/schema";
import type { Executor } from "../db";
import { likePrefix } from "./like-prefix";

export interface TopScorerQuery {
  leaguePrefix: string;
  teamId?: number;
  limit?: number;
}

export interface TopScorerRow {
  playerId: number;
  playerName: string;
  /** Every team the player has a goal row for, in name order. */
  teamName: string;
  totalGoals: number;
  totalGames: number;
}

/**
 * Goals and appearances per player in one competition. Appearances count
 * zero-goal squad rows too. A player who turned out for two teams gets one row.
 */
export async function getTopScorers(db: Executor, query: TopScorerQuery): Promise<TopScorerRow[]> {
  const totalGoals = sql<number>`coalesce(sum(${goals.goalsScored}), 0)`.mapWith(Number);
  const teamNames = sql<string>`string_agg(distinct ${teams.name}, ', ' order by ${teams.name})`;

  const conditions = [like(goals.gameId, likePrefix(query.leaguePrefix))];
  if (query.teamId !== undefined) {
    conditions.push(eq(goals.teamId, query.teamId));
  }

  const base = db
    .select({
      playerId: players.playerId,
      playerName: players.name,
      teamName: teamNames,
      totalGoals,
      totalGames: countDistinct(goals.gameId),
    })
    .from(goals)
    .innerJoin(players, eq(goals.playerId, players.playerId))
    .innerJoin(teams, eq(goals.teamId, teams.teamId))
    .where(and(...conditions))
    .groupBy(players.playerId, players.name)
    .orderBy(desc(totalGoals), asc(players.name));

  return query.limit !== undefined ? await base.limit(query.limit) : await base;
}
