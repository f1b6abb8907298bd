import { count } from "drizzle-orm";
import { goals, matches, players, teams } from "../../drizzle/schema";
import type { Executor } from "../db";

export interface TableCounts {
  matches: number;
  teams: number;
  players: number;
  goals: number;
}

export async function countTableRows(db: Executor): Promise<TableCounts> {
  const [[matchCount], [teamCount], [playerCount], [goalCount]] = await Promise.all([
    db.select({ value: count() }).from(matches),
    db.select({ value: count() }).from(teams),
    db.select({ value: count() }).from(players),
    db.select({ value: count() }).from(goals),
  ]);
  return {
    matches: matchCount.value,
    teams: teamCount.value,
    players: playerCount.value,
    goals: goalCount.value,
  };
}
