import { eq, sql } from "drizzle-orm";
import { goals, matches, players, teams } from "../../drizzle/schema";
import type { InsertGoal } from "../../drizzle/schema";
import type { Database } from "../db";
import { StorageError } from "../_core/errors";
import { EntityNormalizer, cleanName, normalizeNameKey, resolveMatchEntities } from "../_core/normalizers";
import type { ResolvedIds, StableId } from "../_core/normalizers";
import type { MatchReference } from "./link-store";
import type { ParsedMatch } from "./parsers/match-parser";

export interface CommitResult {
  facrGameId: string;
  /** True when the page had no match number and the reference id was used. */
  usedReferenceId: boolean;
  /** False when an existing match row was overwritten. */
  matchInserted: boolean;
  rowsAffected: {
    teams: number;
    players: number;
    matches: number;
    goalsDeleted: number;
    goalsInserted: number;
  };
  totalRows: number;
}

/**
 * Goal rows for a match: every squad player with 0, plus the scorers.
 * One row per player; a name listed for both sides keeps the first team.
 */
export function buildGoalRows(gameId: string, match: ParsedMatch, ids: ResolvedIds): InsertGoal[] {
  const rows = new Map<StableId, InsertGoal>();
  const teamFor = (side: "home" | "away") => (side === "home" ? ids.homeTeamId : ids.awayTeamId);

  const playerIdFor = (name: string): StableId => {
    const id = ids.playerIds.get(normalizeNameKey(name));
    if (id === undefined) {
      throw new StorageError(`Player "${name}" of match ${gameId} was not resolved`);
    }
    return id;
  };

  for (const entry of match.squad) {
    const playerId = playerIdFor(entry.playerName);
    if (!rows.has(playerId)) {
      rows.set(playerId, { gameId, playerId, teamId: teamFor(entry.side), goalsScored: 0 });
    }
  }

  for (const scorer of match.scorers) {
    const playerId = playerIdFor(scorer.playerName);
    const existing = rows.get(playerId);
    if (existing) {
      existing.goalsScored = (existing.goalsScored ?? 0) + scorer.goals;
    } else {
      rows.set(playerId, { gameId, playerId, teamId: teamFor(scorer.side), goalsScored: scorer.goals });
    }
  }

  return Array.from(rows.values());
}

function teamRowsFor(match: ParsedMatch, ids: ResolvedIds) {
  const rows = new Map<StableId, { teamId: number; name: string; nameKey: string }>();
  for (const [teamId, name] of [
    [ids.homeTeamId, match.homeTeam],
    [ids.awayTeamId, match.awayTeam],
  ] as const) {
    if (!rows.has(teamId)) {
      rows.set(teamId, { teamId, name: cleanName(name), nameKey: normalizeNameKey(name) });
    }
  }
  return Array.from(rows.values());
}

function playerRowsFor(match: ParsedMatch, ids: ResolvedIds) {
  const names = new Map<StableId, string>();
  for (const entry of [...match.squad, ...match.scorers]) {
    const playerId = ids.playerIds.get(normalizeNameKey(entry.playerName));
    if (playerId !== undefined && !names.has(playerId)) {
      names.set(playerId, cleanName(entry.playerName));
    }
  }
  return Array.from(names, ([playerId, name]) => ({ playerId, name, nameKey: normalizeNameKey(name) }));
}

/**
 * Writes one parsed match in a single transaction: name resolution for its
 * teams and players, their rows, the match row keyed by facr_game_id
 * (overwritten on conflict), then the match's goal rows replaced wholesale.
 * Nothing is written if any step fails.
 */
export async function commitMatch(db: Database, match: ParsedMatch, reference: MatchReference): Promise<CommitResult> {
  const facrGameId = match.facrGameId ?? reference.externalId;
  const now = new Date();

  try {
    return await db.transaction(async (tx) => {
      const ids = await resolveMatchEntities(new EntityNormalizer(tx), match);
      const playerRows = playerRowsFor(match, ids);
      const goalRows = buildGoalRows(facrGameId, match, ids);

      const upsertedTeams = await tx
        .insert(teams)
        .values(teamRowsFor(match, ids))
        .onConflictDoUpdate({
          target: teams.teamId,
          set: { name: sql`excluded.name`, updatedAt: now },
        })
        .returning({ id: teams.teamId });

      let upsertedPlayers: { id: number }[] = [];
      if (playerRows.length > 0) {
        upsertedPlayers = await tx
          .insert(players)
          .values(playerRows)
          .onConflictDoUpdate({
            target: players.playerId,
            set: { name: sql`excluded.name`, updatedAt: now },
          })
          .returning({ id: players.playerId });
      }

      const matchRecord = {
        facrGameId,
        competitionId: match.competitionId,
        date: match.date,
        round: match.round,
        homeTeamId: ids.homeTeamId,
        awayTeamId: ids.awayTeamId,
        homeScore: match.homeScore,
        awayScore: match.awayScore,
        halftimeScore: match.halftimeScore,
        venue: match.venue,
        spectators: match.spectators,
        sourceUrl: reference.url,
        externalRef: reference.externalId,
      };

      const upsertedMatches = await tx
        .insert(matches)
        .values(matchRecord)
        .onConflictDoUpdate({
          target: matches.facrGameId,
          set: { ...matchRecord, updatedAt: now },
        })
        // xmax is 0 only for rows created by this statement
        .returning({ id: matches.facrGameId, inserted: sql<boolean>`(xmax = 0)` });

      const deletedGoals = await tx
        .delete(goals)
        .where(eq(goals.gameId, facrGameId))
        .returning({ id: goals.goalId });

      let insertedGoals: { id: number }[] = [];
      if (goalRows.length > 0) {
        insertedGoals = await tx.insert(goals).values(goalRows).returning({ id: goals.goalId });
      }

      const rowsAffected = {
        teams: upsertedTeams.length,
        players: upsertedPlayers.length,
        matches: upsertedMatches.length,
        goalsDeleted: deletedGoals.length,
        goalsInserted: insertedGoals.length,
      };

      return {
        facrGameId,
        usedReferenceId: match.facrGameId === null,
        matchInserted: upsertedMatches[0]?.inserted === true,
        rowsAffected,
        totalRows: Object.values(rowsAffected).reduce((sum, value) => sum + value, 0),
      };
    });
  } catch (error) {
    throw new StorageError(`Failed to commit match ${facrGameId} (${reference.url})`, { cause: error });
  }
}
