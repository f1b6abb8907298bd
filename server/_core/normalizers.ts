/**
 * Name normalization layer
 *
 * Maps free-text team and player names from match pages to stable integer ids
 * stored in the `teams` and `players` tables. Matching is exact on the
 * normalized key (case and whitespace only): "Novák" and "Novak" stay two
 * different players.
 */

import { eq } from "drizzle-orm";
import { players, teams } from "../../drizzle/schema";
import type { Executor } from "../db";
import type { ParsedMatch } from "../ingestion/parsers/match-parser";
import { StorageError } from "./errors";

export type EntityKind = "team" | "player";
export type StableId = number;

export interface ResolvedIds {
  homeTeamId: StableId;
  awayTeamId: StableId;
  /** Player ids keyed by normalized name. */
  playerIds: Map<string, StableId>;
}

export function cleanName(name: string): string {
  return name.normalize("NFC").replace(/\s+/g, " ").trim();
}

/**
 * Lookup key for a name: NFC, trimmed, inner whitespace collapsed, lower-cased.
 */
export function normalizeNameKey(name: string): string {
  return cleanName(name).toLowerCase();
}

export class EntityNormalizer {
  constructor(private readonly db: Executor) {}

  /**
   * Returns the id of the entity whose normalized name equals `name`'s,
   * allocating a new row when none exists. Every call goes to the store.
   */
  async resolve(name: string, kind: EntityKind): Promise<StableId> {
    const displayName = cleanName(name);
    const nameKey = normalizeNameKey(name);
    if (!nameKey) {
      throw new Error(`Cannot resolve an empty ${kind} name`);
    }
    return kind === "team" ? this.resolveTeam(displayName, nameKey) : this.resolvePlayer(displayName, nameKey);
  }

  private async resolveTeam(name: string, nameKey: string): Promise<StableId> {
    const [inserted] = await this.db
      .insert(teams)
      .values({ name, nameKey })
      .onConflictDoNothing({ target: teams.nameKey })
      .returning({ id: teams.teamId });
    if (inserted) return inserted.id;

    const [existing] = await this.db
      .select({ id: teams.teamId })
      .from(teams)
      .where(eq(teams.nameKey, nameKey))
      .limit(1);
    if (!existing) {
      throw new StorageError(`Team "${name}" was neither inserted nor found`);
    }
    return existing.id;
  }

  private async resolvePlayer(name: string, nameKey: string): Promise<StableId> {
    const [inserted] = await this.db
      .insert(players)
      .values({ name, nameKey })
      .onConflictDoNothing({ target: players.nameKey })
      .returning({ id: players.playerId });
    if (inserted) return inserted.id;

    const [existing] = await this.db
      .select({ id: players.playerId })
      .from(players)
      .where(eq(players.nameKey, nameKey))
      .limit(1);
    if (!existing) {
      throw new StorageError(`Player "${name}" was neither inserted nor found`);
    }
    return existing.id;
  }
}

/**
 * Resolves both teams and every scorer and squad player of a parsed match.
 */
export async function resolveMatchEntities(normalizer: EntityNormalizer, match: ParsedMatch): Promise<ResolvedIds> {
  const homeTeamId = await normalizer.resolve(match.homeTeam, "team");
  const awayTeamId = await normalizer.resolve(match.awayTeam, "team");

  const playerIds = new Map<string, StableId>();
  const names = [...match.squad, ...match.scorers].map((entry) => entry.playerName);
  for (const name of names) {
    const key = normalizeNameKey(name);
    if (playerIds.has(key)) continue;
    playerIds.set(key, await normalizer.resolve(name, "player"));
  }

  return { homeTeamId, awayTeamId, playerIds };
}
