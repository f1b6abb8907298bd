import { after, before, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { eq } from "drizzle-orm";
import { matches } from "../../../drizzle/schema";
import type { DatabaseHandle } from "../../db";
import { StorageError } from "../../_core/errors";
import {
  goalLines,
  matchPageHtml,
  openTestDatabase,
  reference,
  resetDatabase,
  storePage,
} from "../../__tests__/fixtures";
import { countTableRows } from "../../reports/table-counts";
import { parseMatch } from "../parsers/match-parser";
import type { ParsedMatch } from "../parsers/match-parser";
import { buildGoalRows, commitMatch } from "../persistence";

const GAME_ID = "2024623H1A0101";
const REF = reference("89d2518d-7f1c/abc123");

describe("buildGoalRows", () => {
  const base: ParsedMatch = parseMatch(matchPageHtml({ timeline: null }));

  it("adds scorer goals to the squad row", () => {
    const match: ParsedMatch = {
      ...base,
      squad: [{ playerName: "Petr Novak", side: "home" }],
      scorers: [{ playerName: "petr novak", side: "home", goals: 2 }],
    };
    const ids = { homeTeamId: 1, awayTeamId: 2, playerIds: new Map([["petr novak", 10]]) };
    assert.deepStrictEqual(buildGoalRows("G1", match, ids), [{ gameId: "G1", playerId: 10, teamId: 1, goalsScored: 2 }]);
  });

  it("refuses a player without an id", () => {
    const match: ParsedMatch = { ...base, scorers: [{ playerName: "Jan Dvorak", side: "away", goals: 1 }] };
    const ids = { homeTeamId: 1, awayTeamId: 2, playerIds: new Map<string, number>() };
    assert.throws(() => buildGoalRows("G1", match, ids), StorageError);
  });
});

describe("commitMatch", () => {
  let handle: DatabaseHandle;

  before(async () => {
    handle = await openTestDatabase();
  });

  after(async () => {
    await handle.close();
  });

  beforeEach(async () => {
    await resetDatabase(handle.db);
  });

  async function storedMatch(gameId: string) {
    const [row] = await handle.db.select().from(matches).where(eq(matches.facrGameId, gameId));
    return row;
  }

  it("stores the match, its teams, players and goals", async () => {
    const result = await storePage(handle.db, matchPageHtml(), REF);

    assert.strictEqual(result.facrGameId, GAME_ID);
    assert.strictEqual(result.usedReferenceId, false);
    assert.strictEqual(result.matchInserted, true);
    assert.deepStrictEqual(result.rowsAffected, {
      teams: 2,
      players: 2,
      matches: 1,
      goalsDeleted: 0,
      goalsInserted: 2,
    });
    assert.strictEqual(result.totalRows, 7);

    const row = await storedMatch(GAME_ID);
    assert.strictEqual(row.competitionId, "2024623H1A");
    assert.strictEqual(row.homeScore, 3);
    assert.strictEqual(row.awayScore, 1);
    assert.strictEqual(row.halftimeScore, "1:0");
    assert.strictEqual(row.venue, "Brno Tuřany UT");
    assert.strictEqual(row.spectators, 120);
    assert.strictEqual(row.sourceUrl, REF.url);
    assert.strictEqual(row.externalRef, "89d2518d-7f1c/abc123");

    assert.deepStrictEqual(await goalLines(handle.db), [
      { player: "Jan Dvorak", team: "FK B", goals: 1 },
      { player: "Petr Novak", team: "FK A", goals: 2 },
    ]);
  });

  it("is idempotent", async () => {
    await storePage(handle.db, matchPageHtml(), REF);
    const again = await storePage(handle.db, matchPageHtml(), REF);

    assert.strictEqual(again.matchInserted, false);
    assert.strictEqual(again.rowsAffected.goalsDeleted, 2);
    assert.strictEqual(again.rowsAffected.goalsInserted, 2);
    assert.deepStrictEqual(await countTableRows(handle.db), { matches: 1, teams: 2, players: 2, goals: 2 });
  });

  it("overwrites the match row on a re-crawl", async () => {
    await storePage(handle.db, matchPageHtml(), REF);
    await storePage(
      handle.db,
      matchPageHtml({
        result: "4:1",
        timeline: [
          { side: "home", name: "Petr Novak" },
          { side: "home", name: "Petr Novak" },
          { side: "home", name: "Petr Novak" },
          { side: "away", name: "Jan Dvorak" },
          { side: "home", name: "Petr Novak" },
        ],
      }),
      REF,
    );

    const row = await storedMatch(GAME_ID);
    assert.strictEqual(row.homeScore, 4);
    assert.deepStrictEqual(await goalLines(handle.db, GAME_ID), [
      { player: "Jan Dvorak", team: "FK B", goals: 1 },
      { player: "Petr Novak", team: "FK A", goals: 4 },
    ]);
  });

  it("replaces goal rows instead of accumulating them", async () => {
    await storePage(handle.db, matchPageHtml(), REF);
    await storePage(
      handle.db,
      matchPageHtml({ result: "0:1", timeline: [{ side: "away", name: "Jan Dvorak" }] }),
      REF,
    );

    assert.deepStrictEqual(await goalLines(handle.db, GAME_ID), [{ player: "Jan Dvorak", team: "FK B", goals: 1 }]);
    assert.deepStrictEqual(await countTableRows(handle.db), { matches: 1, teams: 2, players: 2, goals: 1 });
  });

  it("records squad players with zero goals", async () => {
    await storePage(
      handle.db,
      matchPageHtml({ squads: { home: ["Petr Novak [K]", "Karel Maly"], away: ["Jan Dvorak"] } }),
      REF,
    );

    assert.deepStrictEqual(await goalLines(handle.db, GAME_ID), [
      { player: "Jan Dvorak", team: "FK B", goals: 1 },
      { player: "Karel Maly", team: "FK A", goals: 0 },
      { player: "Petr Novak", team: "FK A", goals: 2 },
    ]);
  });

  it("falls back to the reference id without a match number", async () => {
    const result = await storePage(handle.db, matchPageHtml({ matchNumber: null }), REF);

    assert.strictEqual(result.facrGameId, "89d2518d-7f1c/abc123");
    assert.strictEqual(result.usedReferenceId, true);
    const row = await storedMatch("89d2518d-7f1c/abc123");
    assert.strictEqual(row.competitionId, null);
  });

  it("writes nothing of a match whose commit fails", async () => {
    const parsed = parseMatch(matchPageHtml(), REF.url);
    const broken: ParsedMatch = {
      ...parsed,
      homeScore: 5,
      scorers: parsed.scorers.map((scorer) => ({ ...scorer, goals: -1 })),
    };

    await commitMatch(handle.db, parsed, REF);
    await assert.rejects(commitMatch(handle.db, broken, REF), (error: unknown) => {
      assert.ok(error instanceof StorageError);
      assert.strictEqual(error.message, `Failed to commit match ${GAME_ID} (${REF.url})`);
      return true;
    });

    const row = await storedMatch(GAME_ID);
    assert.strictEqual(row.homeScore, 3);
    assert.deepStrictEqual(await goalLines(handle.db, GAME_ID), [
      { player: "Jan Dvorak", team: "FK B", goals: 1 },
      { player: "Petr Novak", team: "FK A", goals: 2 },
    ]);
  });

  it("leaves no rows at all when the first commit fails", async () => {
    const parsed = parseMatch(matchPageHtml(), REF.url);
    const broken: ParsedMatch = { ...parsed, scorers: parsed.scorers.map((scorer) => ({ ...scorer, goals: -1 })) };

    await assert.rejects(commitMatch(handle.db, broken, REF), StorageError);

    assert.deepStrictEqual(await countTableRows(handle.db), { matches: 0, teams: 0, players: 0, goals: 0 });
  });
});
