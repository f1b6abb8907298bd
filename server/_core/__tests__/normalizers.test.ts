import { after, before, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import type { DatabaseHandle } from "../../db";
import { openTestDatabase, resetDatabase } from "../../__tests__/fixtures";
import { EntityNormalizer, cleanName, normalizeNameKey, resolveMatchEntities } from "../normalizers";
import type { ParsedMatch } from "../../ingestion/parsers/match-parser";

describe("normalizeNameKey", () => {
  it("collapses whitespace and lower-cases", () => {
    assert.strictEqual(normalizeNameKey("  Petr  NOVÁK \n"), "petr novák");
  });

  it("keeps diacritics", () => {
    assert.notStrictEqual(normalizeNameKey("Novák"), normalizeNameKey("Novak"));
  });

  it("composes decomposed characters", () => {
    assert.strictEqual(normalizeNameKey("Nova\u0301k"), "novák");
  });

  it("cleanName keeps letter case", () => {
    assert.strictEqual(cleanName("  Jan   Dvořák "), "Jan Dvořák");
  });
});

describe("EntityNormalizer", () => {
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

  it("returns the same id for the same name", async () => {
    const normalizer = new EntityNormalizer(handle.db);
    const first = await normalizer.resolve("John Smith", "player");
    const second = await normalizer.resolve("John Smith", "player");
    assert.strictEqual(second, first);
  });

  it("ignores case and surrounding whitespace", async () => {
    const normalizer = new EntityNormalizer(handle.db);
    const first = await normalizer.resolve("John Smith", "player");
    assert.strictEqual(await normalizer.resolve("john smith", "player"), first);
    assert.strictEqual(await normalizer.resolve("  John   Smith ", "player"), first);
  });

  it("allocates a new id for a different spelling", async () => {
    const normalizer = new EntityNormalizer(handle.db);
    const john = await normalizer.resolve("John Smith", "player");
    const jon = await normalizer.resolve("Jon Smith", "player");
    assert.notStrictEqual(jon, john);
  });

  it("keeps teams and players apart", async () => {
    const normalizer = new EntityNormalizer(handle.db);
    await normalizer.resolve("Slavia", "player");
    const team = await normalizer.resolve("Slavia", "team");
    assert.strictEqual(await normalizer.resolve("SLAVIA", "team"), team);

    const rows = await handle.db.query.teams.findMany();
    assert.deepStrictEqual(
      rows.map((row) => ({ name: row.name, nameKey: row.nameKey })),
      [{ name: "Slavia", nameKey: "slavia" }],
    );
  });

  it("stores the first spelling as the display name", async () => {
    const normalizer = new EntityNormalizer(handle.db);
    await normalizer.resolve("Petr Novák", "player");
    await normalizer.resolve("PETR NOVÁK", "player");
    const rows = await handle.db.query.players.findMany();
    assert.deepStrictEqual(
      rows.map((row) => row.name),
      ["Petr Novák"],
    );
  });

  it("rejects an empty name", async () => {
    const normalizer = new EntityNormalizer(handle.db);
    await assert.rejects(normalizer.resolve("   ", "team"), /empty team name/);
  });

  it("resolves every team and player of a match", async () => {
    const match: ParsedMatch = {
      facrGameId: "2024623H1A0101",
      competitionId: "2024623H1A",
      date: "2024-05-12",
      round: "3. kolo",
      homeTeam: "FK A",
      awayTeam: "FK B",
      homeScore: 1,
      awayScore: 0,
      halftimeScore: null,
      venue: null,
      spectators: null,
      scorers: [{ playerName: "Petr Novak", side: "home", goals: 1 }],
      squad: [
        { playerName: "petr novak", side: "home" },
        { playerName: "Jan Dvorak", side: "away" },
      ],
      warnings: [],
    };

    const ids = await resolveMatchEntities(new EntityNormalizer(handle.db), match);

    assert.notStrictEqual(ids.homeTeamId, ids.awayTeamId);
    assert.deepStrictEqual(Array.from(ids.playerIds.keys()), ["petr novak", "jan dvorak"]);
    const players = await handle.db.query.players.findMany();
    assert.strictEqual(players.length, 2);
  });
});
