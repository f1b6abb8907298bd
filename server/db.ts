import fs from "fs";
import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import type { PgliteDatabase, PgliteQueryResultHKT } from "drizzle-orm/pglite";
import type { PgDatabase } from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import * as schema from "../drizzle/schema";
import { ENV } from "./_core/env";
import { StorageError } from "./_core/errors";
import { createLogger } from "./_core/logger";

const log = createLogger("db");

export const IN_MEMORY = "memory://";

export type Database = PgliteDatabase<typeof schema>;

/** A database or an open transaction on it. */
export type Executor = PgDatabase<PgliteQueryResultHKT, typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close(): Promise<void>;
}

// Each entry is sent as its own statement; PGlite runs one per query.
const SCHEMA_DDL = [
  `DO $$
  BEGIN
    IF NOT EXISTS (SELECT 1 FROM pg_type WHERE typname = 'ingestion_status') THEN
      CREATE TYPE ingestion_status AS ENUM ('success', 'failure', 'partial');
    END IF;
  END $$;`,
  `CREATE TABLE IF NOT EXISTS teams (
    team_id      SERIAL PRIMARY KEY,
    name         VARCHAR(255) NOT NULL,
    name_key     VARCHAR(255) NOT NULL UNIQUE,
    external_ref VARCHAR(255),
    created_at   TIMESTAMP NOT NULL DEFAULT now(),
    updated_at   TIMESTAMP NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS players (
    player_id    SERIAL PRIMARY KEY,
    name         VARCHAR(255) NOT NULL,
    name_key     VARCHAR(255) NOT NULL UNIQUE,
    external_ref VARCHAR(255),
    created_at   TIMESTAMP NOT NULL DEFAULT now(),
    updated_at   TIMESTAMP NOT NULL DEFAULT now()
  )`,
  `CREATE TABLE IF NOT EXISTS matches (
    facr_game_id   VARCHAR(255) PRIMARY KEY,
    competition_id VARCHAR(255),
    date           DATE,
    round          VARCHAR(100),
    home_team_id   INTEGER NOT NULL REFERENCES teams(team_id),
    away_team_id   INTEGER NOT NULL REFERENCES teams(team_id),
    home_score     INTEGER,
    away_score     INTEGER,
    halftime_score VARCHAR(20),
    venue          TEXT,
    spectators     INTEGER,
    source_url     TEXT,
    external_ref   VARCHAR(255),
    created_at     TIMESTAMP NOT NULL DEFAULT now(),
    updated_at     TIMESTAMP NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS matches_competition_idx ON matches (competition_id)`,
  `CREATE TABLE IF NOT EXISTS goals (
    goal_id      SERIAL PRIMARY KEY,
    game_id      VARCHAR(255) NOT NULL REFERENCES matches(facr_game_id) ON DELETE CASCADE,
    player_id    INTEGER NOT NULL REFERENCES players(player_id),
    team_id      INTEGER NOT NULL REFERENCES teams(team_id),
    goals_scored INTEGER NOT NULL DEFAULT 0 CHECK (goals_scored >= 0),
    CONSTRAINT goals_game_player_unique UNIQUE (game_id, player_id)
  )`,
  `CREATE INDEX IF NOT EXISTS goals_player_idx ON goals (player_id)`,
  `CREATE TABLE IF NOT EXISTS ingestion_log (
    id                SERIAL PRIMARY KEY,
    source            VARCHAR(100) NOT NULL,
    entity_type       VARCHAR(100) NOT NULL,
    status            ingestion_status NOT NULL,
    records_processed INTEGER NOT NULL DEFAULT 0,
    error_message     TEXT,
    started_at        TIMESTAMP NOT NULL,
    completed_at      TIMESTAMP,
    created_at        TIMESTAMP NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS ingestion_log_source_idx ON ingestion_log (source)`,
  `CREATE INDEX IF NOT EXISTS ingestion_log_started_at_idx ON ingestion_log (started_at)`,
];

export async function ensureSchema(db: Database): Promise<void> {
  for (const statement of SCHEMA_DDL) {
    await db.execute(sql.raw(statement));
  }
}

/**
 * Opens the local store (a PGlite data directory, or `memory://`) and makes
 * sure every table exists. Any failure surfaces as a StorageError.
 */
export async function openDatabase(dataDir: string = ENV.DATABASE_DIR): Promise<DatabaseHandle> {
  let client: PGlite | null = null;
  try {
    if (dataDir !== IN_MEMORY) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    client = new PGlite(dataDir);
    await client.waitReady;
    const db = drizzle(client, { schema });
    await ensureSchema(db);
    log.debug(`Opened database at ${dataDir}`);

    const opened = client;
    return { db, close: () => opened.close() };
  } catch (error) {
    if (client) {
      await client.close().catch((closeError: unknown) => {
        log.warn(`Could not close database after failed open: ${String(closeError)}`);
      });
    }
    throw new StorageError(`Unable to open database at ${dataDir}`, { cause: error });
  }
}
