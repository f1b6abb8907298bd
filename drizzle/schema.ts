import { pgTable, pgEnum, serial, text, timestamp, varchar, date, integer, index, unique } from "drizzle-orm/pg-core";

/**
 * Match crawler database schema
 *
 * Four core tables hold what the crawler extracts from federation match pages:
 * - teams, players: name-keyed entities with internally allocated ids
 * - matches: one row per federation match number (facr_game_id)
 * - goals: per-player goal counts for a match, including zero-goal squad rows
 *
 * ingestion_log keeps one row per crawl run.
 */


// ============================================================================
// ENUMS (must be defined before tables in PostgreSQL)
// ============================================================================

export const ingestionStatusEnum = pgEnum("ingestion_status", ["success", "failure", "partial"]);

// ============================================================================
// CORE ENTITIES
// ============================================================================

export const teams = pgTable("teams", {
  teamId: serial("team_id").primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  nameKey: varchar("name_key", { length: 255 }).notNull().unique(), // case/whitespace-normalized name
  externalRef: varchar("external_ref", { length: 255 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

export const players = pgTable("players", {
  playerId: serial("player_id").primaryKey(),
  name: varchar("name", { length: 255 }).notNull(),
  nameKey: varchar("name_key", { length: 255 }).notNull().unique(),
  externalRef: varchar("external_ref", { length: 255 }),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
});

// ============================================================================
// MATCHES & GOALS
// ============================================================================

export const matches = pgTable("matches", {
  facrGameId: varchar("facr_game_id", { length: 255 }).primaryKey(),
  competitionId: varchar("competition_id", { length: 255 }),
  date: date("date", { mode: "string" }),
  round: varchar("round", { length: 100 }),
  homeTeamId: integer("home_team_id").references(() => teams.teamId).notNull(),
  awayTeamId: integer("away_team_id").references(() => teams.teamId).notNull(),
  homeScore: integer("home_score"),
  awayScore: integer("away_score"),
  halftimeScore: varchar("halftime_score", { length: 20 }), // e.g. "1:0"
  venue: text("venue"),
  spectators: integer("spectators"),
  sourceUrl: text("source_url"),
  externalRef: varchar("external_ref", { length: 255 }), // path tail of the match page
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull(),
}, (table) => ({
  competitionIdx: index("matches_competition_idx").on(table.competitionId),
}));

export const goals = pgTable("goals", {
  goalId: serial("goal_id").primaryKey(),
  gameId: varchar("game_id", { length: 255 }).references(() => matches.facrGameId, { onDelete: "cascade" }).notNull(),
  playerId: integer("player_id").references(() => players.playerId).notNull(),
  teamId: integer("team_id").references(() => teams.teamId).notNull(),
  goalsScored: integer("goals_scored").default(0).notNull(),
}, (table) => ({
  gamePlayerUnique: unique("goals_game_player_unique").on(table.gameId, table.playerId),
  playerIdx: index("goals_player_idx").on(table.playerId),
}));

// ============================================================================
// INGESTION
// ============================================================================

export const ingestionLog = pgTable("ingestion_log", {
  id: serial("id").primaryKey(),
  source: varchar("source", { length: 100 }).notNull(), // fotbal.cz
  entityType: varchar("entity_type", { length: 100 }).notNull(),
  status: ingestionStatusEnum("status").notNull(),
  recordsProcessed: integer("records_processed").default(0).notNull(),
  errorMessage: text("error_message"),
  startedAt: timestamp("started_at").notNull(),
  completedAt: timestamp("completed_at"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
}, (table) => ({
  sourceIdx: index("ingestion_log_source_idx").on(table.source),
  startedAtIdx: index("ingestion_log_started_at_idx").on(table.startedAt),
}));

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type Team = typeof teams.$inferSelect;
export type InsertTeam = typeof teams.$inferInsert;

export type Player = typeof players.$inferSelect;
export type InsertPlayer = typeof players.$inferInsert;

export type Match = typeof matches.$inferSelect;
export type InsertMatch = typeof matches.$inferInsert;

export type Goal = typeof goals.$inferSelect;
export type InsertGoal = typeof goals.$inferInsert;

export type IngestionLog = typeof ingestionLog.$inferSelect;
export type InsertIngestionLog = typeof ingestionLog.$inferInsert;
