/**
 * Database schema using Drizzle ORM
 *
 * The table objects type the drizzle repositories; getSchemaStatements()
 * holds the DDL that openDatabase() applies, including the cache_entries
 * and usage_quota tables that are read with prepared statements.
 */

import { sqliteTable, text, integer, uniqueIndex } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

/**
 * Users who have signed in through Steam
 */
export const users = sqliteTable("users", {
  steamId: text("steam_id").primaryKey(),
  personaName: text("persona_name"),
  profileUrl: text("profile_url"),
  avatarUrl: text("avatar_url"),
  lastLogin: integer("last_login"), // Unix timestamp
  createdAt: integer("created_at").default(sql`(strftime('%s', 'now'))`),
});

/**
 * Cached game library: one row per (user, app), replaced wholesale on refresh
 */
export const cachedGames = sqliteTable(
  "cached_games",
  {
    steamId: text("steam_id").notNull(),
    appId: integer("app_id").notNull(),
    name: text("name").notNull(),
    iconUrl: text("icon_url"),
    playtimeForever: integer("playtime_forever").notNull().default(0),
    playtime2Weeks: integer("playtime_2weeks").notNull().default(0),
    lastPlayed: integer("last_played").notNull().default(0),
    cachedAt: integer("cached_at").notNull(), // Unix timestamp
  },
  (table) => ({
    userApp: uniqueIndex("idx_cached_games_user_app").on(table.steamId, table.appId),
  })
);

/**
 * Generated guides: at most one per (app, achievement)
 */
export const aiGuides = sqliteTable(
  "ai_guides",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    appId: integer("app_id").notNull(),
    achievementId: text("achievement_id").notNull(),
    gameName: text("game_name"),
    achievementName: text("achievement_name").notNull(),
    summary: text("summary").notNull(),
    difficulty: integer("difficulty").notNull(),
    estimatedTime: text("estimated_time").notNull(),
    strategies: text("strategies").notNull(), // JSON array stringified
    tips: text("tips").notNull(), // JSON array stringified
    modelUsed: text("model_used"),
    generatedAt: integer("generated_at").notNull(), // epoch ms
    ratingTotal: integer("rating_total").notNull().default(0),
    ratingCount: integer("rating_count").notNull().default(0),
    views: integer("views").notNull().default(0),
  },
  (table) => ({
    appAchievement: uniqueIndex("idx_ai_guides_app_achievement").on(table.appId, table.achievementId),
  })
);

export function getSchemaStatements(): string[] {
  return [
    `CREATE TABLE IF NOT EXISTS users (
      steam_id TEXT PRIMARY KEY,
      persona_name TEXT,
      profile_url TEXT,
      avatar_url TEXT,
      last_login INTEGER,
      created_at INTEGER DEFAULT (strftime('%s', 'now'))
    )`,
    `CREATE TABLE IF NOT EXISTS cached_games (
      steam_id TEXT NOT NULL,
      app_id INTEGER NOT NULL,
      name TEXT NOT NULL,
      icon_url TEXT,
      playtime_forever INTEGER NOT NULL DEFAULT 0,
      playtime_2weeks INTEGER NOT NULL DEFAULT 0,
      last_played INTEGER NOT NULL DEFAULT 0,
      cached_at INTEGER NOT NULL
    )`,
    `CREATE UNIQUE INDEX IF NOT EXISTS idx_cached_games_user_app ON cached_games(steam_id, app_id)`,
    `CREATE TABLE IF NOT EXISTS ai_guides (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      app_id INTEGER NOT NULL,
      achievement_id TEXT NOT NULL,
      game_name TEXT,
      achievement_name TEXT NOT NULL,
      summary TEXT NOT NULL,
      difficulty INTEGER NOT NULL,
      estimated_time TEXT NOT NULL,
      strategies TEXT NOT NULL,
      tips TEXT NOT NULL,
      model_used TEXT,
      generated_at INTEGER NOT NULL,
      rating_total INTEGER NOT NULL DEFAULT 0,
      rating_count INTEGER NOT NULL DEFAULT 0,
      views INTEGER NOT NULL DEFAULT 0
    )`,
    `CREATE UNIQUE INDEX IF NOT EXISTS idx_ai_guides_app_achievement ON ai_guides(app_id, achievement_id)`,
    `CREATE TABLE IF NOT EXISTS cache_entries (
      key TEXT PRIMARY KEY,
      value_json TEXT NOT NULL,
      computed_at INTEGER NOT NULL,
      expires_at INTEGER NOT NULL
    )`,
    `CREATE INDEX IF NOT EXISTS idx_cache_entries_expires_at ON cache_entries(expires_at)`,
    `CREATE TABLE IF NOT EXISTS usage_quota (
      key TEXT PRIMARY KEY,
      endpoint TEXT NOT NULL,
      client_ip TEXT NOT NULL,
      window_type TEXT NOT NULL,
      used INTEGER NOT NULL DEFAULT 0,
      reset_at INTEGER NOT NULL,
      created_at INTEGER NOT NULL
    )`,
  ];
}
