/**
 * Database initialization and client
 *
 * SQLite via better-sqlite3. The file lives under .data/ by default;
 * DATABASE_PATH=":memory:" gives a throwaway in-process database.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { logger } from "../logger";
import { getConfig } from "../../config/env";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";
import { getSchemaStatements } from "./schema";

let sqlite: Database.Database | null = null;
let initialized = false;

/**
 * Open a SQLite database and apply the schema
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(path.resolve(process.cwd(), dbPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma("foreign_keys = ON");
  if (dbPath !== ":memory:") {
    // WAL lets route handlers read while a cache write is in progress
    db.pragma("journal_mode = WAL");
  }

  applySchema(db);
  return db;
}

/**
 * Create tables and indexes if they don't exist
 */
export function applySchema(db: Database.Database): void {
  const migrate = db.transaction(() => {
    for (const statement of getSchemaStatements()) {
      db.exec(statement);
    }
  });
  migrate();
}

/**
 * Get or create the shared SQLite connection
 */
export function getSqlite(): Database.Database {
  if (!sqlite) {
    const dbPath = getConfig().DATABASE_PATH;
    sqlite = openDatabase(dbPath);
    initialized = true;
    logger.info(`Database initialized at ${dbPath}`);
  }

  return sqlite;
}

/**
 * Ensure the schema exists before a route touches the database
 */
export async function initializeDatabase(): Promise<void> {
  if (initialized) {
    return;
  }

  try {
    getSqlite();
  } catch (error) {
    logger.error("Failed to initialize SQLite schema", error);
    throw error;
  }
}

/**
 * Cheap liveness probe for the health endpoint
 */
export function pingDatabase(): boolean {
  const row = getSqlite().prepare("SELECT 1 AS ok").get() as { ok: number } | undefined;
  return row?.ok === 1;
}

export type Orm = BetterSQLite3Database<typeof schema>;

/**
 * Typed query builder over a SQLite connection (the shared one by default)
 */
export function getOrm(db: Database.Database = getSqlite()): Orm {
  return drizzle(db, { schema });
}
