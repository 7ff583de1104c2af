/**
 * Cache store
 * Key/value entries with per-entry expiry, read lazily (no background sweep needed)
 */

import type Database from "better-sqlite3";
import { getSqlite } from "./index";
import { logger } from "../logger";
import { CacheUnavailableError, errorMessage } from "../errors";

export interface CachedValue<T> {
  key: string;
  value: T;
  computedAt: number; // epoch ms
  expiresAt: number; // epoch ms
}

export interface CacheStore {
  /** Returns null when the key is absent or expired */
  get<T>(key: string, now?: number): CachedValue<T> | null;
  set<T>(key: string, value: T, ttlSeconds: number, now?: number): CachedValue<T>;
  isExpired(entry: { expiresAt: number }, now?: number): boolean;
  deletePrefix(prefix: string): number;
  sweepExpired(now?: number): number;
}

interface CacheRow {
  key: string;
  value_json: string;
  computed_at: number;
  expires_at: number;
}

export class SqliteCacheStore implements CacheStore {
  constructor(private readonly db: Database.Database) {}

  isExpired(entry: { expiresAt: number }, now: number = Date.now()): boolean {
    return now > entry.expiresAt;
  }

  get<T>(key: string, now: number = Date.now()): CachedValue<T> | null {
    const row = this.guard(`read ${key}`, () =>
      this.db
        .prepare(`SELECT key, value_json, computed_at, expires_at FROM cache_entries WHERE key = ?`)
        .get(key) as CacheRow | undefined
    );

    if (!row) {
      return null;
    }

    if (this.isExpired({ expiresAt: row.expires_at }, now)) {
      logger.debug(`Cache entry expired: ${key}`);
      return null;
    }

    try {
      return {
        key: row.key,
        value: JSON.parse(row.value_json) as T,
        computedAt: row.computed_at,
        expiresAt: row.expires_at,
      };
    } catch (error) {
      // A row we cannot decode is treated as a miss and overwritten on the next set
      logger.warn(`Discarding undecodable cache entry ${key}`, { error: errorMessage(error) });
      return null;
    }
  }

  set<T>(key: string, value: T, ttlSeconds: number, now: number = Date.now()): CachedValue<T> {
    const expiresAt = now + ttlSeconds * 1000;
    const valueJson = JSON.stringify(value);

    // Single statement: readers see either the old row or the new one
    this.guard(`write ${key}`, () =>
      this.db
        .prepare(
          `INSERT INTO cache_entries (key, value_json, computed_at, expires_at)
           VALUES (?, ?, ?, ?)
           ON CONFLICT(key) DO UPDATE SET
             value_json = excluded.value_json,
             computed_at = excluded.computed_at,
             expires_at = excluded.expires_at`
        )
        .run(key, valueJson, now, expiresAt)
    );

    logger.debug(`Set cache entry ${key}`, { expiresAt });
    return { key, value, computedAt: now, expiresAt };
  }

  deletePrefix(prefix: string): number {
    const escaped = prefix.replace(/[\\%_]/g, (ch) => `\\${ch}`);
    const result = this.guard(`delete prefix ${prefix}`, () =>
      this.db.prepare(`DELETE FROM cache_entries WHERE key LIKE ? ESCAPE '\\'`).run(`${escaped}%`)
    );
    logger.info(`Invalidated ${result.changes} cache entries with prefix ${prefix}`);
    return result.changes;
  }

  sweepExpired(now: number = Date.now()): number {
    const result = this.guard("sweep", () =>
      this.db.prepare(`DELETE FROM cache_entries WHERE expires_at < ?`).run(now)
    );
    if (result.changes > 0) {
      logger.info(`Swept ${result.changes} expired cache entries`);
    }
    return result.changes;
  }

  private guard<R>(operation: string, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      logger.error(`Cache store failed to ${operation}`, error);
      throw new CacheUnavailableError(`Cache store failed to ${operation}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

let sharedStore: SqliteCacheStore | null = null;

/**
 * Process-wide cache store backed by the shared SQLite connection
 */
export function getCacheStore(): CacheStore {
  if (!sharedStore) {
    sharedStore = new SqliteCacheStore(getSqlite());
  }
  return sharedStore;
}
