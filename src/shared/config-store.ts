/**
 * Key/value option store with optional expiry.
 *
 * Holds governing settings and the brand-side configuration cache.
 * Values are stored as JSON; reads return `unknown` and callers validate
 * the shape before use.
 */
import type { SqliteDatabase } from "./sqlite.js";
import { openDatabase } from "./sqlite.js";

export interface ConfigStore {
  /** Stored value, or `undefined` when absent or expired. */
  get(key: string): unknown;
  /** Store a value; with `ttlSeconds` the entry expires after that long. */
  set(key: string, value: unknown, ttlSeconds?: number): void;
  delete(key: string): void;
}

export interface SqliteConfigStoreOptions {
  /** Database file, or `:memory:`. */
  path: string;
  /** Clock in milliseconds (default `Date.now`). */
  now?: () => number;
}

interface OptionRow {
  value: string;
  expires_at: number | null;
}

export class SqliteConfigStore implements ConfigStore {
  private readonly db: SqliteDatabase;
  private readonly now: () => number;

  constructor(options: SqliteConfigStoreOptions) {
    this.db = openDatabase(options.path);
    this.now = options.now ?? Date.now;
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS options (
        key        TEXT PRIMARY KEY,
        value      TEXT NOT NULL,
        expires_at INTEGER
      );
    `);
  }

  get(key: string): unknown {
    const row = this.db
      .prepare("SELECT value, expires_at FROM options WHERE key = ?")
      .get(key) as OptionRow | undefined;
    if (!row) return undefined;
    if (row.expires_at !== null && row.expires_at <= this.now()) {
      this.delete(key);
      return undefined;
    }
    return JSON.parse(row.value);
  }

  set(key: string, value: unknown, ttlSeconds?: number): void {
    const expiresAt = ttlSeconds === undefined ? null : this.now() + ttlSeconds * 1000;
    this.db
      .prepare(
        `INSERT INTO options (key, value, expires_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`,
      )
      .run(key, JSON.stringify(value), expiresAt);
  }

  delete(key: string): void {
    this.db.prepare("DELETE FROM options WHERE key = ?").run(key);
  }

  close(): void {
    this.db.close();
  }
}
