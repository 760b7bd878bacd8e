/**
 * better-sqlite3 loader shared by the search index and the config store.
 */
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { createRequire } from "node:module";
import type BetterSqlite3 from "better-sqlite3";

// better-sqlite3 is a CJS package; use createRequire for ESM interop.
const require = createRequire(import.meta.url);
const Database = require("better-sqlite3") as typeof import("better-sqlite3");

export type SqliteDatabase = BetterSqlite3.Database;

/** In-memory database path accepted by {@link openDatabase}. */
export const MEMORY_DB = ":memory:";

/** Open (and create the parent directory of) a database file. */
export function openDatabase(path: string): SqliteDatabase {
  if (path !== MEMORY_DB) {
    mkdirSync(dirname(path), { recursive: true });
  }
  const db = new Database(path);
  db.pragma("journal_mode = WAL");
  return db;
}
