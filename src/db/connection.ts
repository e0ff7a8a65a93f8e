/**
 * SQLite database connection
 *
 * One shared connection per process. Repositories reach it through getDb();
 * tests swap in their own handle with setDbForTesting().
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, resolve } from "path";
import { DEFAULT_DB_PATH, IN_MEMORY_DB_PATH } from "@/constants/db";

let db: Database.Database | null = null;

/**
 * Resolve the database file from DB_PATH (relative to cwd) and create its
 * parent directory
 */
function resolveDbPath(): string {
  const configured = process.env.DB_PATH?.trim() || DEFAULT_DB_PATH;
  if (configured === IN_MEMORY_DB_PATH) {
    return configured;
  }

  const dbPath = resolve(process.cwd(), configured);
  mkdirSync(dirname(dbPath), { recursive: true });
  return dbPath;
}

/**
 * Open the shared connection, or return it if already open
 *
 * Enables foreign keys and the WAL journal.
 */
export function openDb(): Database.Database {
  if (db) {
    return db;
  }

  db = new Database(resolveDbPath());
  db.pragma("foreign_keys = ON");
  db.pragma("journal_mode = WAL");

  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Get the shared connection
 *
 * @throws Error if openDb() has not been called
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection (or clear it with null)
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
