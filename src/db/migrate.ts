/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import type Database from "better-sqlite3";
import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import { openDb } from "./connection";
import * as logger from "@/logger";

/**
 * Directory holding the ordered *.sql migration files
 */
export function getMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((r) => r.version));
}

/**
 * List migration files not yet applied, in filename order
 */
function getPendingMigrations(appliedMigrations: Set<string>): string[] {
  let files: string[];
  try {
    files = readdirSync(getMigrationsDir());
  } catch {
    // No migrations directory yet
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !appliedMigrations.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(getMigrationsDir(), filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply all pending migrations on the given connection
 *
 * @returns Filenames of the migrations applied
 */
export function migrateDb(db: Database.Database): string[] {
  ensureMigrationsTable(db);

  const pending = getPendingMigrations(getAppliedMigrations(db));
  for (const migration of pending) {
    logger.info("Applying migration", { migration });
    applyMigration(db, migration);
  }

  return pending;
}

/**
 * Run all pending migrations on the shared connection (opened if needed)
 */
export function runMigrations(): void {
  const applied = migrateDb(openDb());

  if (applied.length === 0) {
    logger.debug("No pending migrations");
  } else {
    logger.info("Migrations complete", { applied: applied.length });
  }
}

/**
 * CLI entrypoint
 */
if (require.main === module) {
  runMigrations();
}
