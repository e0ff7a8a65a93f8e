/**
 * Reset the Contracts Finder pagination cursor
 *
 * After a completed ingestion the cursor still points at the last "next"
 * link. Deleting it makes the next run start a fresh search window.
 *
 * Run with: npm run cursor:reset
 */

import "dotenv/config";
import { openDb, closeDb, runMigrations } from "../src/db";
import { SqliteCursorStore } from "../src/ingestion/sqliteCursorStore";
import * as logger from "../src/logger";

openDb();
runMigrations();

const store = new SqliteCursorStore();
const previous = store.load();
store.clear();

if (previous) {
  logger.info("Cursor cleared", { previous });
} else {
  logger.info("No cursor stored, nothing to clear");
}

closeDb();
