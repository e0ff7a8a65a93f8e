/**
 * Ingestion cursor repository
 *
 * Data access layer for ingestion_cursor table: one opaque token per key.
 */

import type { CursorRow } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Get the stored token for a cursor key
 *
 * @returns Token or null if none persisted
 */
export function getCursorToken(cursorKey: string): string | null {
  const db = getDb();
  const row = db
    .prepare<[string], CursorRow>(
      "SELECT * FROM ingestion_cursor WHERE cursor_key = ?",
    )
    .get(cursorKey);

  return row?.token ?? null;
}

/**
 * Create or replace the token for a cursor key
 */
export function setCursorToken(cursorKey: string, token: string): void {
  const db = getDb();
  db.prepare(
    `
    INSERT INTO ingestion_cursor (cursor_key, token)
    VALUES (?, ?)
    ON CONFLICT(cursor_key) DO UPDATE SET
      token = excluded.token,
      updated_at = datetime('now')
  `,
  ).run(cursorKey, token);
}

/**
 * Delete the token for a cursor key
 *
 * @returns true if a token was removed
 */
export function deleteCursorToken(cursorKey: string): boolean {
  const db = getDb();
  const result = db
    .prepare("DELETE FROM ingestion_cursor WHERE cursor_key = ?")
    .run(cursorKey);
  return result.changes > 0;
}
