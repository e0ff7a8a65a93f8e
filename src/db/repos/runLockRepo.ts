/**
 * Run lock repository
 *
 * Global batch lock shared by every process using the same database.
 * DB-based with a TTL so a crashed run cannot block forever.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import { getDb } from "@/db/connection";
import { RUN_LOCK_NAME, RUN_LOCK_TTL_SECONDS } from "@/constants/runLock";

function isDbNotOpenError(err: unknown): boolean {
  return err instanceof Error && err.message.includes("not opened");
}

/**
 * Acquire the batch lock
 *
 * Inserts the lock row, or takes it over when the existing one has expired.
 *
 * @param ownerId - Unique run identifier (UUID)
 * @throws Database errors other than "not opened"
 */
export function acquireRunLock(ownerId: string): RunLockAcquireResult {
  try {
    const db = getDb();

    // The WHERE clause on the conflict branch leaves a live lock untouched
    const result = db
      .prepare(
        `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (
        ?,
        ?,
        datetime('now'),
        datetime('now', '+' || ? || ' seconds')
      )
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= expires_at
    `,
      )
      .run(RUN_LOCK_NAME, ownerId, RUN_LOCK_TTL_SECONDS);

    return result.changes > 0 ? { ok: true } : { ok: false, reason: "LOCKED" };
  } catch (err) {
    if (isDbNotOpenError(err)) {
      return { ok: false, reason: "DB_NOT_OPEN" };
    }
    throw err;
  }
}

/**
 * Release the batch lock if owned by this run
 *
 * @returns true if the lock was released
 */
export function releaseRunLock(ownerId: string): boolean {
  const db = getDb();
  const result = db
    .prepare("DELETE FROM run_lock WHERE lock_name = ? AND owner_id = ?")
    .run(RUN_LOCK_NAME, ownerId);

  return result.changes > 0;
}

/**
 * Get current lock state
 */
export function getRunLock(): RunLockRow | null {
  const db = getDb();
  const row = db
    .prepare<[string], RunLockRow>("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(RUN_LOCK_NAME);

  return row ?? null;
}
