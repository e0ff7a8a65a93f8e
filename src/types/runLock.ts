/**
 * Run lock type definitions
 */

/**
 * Run lock row (stored in run_lock table)
 */
export type RunLockRow = {
  lock_name: string;
  /** Owner run identifier (UUID) */
  owner_id: string;
  acquired_at: string;
  expires_at: string;
  updated_at: string;
};

export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" | "DB_NOT_OPEN" };
