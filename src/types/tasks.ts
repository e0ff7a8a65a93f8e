/**
 * Task orchestration type definitions
 *
 * Tasks represent discrete pipeline stages (ingest, canonicalize, screen).
 */

import type { Logger } from "./logger";

/**
 * Context passed to task execution
 */
export type TaskContext = {
  /** Owner ID for the current run (UUID) */
  ownerId: string;

  /** Project logger bound to the task */
  logger: Logger;
};

/**
 * A registered task, executed sequentially by the runner
 */
export type Task = {
  /**
   * Stable unique identifier for this task
   * Format: <subject>:<action> (e.g., "contracts:ingest")
   */
  taskKey: string;

  /** Human-readable task name for logging */
  name?: string;

  /**
   * Execute the task once
   *
   * @throws Error if the stage fails fatally
   */
  runOnce(ctx: TaskContext): Promise<void>;
};
