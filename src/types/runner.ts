/**
 * Runner type definitions
 */

/**
 * Stage selection for a single runner invocation (RUN_STAGE)
 */
export type RunStage = "all" | "ingest" | "canonicalize" | "screen";

/**
 * Status of a single task within a runner sequence
 *
 * - DONE: task completed
 * - ERROR: task threw; the sequence stops
 * - NOT_RUN: an earlier task failed
 */
export type RunnerStepStatus = "DONE" | "ERROR" | "NOT_RUN";

export type RunnerStepResult = {
  taskKey: string;
  status: RunnerStepStatus;
  elapsedMs?: number;
  note?: string;
};

export type RunnerSequenceResult =
  | { ok: true; steps: RunnerStepResult[] }
  | { ok: false; reason: "LOCKED" | "TASK_FAILED"; steps: RunnerStepResult[] };
