/**
 * Run lifecycle helpers: track stage runs in the database
 *
 * One run = one execution of a single stage (ingest, canonicalize, screen).
 * These helpers ensure every run is finalized (success, stopped or failure).
 */

import type { RunStatus, RunAccumulator } from "@/types";
import { createRun, finishRun as repoFinishRun } from "@/db";

/**
 * Start a new run for a stage
 *
 * @returns The run ID
 */
export function startRun(stage: string): number {
  return createRun({ stage });
}

/**
 * Finish a run with status, counters and notes
 */
export function finishRun(
  runId: number,
  status: RunStatus,
  acc?: RunAccumulator,
): void {
  repoFinishRun(runId, {
    finished_at: new Date().toISOString(),
    status,
    ...(acc && { counters: acc.counters }),
    ...(acc?.notes !== undefined && { notes: acc.notes }),
  });
}

export function createRunAccumulator(): RunAccumulator {
  return { counters: {} };
}

/**
 * Execute a function within a run lifecycle
 *
 * Guarantees the run is finalized regardless of success or failure.
 * On return: status = acc.status ?? "success"
 * On error: status = "failure", then rethrows the error
 *
 * Counters are persisted in the `finally` block, so whatever the callback
 * managed to record before throwing is kept.
 *
 * @param stage - Stage identifier stored on the run row
 * @param fn - Async function to execute, receives (runId, acc) where acc is a mutable accumulator
 * @returns The result of fn
 */
export async function withRun<T>(
  stage: string,
  fn: (runId: number, acc: RunAccumulator) => Promise<T>,
): Promise<T> {
  const runId = startRun(stage);
  const acc = createRunAccumulator();
  let succeeded = false;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } finally {
    finishRun(runId, succeeded ? (acc.status ?? "success") : "failure", acc);
  }
}
