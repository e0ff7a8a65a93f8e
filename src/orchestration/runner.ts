/**
 * Runner core: executes registered tasks sequentially under the run lock
 *
 * Key responsibilities:
 * - Open the database and apply migrations
 * - Acquire the global run lock (prevent concurrent batches)
 * - Execute the selected tasks in order, stopping at the first failure
 * - Always release the lock
 */

import { randomUUID } from "crypto";
import type {
  RunStage,
  RunnerSequenceResult,
  RunnerStepResult,
  Task,
} from "@/types";
import { openDb, runMigrations } from "@/db";
import { acquireRunLock, releaseRunLock } from "@/db/repos/runLockRepo";
import { findTaskByKey } from "@/tasks";
import { DEFAULT_RUN_STAGE, RUN_STAGE_TASKS } from "@/constants/runner";
import * as logger from "@/logger";

export type RunTasksOptions = {
  /** Task lookup (defaults to the registry) */
  resolveTask?: (taskKey: string) => Task | null;
};

function isRunStage(value: string): value is RunStage {
  return value in RUN_STAGE_TASKS;
}

/**
 * Parse a RUN_STAGE value
 *
 * @throws Error for unknown stages
 */
export function resolveRunStage(value: string | undefined): RunStage {
  const stage = value?.trim().toLowerCase();
  if (!stage) {
    return DEFAULT_RUN_STAGE;
  }
  if (!isRunStage(stage)) {
    throw new Error(
      `Invalid RUN_STAGE '${value}' (expected one of: ${Object.keys(RUN_STAGE_TASKS).join(", ")})`,
    );
  }
  return stage;
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the given tasks once, sequentially
 *
 * @param taskKeys - Task keys in execution order
 * @returns Per-step results; ok=false when locked or when a task failed
 * @throws Error when a task key is not registered
 */
export async function runTasks(
  taskKeys: readonly string[],
  options: RunTasksOptions = {},
): Promise<RunnerSequenceResult> {
  const resolveTask = options.resolveTask ?? findTaskByKey;

  const tasks = taskKeys.map((taskKey) => {
    const task = resolveTask(taskKey);
    if (!task) {
      throw new Error(`Unknown taskKey '${taskKey}'`);
    }
    return task;
  });

  logger.debug("Opening database and running migrations");
  openDb();
  runMigrations();

  const ownerId = randomUUID();
  const lockResult = acquireRunLock(ownerId);

  if (!lockResult.ok) {
    logger.warn("Failed to acquire run lock - another run may be in progress", {
      reason: lockResult.reason,
    });
    return {
      ok: false,
      reason: "LOCKED",
      steps: tasks.map((task) => ({ taskKey: task.taskKey, status: "NOT_RUN" })),
    };
  }

  logger.info("Global run lock acquired", { ownerId });

  const steps: RunnerStepResult[] = [];
  let failed = false;

  try {
    for (const task of tasks) {
      if (failed) {
        steps.push({ taskKey: task.taskKey, status: "NOT_RUN" });
        continue;
      }

      const startMs = Date.now();
      const taskLogger = logger.withContext({ taskKey: task.taskKey });
      taskLogger.info("Task started", { name: task.name });

      try {
        await task.runOnce({ ownerId, logger: taskLogger });
        const elapsedMs = Date.now() - startMs;
        taskLogger.info("Task completed", { elapsedMs });
        steps.push({ taskKey: task.taskKey, status: "DONE", elapsedMs });
      } catch (error) {
        const elapsedMs = Date.now() - startMs;
        taskLogger.error("Task failed", {
          elapsedMs,
          error: getErrorMessage(error),
          stack: error instanceof Error ? error.stack : undefined,
        });
        steps.push({
          taskKey: task.taskKey,
          status: "ERROR",
          elapsedMs,
          note: getErrorMessage(error),
        });
        failed = true;
      }
    }
  } finally {
    const released = releaseRunLock(ownerId);
    if (released) {
      logger.info("Global run lock released", { ownerId });
    } else {
      logger.warn("Failed to release run lock (may not be owned)", { ownerId });
    }
  }

  return failed ? { ok: false, reason: "TASK_FAILED", steps } : { ok: true, steps };
}

/**
 * Run the tasks of one stage selection
 */
export function runStage(
  stage: RunStage,
  options?: RunTasksOptions,
): Promise<RunnerSequenceResult> {
  logger.info("Starting runner", { stage, tasks: RUN_STAGE_TASKS[stage] });
  return runTasks(RUN_STAGE_TASKS[stage], options);
}
