/**
 * Task registry: single source of truth for registered tasks
 */

import type { Task } from "@/types";
import { ContractsIngestionTask } from "./contractsIngestionTask";
import { BuyerCanonicalizationTask } from "./buyerCanonicalizationTask";
import { CarbonScreeningTask } from "./carbonScreeningTask";

/**
 * All registered tasks, in pipeline order
 */
export const ALL_TASKS: Task[] = [
  ContractsIngestionTask,
  BuyerCanonicalizationTask,
  CarbonScreeningTask,
];

/**
 * Find a task by its taskKey
 *
 * @returns The task if found, null otherwise
 */
export function findTaskByKey(taskKey: string): Task | null {
  return ALL_TASKS.find((task) => task.taskKey === taskKey) ?? null;
}

/**
 * Validate task registry at load time
 *
 * Ensures:
 * - Task keys are globally unique
 * - Required fields are present and valid
 *
 * @throws Error if validation fails
 */
export function validateTaskRegistry(tasks: readonly Task[] = ALL_TASKS): void {
  const seenKeys = new Set<string>();

  for (const task of tasks) {
    if (!task.taskKey) {
      throw new Error("Task missing required field: taskKey");
    }

    if (typeof task.runOnce !== "function") {
      throw new Error(`Task '${task.taskKey}' missing runOnce function`);
    }

    if (seenKeys.has(task.taskKey)) {
      throw new Error(`Duplicate taskKey '${task.taskKey}'`);
    }
    seenKeys.add(task.taskKey);
  }
}

// Run validation at module load time
validateTaskRegistry();
