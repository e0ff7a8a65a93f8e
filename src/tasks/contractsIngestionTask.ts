/**
 * Contracts Ingestion Task
 *
 * Pulls civil-works notices from Contracts Finder into the contracts table,
 * resuming from the persisted cursor when one exists.
 *
 * This is the first stage in the pipeline.
 */

import type { Task, TaskContext } from "@/types";
import { runContractsFinderPipeline } from "@/ingestion/pipelines";

export const ContractsIngestionTask: Task = {
  taskKey: "contracts:ingest",
  name: "Contracts Finder Ingestion",

  async runOnce(ctx: TaskContext): Promise<void> {
    ctx.logger.info("Starting contracts ingestion pipeline");

    const result = await runContractsFinderPipeline({ logger: ctx.logger });

    ctx.logger.info("Contracts ingestion pipeline complete", {
      runId: result.runId,
      state: result.outcome.state,
      stopReason: result.outcome.stopReason,
      persisted: result.persisted,
      pagesFetched: result.outcome.counters.pages_fetched,
      duplicates: result.outcome.counters.duplicates,
    });
  },
};
