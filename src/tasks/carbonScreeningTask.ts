/**
 * Carbon Screening Task
 *
 * Screens the canonicalized contracts for embodied-carbon risk, stores the
 * ranked snapshot and prints the top risks. Last stage in the pipeline.
 */

import type { Task, TaskContext } from "@/types";
import { runCarbonScreeningPipeline } from "@/ingestion/pipelines";
import { formatTopRisks } from "@/reports";
import { TOP_RISKS_REPORT_SIZE } from "@/constants";

export const CarbonScreeningTask: Task = {
  taskKey: "carbon:screen",
  name: "Carbon Risk Screening",

  async runOnce(ctx: TaskContext): Promise<void> {
    const result = await runCarbonScreeningPipeline();

    ctx.logger.info("Carbon screening pipeline complete", {
      runId: result.runId,
      ...result.summary,
    });

    if (result.records.length > 0) {
      console.log(
        `\nTop ${TOP_RISKS_REPORT_SIZE} Highest Carbon Risks:\n` +
          formatTopRisks(result.records, TOP_RISKS_REPORT_SIZE),
      );
    }
  },
};
