/**
 * Buyer Canonicalization Task
 *
 * Rebuilds the buyer canonical map from the strict civil-works subset and
 * rewrites contracts.buyer_name. Executed after ingestion.
 */

import type { Task, TaskContext } from "@/types";
import { runBuyerCanonicalizationPipeline } from "@/ingestion/pipelines";

export const BuyerCanonicalizationTask: Task = {
  taskKey: "buyers:canonicalize",
  name: "Buyer Canonicalization",

  async runOnce(ctx: TaskContext): Promise<void> {
    const result = await runBuyerCanonicalizationPipeline();

    ctx.logger.info("Buyer canonicalization pipeline complete", {
      runId: result.runId,
      clusters: result.map.clusters.length,
      rawNames: result.map.entries.length,
      contractsUpdated: result.contractsUpdated,
    });
  },
};
