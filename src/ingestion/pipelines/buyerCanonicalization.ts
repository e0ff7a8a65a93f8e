/**
 * Buyer canonicalization pipeline
 *
 * contracts (strict civil-works subset) → canonical map → buyer_canonical_map
 * + contracts.buyer_name + CSV export
 */

import type {
  RunBuyerCanonicalizationInput,
  RunBuyerCanonicalizationResult,
} from "@/types";
import {
  listContracts,
  replaceBuyerMap,
  updateCanonicalBuyerNames,
} from "@/db";
import { withRun } from "@/ingestion/runLifecycle";
import { filterStrictCivilWorks } from "@/filters";
import { applyCanonicalMap, buildBuyerCanonicalMap } from "@/signal/canonicalizer";
import { exportBuyerMapCsv } from "@/exports";
import { EXPORT_DIR } from "@/constants/exports";
import { readEnvString } from "@/utils/config/env";
import * as logger from "@/logger";

export const BUYER_CANONICALIZE_STAGE = "canonicalize";

export async function runBuyerCanonicalizationPipeline(
  input: RunBuyerCanonicalizationInput = {},
): Promise<RunBuyerCanonicalizationResult> {
  const exportDir =
    input.exportDir === undefined
      ? readEnvString("EXPORT_DIR", EXPORT_DIR)
      : input.exportDir;

  return withRun(BUYER_CANONICALIZE_STAGE, async (runId, acc) => {
    const contracts = listContracts();
    const strict = filterStrictCivilWorks(contracts);

    const map = buildBuyerCanonicalMap(strict.map((c) => c.buyerNameRaw));
    const mapRows = replaceBuyerMap(map);
    const contractsUpdated = updateCanonicalBuyerNames(
      applyCanonicalMap(strict, map),
    );

    if (exportDir !== null) {
      exportBuyerMapCsv(map, exportDir);
    }

    acc.counters = {
      contracts_total: contracts.length,
      contracts_strict: strict.length,
      clusters: map.clusters.length,
      map_rows: mapRows,
      contracts_updated: contractsUpdated,
    };

    logger.info("Buyer canonicalization complete", { runId, ...acc.counters });

    return { runId, map, contractsUpdated };
  });
}
