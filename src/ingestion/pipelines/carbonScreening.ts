/**
 * Carbon screening pipeline
 *
 * contracts (strict subset, positive spend) → risk engine → contract_risk
 * + CSV export
 */

import type { RunCarbonScreeningInput, RunCarbonScreeningResult } from "@/types";
import { listContracts, replaceContractRisk } from "@/db";
import { withRun } from "@/ingestion/runLifecycle";
import { filterPositiveSpend, filterStrictCivilWorks } from "@/filters";
import { loadMaterialReference } from "@/catalog";
import { screenContracts, summarizeRisk } from "@/signal/risk";
import { exportRiskRecordsCsv } from "@/exports";
import { EXPORT_DIR } from "@/constants/exports";
import { MATERIAL_REFERENCE_PATH } from "@/constants/materials";
import { MIN_SPEND_GBP } from "@/constants/risk";
import { readEnvNumber, readEnvString } from "@/utils/config/env";
import * as logger from "@/logger";

export const CARBON_SCREEN_STAGE = "screen";

export async function runCarbonScreeningPipeline(
  input: RunCarbonScreeningInput = {},
): Promise<RunCarbonScreeningResult> {
  const minSpend = input.minSpend ?? readEnvNumber("MIN_SPEND_GBP", MIN_SPEND_GBP);
  const exportDir =
    input.exportDir === undefined
      ? readEnvString("EXPORT_DIR", EXPORT_DIR)
      : input.exportDir;

  // Loaded before the run row exists: a bad reference table is a startup error
  const materials =
    input.materials ??
    loadMaterialReference(
      input.materialReferencePath ??
        readEnvString("MATERIAL_REFERENCE_PATH", MATERIAL_REFERENCE_PATH),
    );

  return withRun(CARBON_SCREEN_STAGE, async (runId, acc) => {
    const contracts = listContracts();
    const prepared = filterPositiveSpend(filterStrictCivilWorks(contracts));

    const records = screenContracts(prepared, materials, { minSpend });
    replaceContractRisk(records);

    if (exportDir !== null) {
      exportRiskRecordsCsv(records, exportDir);
    }

    const summary = summarizeRisk(records);
    acc.counters = { contracts_total: contracts.length, ...summary };

    logger.info("Carbon screening complete", { runId, ...summary });

    return { runId, records, summary };
  });
}
