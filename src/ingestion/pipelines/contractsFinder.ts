/**
 * Contracts Finder ingestion pipeline entrypoint
 *
 * Testable pipeline that connects:
 * ContractIngestor (HTTP + cursor) → run lifecycle → contracts table
 *
 * This pipeline is the target of E2E offline tests (mock HTTP + real DB).
 */

import type {
  IngestionConfig,
  RunContractsFinderPipelineInput,
  RunContractsFinderPipelineResult,
} from "@/types";
import { ContractIngestor } from "@/ingestion/contractIngestor";
import { SqliteCursorStore } from "@/ingestion/sqliteCursorStore";
import { withRun } from "@/ingestion/runLifecycle";
import { upsertContracts } from "@/db";
import {
  CONTRACTS_FINDER_DEFAULT_PAGE_LIMIT,
  CONTRACTS_FINDER_DEFAULT_PUBLISHED_FROM,
  CONTRACTS_FINDER_DEFAULT_PUBLISHED_TO,
  CONTRACTS_FINDER_DESCRIPTION_MAX_LENGTH,
  CONTRACTS_FINDER_INTER_PAGE_DELAY_MS,
  CONTRACTS_FINDER_SEARCH_URL,
} from "@/constants/clients/contractsFinder";
import { DEFAULT_ACCEPTED_CPV_PREFIXES } from "@/constants/civilWorks";
import { readEnvList, readEnvNumber, readEnvString } from "@/utils/config/env";
import * as logger from "@/logger";

export const CONTRACTS_INGEST_STAGE = "ingest";

/**
 * Build the ingestion config from environment variables and overrides
 */
export function resolveIngestionConfig(
  overrides: Partial<IngestionConfig> = {},
): IngestionConfig {
  return {
    searchUrl: CONTRACTS_FINDER_SEARCH_URL,
    publishedFrom: readEnvString(
      "CF_PUBLISHED_FROM",
      CONTRACTS_FINDER_DEFAULT_PUBLISHED_FROM,
    ),
    publishedTo: readEnvString(
      "CF_PUBLISHED_TO",
      CONTRACTS_FINDER_DEFAULT_PUBLISHED_TO,
    ),
    pageLimit: readEnvNumber("CF_PAGE_LIMIT", CONTRACTS_FINDER_DEFAULT_PAGE_LIMIT),
    acceptedCpvPrefixes: readEnvList(
      "CF_ACCEPTED_CPV_PREFIXES",
      DEFAULT_ACCEPTED_CPV_PREFIXES,
    ),
    interPageDelayMs: CONTRACTS_FINDER_INTER_PAGE_DELAY_MS,
    descriptionMaxLength: CONTRACTS_FINDER_DESCRIPTION_MAX_LENGTH,
    ...overrides,
  };
}

/**
 * Run Contracts Finder ingestion
 *
 * Records accumulated by the ingestor are persisted for every outcome,
 * including aborts. A non-200 status ends the run as "stopped" without
 * throwing; a fatal error is rethrown after the partial records are saved.
 *
 * @throws The ingestor's fatal error (e.g. RetryExhaustedError)
 */
export async function runContractsFinderPipeline(
  input: RunContractsFinderPipelineInput = {},
): Promise<RunContractsFinderPipelineResult> {
  const config = resolveIngestionConfig(input.config);
  const log = input.logger ?? logger;

  return withRun(CONTRACTS_INGEST_STAGE, async (runId, acc) => {
    const ingestor = new ContractIngestor({
      cursorStore: new SqliteCursorStore(input.cursorKey),
      config,
      httpGet: input.httpGet,
      sleep: input.sleep,
      logger: log,
    });

    const outcome = await ingestor.run();
    const persisted = upsertContracts(outcome.records);

    acc.counters = { ...outcome.counters, persisted };
    acc.notes = outcome.error
      ? `${outcome.stopReason}: ${outcome.error.message}`
      : outcome.stopReason;

    log.info("Contracts Finder pipeline complete", {
      runId,
      state: outcome.state,
      stopReason: outcome.stopReason,
      persisted,
    });

    if (outcome.stopReason === "fatal_error") {
      throw outcome.error ?? new Error("Ingestion aborted");
    }
    if (outcome.state === "ABORTED") {
      acc.status = "stopped";
    }

    return { runId, outcome, persisted };
  });
}
