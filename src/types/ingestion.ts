/**
 * Ingestion type definitions
 */

import type { ContractRecord } from "./contracts";
import type { HttpGetFn } from "./clients/http";
import type { BuyerCanonicalMap } from "./canonical";
import type { MaterialProfile } from "./materials";
import type { RiskRecord, ScreeningSummary } from "./risk";
import type { Logger } from "./logger";

/**
 * Ingestor state machine states
 */
export type IngestionState =
  | "START"
  | "FETCHING"
  | "FILTERING"
  | "ADVANCING"
  | "DONE"
  | "ABORTED";

/**
 * Why the pagination loop ended
 *
 * - complete: last page had no "next" link
 * - empty_page: a page returned zero releases
 * - http_status: remote returned a non-200 status (resume later from cursor)
 * - fatal_error: exception inside the loop (incl. exhausted retries)
 */
export type IngestionStopReason =
  | "complete"
  | "empty_page"
  | "http_status"
  | "fatal_error";

export type IngestionCounters = {
  pages_fetched: number;
  releases_seen: number;
  contracts_accepted: number;
  duplicates: number;
  rejected_unknown_code: number;
  rejected_prefix: number;
};

export type IngestionConfig = {
  /** Search endpoint used for the first page of a fresh run */
  searchUrl: string;
  publishedFrom: string;
  publishedTo: string;
  pageLimit: number;
  /** CPV prefixes a contract must start with to be kept */
  acceptedCpvPrefixes: string[];
  /** Delay observed between consecutive pages */
  interPageDelayMs: number;
  /** Max description length stored per contract */
  descriptionMaxLength: number;
};

export type IngestionOutcome = {
  state: Extract<IngestionState, "DONE" | "ABORTED">;
  stopReason: IngestionStopReason;
  records: ContractRecord[];
  counters: IngestionCounters;
  /** Set when state is ABORTED */
  error?: Error;
};

/**
 * Per-stage run status persisted in ingestion_runs
 */
export type RunStatus = "success" | "failure" | "stopped";

/**
 * Mutable accumulator handed to stage functions by withRun()
 */
export type RunAccumulator = {
  counters: Record<string, number>;
  notes?: string;
  /** Overrides the derived status (e.g., a graceful stop on HTTP status) */
  status?: RunStatus;
};

/**
 * Input for runContractsFinderPipeline (all optional, for DI in tests)
 */
export type RunContractsFinderPipelineInput = {
  httpGet?: HttpGetFn;
  sleep?: (ms: number) => Promise<void>;
  /** Overrides applied on top of the environment-derived config */
  config?: Partial<IngestionConfig>;
  /** Cursor key in ingestion_cursor (defaults to the Contracts Finder key) */
  cursorKey?: string;
  logger?: Logger;
};

export type RunContractsFinderPipelineResult = {
  runId: number;
  outcome: IngestionOutcome;
  persisted: number;
};

export type RunBuyerCanonicalizationInput = {
  /** Directory for buyer_canonical_map.csv; null skips the file export */
  exportDir?: string | null;
};

export type RunBuyerCanonicalizationResult = {
  runId: number;
  map: BuyerCanonicalMap;
  contractsUpdated: number;
};

export type RunCarbonScreeningInput = {
  /** Preloaded reference table; loaded from materialReferencePath otherwise */
  materials?: MaterialProfile[];
  materialReferencePath?: string;
  minSpend?: number;
  /** Directory for carbon_risk_screened.csv; null skips the file export */
  exportDir?: string | null;
};

export type RunCarbonScreeningResult = {
  runId: number;
  records: RiskRecord[];
  summary: ScreeningSummary;
};
