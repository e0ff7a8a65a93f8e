/**
 * Database type definitions
 *
 * Row shapes for the tables created in migrations/0001_init.sql
 */

import type { PqeStatus, RiskCategory } from "./risk";
import type { RunStatus } from "./ingestion";

/**
 * Contract row (stored in contracts table)
 */
export type ContractRow = {
  id: string;
  title: string;
  description: string;
  cpv_code: string;
  /** Untyped column: number or raw text as delivered by the source */
  amount: number | string | null;
  currency: string;
  published_date: string | null;
  buyer_name_raw: string;
  buyer_name: string | null;
  buyer_country: string;
  tender_status: string | null;
  source: string;
  ingested_at: string;
  updated_at: string;
};

/**
 * Pagination cursor row (stored in ingestion_cursor table)
 */
export type CursorRow = {
  cursor_key: string;
  token: string;
  updated_at: string;
};

/**
 * Stage run entity (stored in ingestion_runs table)
 */
export type IngestionRun = {
  id: number;
  stage: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus | null;
  counters_json: string | null;
  notes: string | null;
};

export type IngestionRunInput = {
  stage: string;
};

export type IngestionRunUpdate = {
  finished_at?: string;
  status?: RunStatus;
  counters?: Record<string, number>;
  notes?: string | null;
};

/**
 * Buyer map row (stored in buyer_canonical_map table)
 */
export type BuyerMapRow = {
  buyer_name_raw: string;
  buyer_name_canonical: string;
  cluster_key: string;
};

/**
 * Screened contract row (stored in contract_risk table)
 */
export type ContractRiskRow = {
  id: string;
  rank: number;
  title: string;
  cpv_code: string;
  buyer_name: string;
  buyer_name_raw: string;
  buyer_country: string;
  published_date: string | null;
  spend_gbp: number;
  pqe_status: PqeStatus;
  detected_material_id: string | null;
  detected_material_name: string | null;
  applied_price_rate: number | null;
  applied_carbon_factor: number | null;
  est_material_tonnes: number | null;
  est_co2e_tonnes: number | null;
  co2e_range_low: number | null;
  co2e_range_high: number | null;
  risk_category: RiskCategory | null;
  data_source_ref: string | null;
  ref_price: string | null;
  ref_factor: string | null;
  screened_at: string;
};
