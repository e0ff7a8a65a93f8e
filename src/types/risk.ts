/**
 * Carbon risk screening type definitions
 */

import type { ContractRecord } from "./contracts";

export type PqeStatus =
  | "CALCULATED"
  | "SKIPPED_LOW_VALUE"
  | "SKIPPED_NO_REF"
  | "SKIPPED_INVALID_REF";

export type RiskCategory = "LOW" | "MEDIUM" | "HIGH" | "CRITICAL";

type RiskRecordBase = {
  contract: ContractRecord;
  /** Spend parsed from contract.amount */
  spend: number;
};

export type CalculatedRiskRecord = RiskRecordBase & {
  pqeStatus: "CALCULATED";
  detectedMaterialId: string;
  detectedMaterialName: string;
  appliedPriceRate: number;
  appliedCarbonFactor: number;
  estimatedTonnes: number;
  estimatedCo2eTonnes: number;
  co2eRangeLow: number;
  co2eRangeHigh: number;
  riskCategory: RiskCategory;
  dataSourceRef: string;
};

export type InvalidRefRiskRecord = RiskRecordBase & {
  pqeStatus: "SKIPPED_INVALID_REF";
  detectedMaterialId: string;
  refPrice: string;
  refFactor: string;
};

export type SkippedRiskRecord = RiskRecordBase & {
  pqeStatus: "SKIPPED_LOW_VALUE" | "SKIPPED_NO_REF";
};

export type RiskRecord =
  | CalculatedRiskRecord
  | InvalidRefRiskRecord
  | SkippedRiskRecord;

export type ScreeningOptions = {
  /** Contracts below this spend are not classified */
  minSpend: number;
};

export type ScreeningSummary = Record<PqeStatus, number> &
  Record<RiskCategory, number> & { total: number };
