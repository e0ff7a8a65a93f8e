/**
 * Carbon risk screening constants
 */

import type { RiskCategory } from "@/types";

/**
 * Contracts below this spend (GBP) are skipped as SKIPPED_LOW_VALUE
 */
export const MIN_SPEND_GBP = 5000;

/**
 * Uncertainty band applied around the CO2e estimate (±25%)
 */
export const CO2E_RANGE_LOW_FACTOR = 0.75;
export const CO2E_RANGE_HIGH_FACTOR = 1.25;

export const KG_PER_TONNE = 1000;

/**
 * Risk tiers by estimated tonnes CO2e, checked top-down (inclusive lower bound)
 */
export const RISK_THRESHOLDS: ReadonlyArray<{
  category: RiskCategory;
  minCo2eTonnes: number;
}> = [
  { category: "CRITICAL", minCo2eTonnes: 1000 },
  { category: "HIGH", minCo2eTonnes: 250 },
  { category: "MEDIUM", minCo2eTonnes: 50 },
];

export const RISK_DEFAULT_CATEGORY: RiskCategory = "LOW";

/**
 * Number of rows shown by the console report
 */
export const TOP_RISKS_REPORT_SIZE = 5;
