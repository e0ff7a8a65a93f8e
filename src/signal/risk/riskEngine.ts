/**
 * Risk engine: spend → material mass → CO2e → risk tier
 *
 * Each contract yields exactly one RiskRecord. Reference-data gaps are
 * reported through pqeStatus, never thrown:
 *
 *   spend < minSpend         → SKIPPED_LOW_VALUE
 *   no material matched      → SKIPPED_NO_REF
 *   price or factor <= 0     → SKIPPED_INVALID_REF (raw reference values kept)
 *   otherwise                → CALCULATED
 *
 * Derived values are rounded to 2 dp; the tier is taken from the unrounded
 * CO2e estimate.
 */

import type {
  ContractRecord,
  MaterialProfile,
  PqeStatus,
  RiskCategory,
  RiskRecord,
  ScreeningOptions,
  ScreeningSummary,
} from "@/types";
import {
  CO2E_RANGE_HIGH_FACTOR,
  CO2E_RANGE_LOW_FACTOR,
  KG_PER_TONNE,
  MIN_SPEND_GBP,
  RISK_DEFAULT_CATEGORY,
  RISK_THRESHOLDS,
} from "@/constants/risk";
import { matchMaterial } from "@/signal/matcher";
import { parseSpend, roundTo2 } from "@/utils";

const DEFAULT_OPTIONS: ScreeningOptions = { minSpend: MIN_SPEND_GBP };

/**
 * Map an estimate in tonnes CO2e to its risk tier
 *
 * @example
 * classifyRisk(200)  // "MEDIUM"
 * classifyRisk(1000) // "CRITICAL"
 */
export function classifyRisk(co2eTonnes: number): RiskCategory {
  for (const threshold of RISK_THRESHOLDS) {
    if (co2eTonnes >= threshold.minCo2eTonnes) {
      return threshold.category;
    }
  }
  return RISK_DEFAULT_CATEGORY;
}

function contractText(contract: ContractRecord): string {
  return `${contract.title} ${contract.description}`;
}

/**
 * Screen one contract
 */
export function screenContract(
  contract: ContractRecord,
  materials: readonly MaterialProfile[],
  options: ScreeningOptions = DEFAULT_OPTIONS,
): RiskRecord {
  const spend = parseSpend(contract.amount);

  if (spend < options.minSpend) {
    return { contract, spend, pqeStatus: "SKIPPED_LOW_VALUE" };
  }

  const material = matchMaterial(contractText(contract), materials);
  if (!material) {
    return { contract, spend, pqeStatus: "SKIPPED_NO_REF" };
  }

  const price = material.pricePerTonne;
  const factor = material.carbonFactorKgCo2ePerTonne;

  if (!(price > 0) || !(factor > 0)) {
    return {
      contract,
      spend,
      pqeStatus: "SKIPPED_INVALID_REF",
      detectedMaterialId: material.materialId,
      refPrice: material.rawPrice,
      refFactor: material.rawCarbonFactor,
    };
  }

  const tonnes = spend / price;
  const co2e = (tonnes * factor) / KG_PER_TONNE;

  return {
    contract,
    spend,
    pqeStatus: "CALCULATED",
    detectedMaterialId: material.materialId,
    detectedMaterialName: material.materialName,
    appliedPriceRate: price,
    appliedCarbonFactor: factor,
    estimatedTonnes: roundTo2(tonnes),
    estimatedCo2eTonnes: roundTo2(co2e),
    co2eRangeLow: roundTo2(co2e * CO2E_RANGE_LOW_FACTOR),
    co2eRangeHigh: roundTo2(co2e * CO2E_RANGE_HIGH_FACTOR),
    riskCategory: classifyRisk(co2e),
    dataSourceRef: material.sourceReference,
  };
}

/**
 * CO2e estimate used for ordering; null for records without one
 */
export function co2eOf(record: RiskRecord): number | null {
  return record.pqeStatus === "CALCULATED" ? record.estimatedCo2eTonnes : null;
}

/**
 * Sort by estimated CO2e descending, records without an estimate last
 *
 * Stable: equal estimates (and all skipped records) keep input order.
 */
export function sortByCo2eDesc(records: readonly RiskRecord[]): RiskRecord[] {
  return [...records].sort((a, b) => {
    const ca = co2eOf(a);
    const cb = co2eOf(b);
    if (ca === null && cb === null) return 0;
    if (ca === null) return 1;
    if (cb === null) return -1;
    return cb - ca;
  });
}

/**
 * Screen every contract and return the records ranked by CO2e
 */
export function screenContracts(
  contracts: readonly ContractRecord[],
  materials: readonly MaterialProfile[],
  options: ScreeningOptions = DEFAULT_OPTIONS,
): RiskRecord[] {
  const records = contracts.map((contract) =>
    screenContract(contract, materials, options),
  );
  return sortByCo2eDesc(records);
}

/**
 * Count records per status and per risk tier
 */
export function summarizeRisk(records: readonly RiskRecord[]): ScreeningSummary {
  const statuses: Record<PqeStatus, number> = {
    CALCULATED: 0,
    SKIPPED_LOW_VALUE: 0,
    SKIPPED_NO_REF: 0,
    SKIPPED_INVALID_REF: 0,
  };
  const tiers: Record<RiskCategory, number> = {
    LOW: 0,
    MEDIUM: 0,
    HIGH: 0,
    CRITICAL: 0,
  };

  for (const record of records) {
    statuses[record.pqeStatus]++;
    if (record.pqeStatus === "CALCULATED") {
      tiers[record.riskCategory]++;
    }
  }

  return { total: records.length, ...statuses, ...tiers };
}
