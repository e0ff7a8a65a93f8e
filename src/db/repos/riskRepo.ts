/**
 * Contract risk repository
 *
 * Data access layer for contract_risk table (screening output snapshot).
 */

import type { ContractRiskRow, RiskRecord } from "@/types";
import { getDb } from "@/db/connection";

type ContractRiskInsert = Omit<ContractRiskRow, "screened_at">;

/**
 * Flatten a tagged risk record into its table row
 *
 * @param record - Screened contract
 * @param rank - 1-based position in the sorted output
 */
export function toContractRiskRow(
  record: RiskRecord,
  rank: number,
): ContractRiskInsert {
  const { contract } = record;
  const base: ContractRiskInsert = {
    id: contract.id,
    rank,
    title: contract.title,
    cpv_code: contract.cpvCode,
    buyer_name: contract.buyerName ?? contract.buyerNameRaw,
    buyer_name_raw: contract.buyerNameRaw,
    buyer_country: contract.buyerCountry,
    published_date: contract.publishedDate,
    spend_gbp: record.spend,
    pqe_status: record.pqeStatus,
    detected_material_id: null,
    detected_material_name: null,
    applied_price_rate: null,
    applied_carbon_factor: null,
    est_material_tonnes: null,
    est_co2e_tonnes: null,
    co2e_range_low: null,
    co2e_range_high: null,
    risk_category: null,
    data_source_ref: null,
    ref_price: null,
    ref_factor: null,
  };

  switch (record.pqeStatus) {
    case "CALCULATED":
      return {
        ...base,
        detected_material_id: record.detectedMaterialId,
        detected_material_name: record.detectedMaterialName,
        applied_price_rate: record.appliedPriceRate,
        applied_carbon_factor: record.appliedCarbonFactor,
        est_material_tonnes: record.estimatedTonnes,
        est_co2e_tonnes: record.estimatedCo2eTonnes,
        co2e_range_low: record.co2eRangeLow,
        co2e_range_high: record.co2eRangeHigh,
        risk_category: record.riskCategory,
        data_source_ref: record.dataSourceRef,
      };
    case "SKIPPED_INVALID_REF":
      return {
        ...base,
        detected_material_id: record.detectedMaterialId,
        ref_price: record.refPrice,
        ref_factor: record.refFactor,
      };
    default:
      return base;
  }
}

/**
 * Replace the screening snapshot with the given sorted records
 *
 * @returns Number of rows written
 */
export function replaceContractRisk(records: RiskRecord[]): number {
  const db = getDb();
  const insert = db.prepare(
    `
    INSERT INTO contract_risk (
      id, rank, title, cpv_code, buyer_name, buyer_name_raw, buyer_country,
      published_date, spend_gbp, pqe_status, detected_material_id,
      detected_material_name, applied_price_rate, applied_carbon_factor,
      est_material_tonnes, est_co2e_tonnes, co2e_range_low, co2e_range_high,
      risk_category, data_source_ref, ref_price, ref_factor
    )
    VALUES (
      @id, @rank, @title, @cpv_code, @buyer_name, @buyer_name_raw, @buyer_country,
      @published_date, @spend_gbp, @pqe_status, @detected_material_id,
      @detected_material_name, @applied_price_rate, @applied_carbon_factor,
      @est_material_tonnes, @est_co2e_tonnes, @co2e_range_low, @co2e_range_high,
      @risk_category, @data_source_ref, @ref_price, @ref_factor
    )
  `,
  );

  const replaceAll = db.transaction((batch: RiskRecord[]) => {
    db.prepare("DELETE FROM contract_risk").run();
    batch.forEach((record, index) => {
      insert.run(toContractRiskRow(record, index + 1));
    });
    return batch.length;
  });

  return replaceAll(records);
}

/**
 * List the screening snapshot in rank order
 *
 * @param limit - Optional maximum number of rows
 */
export function listContractRisk(limit?: number): ContractRiskRow[] {
  const db = getDb();
  if (limit !== undefined) {
    return db
      .prepare<[number], ContractRiskRow>(
        "SELECT * FROM contract_risk ORDER BY rank LIMIT ?",
      )
      .all(limit);
  }
  return db
    .prepare<[], ContractRiskRow>("SELECT * FROM contract_risk ORDER BY rank")
    .all();
}
