/**
 * CSV exports of the screening output and the buyer map
 *
 * Files are written UTF-8 with a BOM so spreadsheet tools detect the encoding.
 */

import * as fs from "fs";
import * as path from "path";
import { stringify } from "csv-stringify/sync";
import type { BuyerCanonicalMap, RiskRecord } from "@/types";
import { toContractRiskRow } from "@/db/repos/riskRepo";
import {
  BUYER_MAP_EXPORT_FILENAME,
  EXPORT_DIR,
  RISK_EXPORT_FILENAME,
} from "@/constants/exports";
import * as logger from "@/logger";

/**
 * Column order of the risk export
 */
export const RISK_EXPORT_COLUMNS = [
  "rank",
  "id",
  "title",
  "cpv_code",
  "buyer_name",
  "buyer_name_raw",
  "buyer_country",
  "published_date",
  "spend_gbp",
  "pqe_status",
  "detected_material_id",
  "detected_material_name",
  "applied_price_rate",
  "applied_carbon_factor",
  "est_material_tonnes",
  "est_co2e_tonnes",
  "co2e_range_low",
  "co2e_range_high",
  "risk_category",
  "data_source_ref",
  "ref_price",
  "ref_factor",
] as const;

export const BUYER_MAP_EXPORT_COLUMNS = [
  "buyer_name_raw",
  "buyer_name_canonical",
] as const;

/**
 * Render sorted risk records as CSV text (with BOM)
 */
export function renderRiskCsv(records: readonly RiskRecord[]): string {
  const rows = records.map((record, index) => toContractRiskRow(record, index + 1));
  return stringify(rows, {
    bom: true,
    header: true,
    columns: [...RISK_EXPORT_COLUMNS],
  });
}

/**
 * Render the buyer map as CSV text (with BOM), one row per raw variant
 */
export function renderBuyerMapCsv(map: BuyerCanonicalMap): string {
  const rows = map.entries.map((entry) => ({
    buyer_name_raw: entry.buyerNameRaw,
    buyer_name_canonical: entry.buyerNameCanonical,
  }));
  return stringify(rows, {
    bom: true,
    header: true,
    columns: [...BUYER_MAP_EXPORT_COLUMNS],
  });
}

function writeExport(dir: string, filename: string, content: string): string {
  const target = path.resolve(process.cwd(), dir, filename);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content, "utf-8");
  return target;
}

/**
 * Write the screening output CSV
 *
 * @returns Absolute path of the written file
 */
export function exportRiskRecordsCsv(
  records: readonly RiskRecord[],
  dir: string = EXPORT_DIR,
): string {
  const target = writeExport(dir, RISK_EXPORT_FILENAME, renderRiskCsv(records));
  logger.info("Wrote risk export", { path: target, rows: records.length });
  return target;
}

/**
 * Write the buyer canonical map CSV
 *
 * @returns Absolute path of the written file
 */
export function exportBuyerMapCsv(
  map: BuyerCanonicalMap,
  dir: string = EXPORT_DIR,
): string {
  const target = writeExport(dir, BUYER_MAP_EXPORT_FILENAME, renderBuyerMapCsv(map));
  logger.info("Wrote buyer map export", { path: target, rows: map.entries.length });
  return target;
}
