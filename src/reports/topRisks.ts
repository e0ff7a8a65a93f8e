/**
 * Console report of the highest carbon risks
 */

import type { RiskRecord } from "@/types";
import { TOP_RISKS_REPORT_SIZE } from "@/constants/risk";

const COLUMNS = ["buyer_name", "title", "est_co2e_tonnes", "detected_material_name"];

/**
 * Format the first `limit` records of an already-sorted list as a text table
 *
 * Columns are left-aligned and padded to their widest cell. Skipped records
 * show empty estimate and material cells.
 */
export function formatTopRisks(
  records: readonly RiskRecord[],
  limit: number = TOP_RISKS_REPORT_SIZE,
): string {
  const rows = records.slice(0, limit).map((record) => {
    const { contract } = record;
    const calculated = record.pqeStatus === "CALCULATED" ? record : null;
    return [
      contract.buyerName ?? contract.buyerNameRaw,
      contract.title,
      calculated ? String(calculated.estimatedCo2eTonnes) : "",
      calculated ? calculated.detectedMaterialName : "",
    ];
  });

  const table = [COLUMNS, ...rows];
  const widths = COLUMNS.map((_, col) =>
    Math.max(...table.map((row) => row[col].length)),
  );

  return table
    .map((row) =>
      row
        .map((cell, col) => cell.padEnd(widths[col]))
        .join("  ")
        .trimEnd(),
    )
    .join("\n");
}
