/**
 * Material reference loading
 *
 * Reads the material reference CSV, validates it, and compiles each row into
 * a MaterialProfile. Row order is preserved: it encodes match priority.
 */

import * as fs from "fs";
import * as path from "path";
import { parse } from "csv-parse/sync";
import type { MaterialProfile, MaterialReferenceRow } from "@/types";
import {
  GENERIC_MATERIAL_ID,
  MATERIAL_KEYWORD_SEPARATOR,
  MATERIAL_REFERENCE_PATH,
} from "@/constants/materials";
import {
  MaterialReferenceError,
  validateMaterialHeader,
  validateMaterialRows,
} from "@/utils/materialValidation";
import { decodeWithFallback } from "@/utils/text/encoding";
import * as logger from "@/logger";

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"),
    )
  );
}

/**
 * Parse a reference value; missing or unparsable → 0
 */
function parseReferenceNumber(raw: string): number {
  const trimmed = raw.trim();
  if (trimmed === "") return 0;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : 0;
}

function parseKeywords(raw: string): string[] {
  return raw
    .split(MATERIAL_KEYWORD_SEPARATOR)
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length > 0);
}

/**
 * Turn header + cell rows into named reference rows
 */
function toReferenceRows(
  header: readonly string[],
  cells: readonly string[][],
): MaterialReferenceRow[] {
  const cell = (row: readonly string[], column: keyof MaterialReferenceRow) =>
    row[header.indexOf(column)] ?? "";

  return cells.map((row) => ({
    material_id: cell(row, "material_id"),
    material_name: cell(row, "material_name"),
    keywords: cell(row, "keywords"),
    composite_price_gbp_per_tonne: cell(row, "composite_price_gbp_per_tonne"),
    carbon_factor_kgco2e_per_tonne: cell(row, "carbon_factor_kgco2e_per_tonne"),
    ice_source_ref: cell(row, "ice_source_ref"),
  }));
}

/**
 * Compile a validated row into its runtime profile
 */
export function toMaterialProfile(row: MaterialReferenceRow): MaterialProfile {
  return {
    materialId: row.material_id.trim(),
    materialName: row.material_name.trim(),
    keywords: parseKeywords(row.keywords),
    pricePerTonne: parseReferenceNumber(row.composite_price_gbp_per_tonne),
    carbonFactorKgCo2ePerTonne: parseReferenceNumber(
      row.carbon_factor_kgco2e_per_tonne,
    ),
    sourceReference: row.ice_source_ref.trim(),
    rawPrice: row.composite_price_gbp_per_tonne,
    rawCarbonFactor: row.carbon_factor_kgco2e_per_tonne,
  };
}

/**
 * Parse material reference CSV text into profiles
 *
 * @throws {MaterialReferenceError} If the table is empty or breaks an invariant
 */
export function parseMaterialReference(text: string): MaterialProfile[] {
  const parsed: unknown = parse(text, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  if (!isStringMatrix(parsed) || parsed.length === 0) {
    throw new MaterialReferenceError("table has no header row");
  }

  const [headerRow, ...cells] = parsed;
  const header = headerRow.map((column) => column.trim());
  validateMaterialHeader(header);

  const rows = toReferenceRows(header, cells);
  validateMaterialRows(rows);

  const profiles = rows.map(toMaterialProfile);

  if (!profiles.some((p) => p.materialId.toUpperCase() === GENERIC_MATERIAL_ID)) {
    logger.warn("Material reference has no generic fallback row", {
      expected: GENERIC_MATERIAL_ID,
    });
  }

  return profiles;
}

/**
 * Load the material reference table from disk
 *
 * Bytes are decoded as UTF-8, or as Latin-1 if they are not valid UTF-8.
 *
 * @param filePath - Path to the CSV; relative paths resolve against the cwd
 * @throws {MaterialReferenceError} If the file is missing or invalid
 */
export function loadMaterialReference(
  filePath: string = MATERIAL_REFERENCE_PATH,
): MaterialProfile[] {
  const resolved = path.resolve(process.cwd(), filePath);

  if (!fs.existsSync(resolved)) {
    throw new MaterialReferenceError(`file not found: ${resolved}`);
  }

  const { text, encoding } = decodeWithFallback(fs.readFileSync(resolved));
  const profiles = parseMaterialReference(text);

  logger.info("Loaded material reference", {
    path: resolved,
    encoding,
    materials: profiles.length,
  });

  return profiles;
}
