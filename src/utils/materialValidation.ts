/**
 * Material reference validation
 *
 * Enforces the table invariants before rows are compiled into profiles:
 * - every required column is present in the header
 * - material_id is never empty
 * - material_id is unique (the generic sentinel included)
 *
 * Validation is fail-fast: throws on the first problem found.
 */

import type { MaterialReferenceRow } from "@/types";
import { MATERIAL_REFERENCE_COLUMNS } from "@/constants/materials";

/**
 * Error thrown when the material reference table cannot be used
 */
export class MaterialReferenceError extends Error {
  constructor(message: string) {
    super(`Material reference invalid: ${message}`);
    this.name = "MaterialReferenceError";
  }
}

/**
 * Check that the header row carries every required column
 *
 * @throws {MaterialReferenceError} Naming the missing columns
 */
export function validateMaterialHeader(header: readonly string[]): void {
  const missing = MATERIAL_REFERENCE_COLUMNS.filter(
    (column) => !header.includes(column),
  );
  if (missing.length > 0) {
    throw new MaterialReferenceError(
      `missing required column(s): ${missing.join(", ")}`,
    );
  }
}

/**
 * Check row-level invariants
 *
 * @param rows - Rows in table order
 * @throws {MaterialReferenceError} On an empty or duplicate material_id
 */
export function validateMaterialRows(rows: readonly MaterialReferenceRow[]): void {
  const seen = new Set<string>();

  rows.forEach((row, index) => {
    const rowNumber = index + 1;
    const id = row.material_id.trim();

    if (id.length === 0) {
      throw new MaterialReferenceError(`empty material_id on data row ${rowNumber}`);
    }
    if (seen.has(id)) {
      throw new MaterialReferenceError(
        `duplicate material_id "${id}" on data row ${rowNumber}`,
      );
    }
    seen.add(id);
  });
}
