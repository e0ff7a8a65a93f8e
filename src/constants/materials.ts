/**
 * Material reference constants
 */

/**
 * Default path of the material reference table (relative to project root)
 */
export const MATERIAL_REFERENCE_PATH = "data/material_reference.csv";

/**
 * material_id of the generic fallback row
 */
export const GENERIC_MATERIAL_ID = "MAT_GEN";

/**
 * Columns the reference table must provide
 */
export const MATERIAL_REFERENCE_COLUMNS = [
  "material_id",
  "material_name",
  "keywords",
  "composite_price_gbp_per_tonne",
  "carbon_factor_kgco2e_per_tonne",
  "ice_source_ref",
] as const;

export const MATERIAL_KEYWORD_SEPARATOR = "|";
