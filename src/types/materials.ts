/**
 * Material reference type definitions
 *
 * The reference table is ordered most-specific first. Matchers consult rows
 * in table order and fall back to the generic sentinel row last.
 */

/**
 * Raw CSV row shape of the material reference table
 */
export type MaterialReferenceRow = {
  material_id: string;
  material_name: string;
  /** Pipe-delimited keyword triggers */
  keywords: string;
  composite_price_gbp_per_tonne: string;
  carbon_factor_kgco2e_per_tonne: string;
  ice_source_ref: string;
};

export type MaterialProfile = {
  materialId: string;
  materialName: string;
  /** Lowercase trigger substrings in table order */
  keywords: string[];
  /** GBP per tonne; 0 when the reference value is missing or unparsable */
  pricePerTonne: number;
  /** kg CO2e per tonne; 0 when missing or unparsable */
  carbonFactorKgCo2ePerTonne: number;
  sourceReference: string;
  /** Reference values as written in the table, kept for diagnostics */
  rawPrice: string;
  rawCarbonFactor: string;
};
