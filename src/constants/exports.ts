/**
 * CSV export constants
 */

export const EXPORT_DIR = "data/exports";
export const RISK_EXPORT_FILENAME = "carbon_risk_screened.csv";
export const BUYER_MAP_EXPORT_FILENAME = "buyer_canonical_map.csv";
