/**
 * CPV classification constants
 */

/**
 * Sentinel for notices without a usable CPV code
 */
export const UNKNOWN_CPV = "UNKNOWN";

/**
 * CPV prefixes accepted at ingestion time (broad)
 * - 45: Construction work
 * - 71: Architectural, engineering and construction-related services
 */
export const DEFAULT_ACCEPTED_CPV_PREFIXES = ["45", "71"];

/**
 * Strict civil-works subset applied before canonicalization and screening
 * - 451:  Site preparation, demolition, test drilling
 * - 4520: Complete or part construction and civil engineering works
 * - 4522: Engineering works (bridges, tunnels, shafts, subways)
 * - 4523: Pipelines, highways, roads, railways, airfields
 * - 4524: Water projects (dams, canals, dredging, flood defence)
 * - 4525: Industrial plant, mining, manufacturing facilities
 */
export const STRICT_CIVIL_WORKS_CPV_PREFIXES = [
  "451",
  "4520",
  "4522",
  "4523",
  "4524",
  "4525",
] as const;
