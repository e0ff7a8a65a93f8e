/**
 * Contract subset filters applied between ingestion and the analytical stages
 */

import type { ContractRecord } from "@/types";
import { STRICT_CIVIL_WORKS_CPV_PREFIXES } from "@/constants/civilWorks";
import { parseSpend } from "@/utils";

/**
 * Keep contracts whose CPV code starts with one of the strict prefixes
 */
export function filterStrictCivilWorks(
  contracts: readonly ContractRecord[],
  prefixes: readonly string[] = STRICT_CIVIL_WORKS_CPV_PREFIXES,
): ContractRecord[] {
  return contracts.filter((contract) => {
    const code = contract.cpvCode.trim();
    return prefixes.some((prefix) => code.startsWith(prefix));
  });
}

/**
 * Drop contracts whose parsed spend is zero or unparsable
 */
export function filterPositiveSpend(
  contracts: readonly ContractRecord[],
): ContractRecord[] {
  return contracts.filter((contract) => parseSpend(contract.amount) > 0);
}
