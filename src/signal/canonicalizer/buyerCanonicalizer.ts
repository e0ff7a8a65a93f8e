/**
 * Buyer canonicalizer: resolve spelling variants of one buyer to a single name
 *
 * Names are clustered by an acronym key (see deriveClusterKey). Within a
 * cluster the canonical name is the first variant written as the acronym
 * itself; failing that, the most frequent variant, ties going to the one
 * seen first.
 *
 * The result is a pure function of the full input list: running it twice on
 * the same names yields the same map.
 */

import type {
  BuyerCanonicalMap,
  BuyerCluster,
  BuyerMapEntry,
  BuyerVariant,
  ContractRecord,
} from "@/types";
import {
  deriveClusterKey,
  isAcronymForm,
  normalizeBuyerName,
} from "@/utils";

/**
 * Pick the canonical name of one cluster
 */
export function chooseCanonical(key: string, variants: BuyerVariant[]): string {
  const acronymForm = variants.find((v) => isAcronymForm(v.name, key));
  if (acronymForm) {
    return acronymForm.name;
  }

  // Strict ">" keeps the first-seen variant on ties
  let best = variants[0];
  for (const variant of variants) {
    if (variant.count > best.count) {
      best = variant;
    }
  }
  return best.name;
}

/**
 * Build the canonical map for a list of raw buyer names
 *
 * @param names - Raw buyer names, one entry per occurrence (repeats count)
 */
export function buildBuyerCanonicalMap(names: readonly string[]): BuyerCanonicalMap {
  const clusterVariants = new Map<string, Map<string, BuyerVariant>>();

  for (const name of names) {
    const key = deriveClusterKey(normalizeBuyerName(name));

    let variants = clusterVariants.get(key);
    if (!variants) {
      variants = new Map();
      clusterVariants.set(key, variants);
    }

    const existing = variants.get(name);
    if (existing) {
      existing.count++;
    } else {
      variants.set(name, { name, count: 1 });
    }
  }

  const clusters: BuyerCluster[] = [];
  const entries: BuyerMapEntry[] = [];
  const lookup = new Map<string, string>();

  for (const [key, variantMap] of clusterVariants) {
    const variants = [...variantMap.values()];
    const canonical = chooseCanonical(key, variants);
    clusters.push({ key, variants, canonical });

    for (const variant of variants) {
      entries.push({ buyerNameRaw: variant.name, buyerNameCanonical: canonical });
      lookup.set(variant.name, canonical);
    }
  }

  return { clusters, entries, lookup };
}

/**
 * Return copies of the contracts with `buyerName` set to the canonical name
 *
 * Buyers missing from the map keep their raw name.
 */
export function applyCanonicalMap(
  contracts: readonly ContractRecord[],
  map: BuyerCanonicalMap,
): ContractRecord[] {
  return contracts.map((contract) => ({
    ...contract,
    buyerName: map.lookup.get(contract.buyerNameRaw) ?? contract.buyerNameRaw,
  }));
}
