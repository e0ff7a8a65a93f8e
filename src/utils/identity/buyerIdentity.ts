/**
 * Buyer identity utilities: normalization and cluster key derivation
 */

import { BUYER_ABBREVIATION_RULES } from "@/constants/canonical";

/**
 * Normalize a buyer name for clustering
 *
 * Rules (applied in order):
 * - trim whitespace
 * - lowercase
 * - expand legal/government abbreviations (see BUYER_ABBREVIATION_RULES)
 * - "&" → "and"
 * - collapse repeated whitespace to single spaces
 *
 * @example
 * normalizeBuyerName("  Acme Co & Sons LTD ") // "acme company and sons limited"
 */
export function normalizeBuyerName(raw: string | null | undefined): string {
  if (!raw) return "";

  let normalized = raw.trim().toLowerCase();

  for (const [pattern, replacement] of BUYER_ABBREVIATION_RULES) {
    normalized = normalized.replace(pattern, replacement);
  }

  normalized = normalized.replace(/&/g, "and");
  normalized = normalized.replace(/\s+/g, " ");

  return normalized;
}

function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Uppercase initials of each word
 *
 * @example
 * toAcronym("department for transport") // "DFT"
 */
export function toAcronym(text: string): string {
  return splitWords(text)
    .map((word) => word[0])
    .join("")
    .toUpperCase();
}

/**
 * Derive the cluster key of an already-normalized name
 *
 * Multi-word names key on their acronym; a single word (or an empty name)
 * keys on itself, uppercased. Unrelated single-word names that normalize
 * identically share a key.
 */
export function deriveClusterKey(normalized: string): string {
  return splitWords(normalized).length > 1
    ? toAcronym(normalized)
    : normalized.toUpperCase();
}

/**
 * True when a raw variant is itself written as the acronym key
 *
 * @example
 * isAcronymForm("DfT", "DFT") // true
 */
export function isAcronymForm(variant: string, key: string): boolean {
  return variant.replace(/ /g, "").toUpperCase() === key;
}
