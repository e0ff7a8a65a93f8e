/**
 * Contracts Finder OCDS search payload types
 *
 * Only the fields read by the mappers are described. Everything arrives as
 * untrusted JSON, so each field is `unknown` until a mapper narrows it.
 */

export type JsonObject = Record<string, unknown>;

/**
 * One OCDS release as delivered by /Published/Notices/OCDS/Search
 *
 * Relevant paths:
 * - ocid
 * - date
 * - tender.{title, description, status, classification, value}
 * - classification (release-level fallback)
 * - value (release-level fallback)
 * - buyer.{id, name}
 * - parties[].{id, address.countryName}
 */
export type OcdsRelease = JsonObject;

/**
 * Search response page after shape validation
 */
export type ContractsFinderPage = {
  releases: OcdsRelease[];
  /** links.next, when present */
  nextUrl: string | null;
};

/**
 * Value extracted from tender/release
 */
export type ExtractedValue = {
  amount: number | string;
  currency: string;
};
