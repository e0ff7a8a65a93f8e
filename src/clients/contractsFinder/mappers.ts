/**
 * Contracts Finder OCDS payload mappers: convert raw releases to ContractRecord
 *
 * Missing or malformed fields resolve to safe defaults ("UNKNOWN" CPV,
 * zero amount, "Unknown" text) instead of throwing; the prefix filter in
 * the ingestor is what drops unusable records.
 */

import type { ContractRecord } from "@/types";
import type {
  JsonObject,
  OcdsRelease,
  ContractsFinderPage,
  ExtractedValue,
} from "@/types/clients/contractsFinder";
import { UNKNOWN_CPV } from "@/constants/civilWorks";
import {
  CONTRACTS_FINDER_SOURCE,
  CONTRACTS_FINDER_DESCRIPTION_MAX_LENGTH,
  DEFAULT_BUYER_COUNTRY,
  DEFAULT_CURRENCY,
  UNKNOWN_TEXT,
} from "@/constants/clients/contractsFinder";

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asObject(value: unknown): JsonObject | undefined {
  return isJsonObject(value) ? value : undefined;
}

function asNonEmptyString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Reduce a raw classification id to its digits
 *
 * @example
 * normalizeCpv("45210000-2") // "452100002"
 * normalizeCpv("n/a")        // "UNKNOWN"
 */
export function normalizeCpv(raw: unknown): string {
  if (raw === undefined || raw === null || raw === "") {
    return UNKNOWN_CPV;
  }
  const digits = String(raw).replace(/\D/g, "");
  return digits.length > 0 ? digits : UNKNOWN_CPV;
}

/**
 * Extract the CPV code of a release
 *
 * Lookup order:
 * 1. tender.classification as a single object
 * 2. first element of tender.classification (list form) carrying an id
 * 3. release.classification
 */
export function extractCpv(
  tender: JsonObject | undefined,
  release: OcdsRelease,
): string {
  const classification = tender?.classification;

  if (isJsonObject(classification)) {
    return normalizeCpv(classification.id);
  }

  if (Array.isArray(classification)) {
    for (const entry of classification) {
      if (isJsonObject(entry) && entry.id) {
        return normalizeCpv(entry.id);
      }
    }
  }

  const releaseClassification = asObject(release.classification);
  if (releaseClassification) {
    return normalizeCpv(releaseClassification.id);
  }

  return UNKNOWN_CPV;
}

/**
 * Extract monetary value from tender, then release
 *
 * The first object whose `value.amount` is present wins; otherwise 0 GBP.
 */
export function extractValue(
  tender: JsonObject | undefined,
  release: OcdsRelease,
): ExtractedValue {
  for (const source of [tender, release]) {
    const value = asObject(source?.value);
    if (!value) continue;

    const amount = value.amount;
    if (typeof amount === "number" || typeof amount === "string") {
      return {
        amount,
        currency: asNonEmptyString(value.currency) ?? DEFAULT_CURRENCY,
      };
    }
  }

  return { amount: 0, currency: DEFAULT_CURRENCY };
}

/**
 * Resolve the buyer's country from the parties list
 *
 * Every party whose id equals the buyer id is consulted; the last one wins.
 */
export function extractBuyerCountry(release: OcdsRelease): string {
  const buyerId = asObject(release.buyer)?.id;
  const parties = Array.isArray(release.parties) ? release.parties : [];

  let country = DEFAULT_BUYER_COUNTRY;
  for (const party of parties) {
    if (!isJsonObject(party) || party.id !== buyerId) continue;
    country =
      asNonEmptyString(asObject(party.address)?.countryName) ??
      DEFAULT_BUYER_COUNTRY;
  }
  return country;
}

/**
 * Validate a search response body into a page
 *
 * @throws {Error} If the body is not a JSON object
 */
export function parseSearchPage(body: unknown): ContractsFinderPage {
  if (!isJsonObject(body)) {
    throw new Error(
      `Malformed search response: expected JSON object, got ${body === null ? "null" : typeof body}`,
    );
  }

  const releases = Array.isArray(body.releases)
    ? body.releases.filter(isJsonObject)
    : [];
  const nextUrl = asNonEmptyString(asObject(body.links)?.next) ?? null;

  return { releases, nextUrl };
}

/**
 * Map a release whose CPV has already been extracted to a ContractRecord
 *
 * @param release - Raw OCDS release
 * @param id - Release ocid
 * @param cpvCode - Normalized CPV code
 * @param descriptionMaxLength - Description is truncated to this many characters
 */
export function mapReleaseToContract(
  release: OcdsRelease,
  id: string,
  cpvCode: string,
  descriptionMaxLength: number = CONTRACTS_FINDER_DESCRIPTION_MAX_LENGTH,
): ContractRecord {
  const tender = asObject(release.tender);
  const { amount, currency } = extractValue(tender, release);
  const buyer = asObject(release.buyer);
  const description = asNonEmptyString(tender?.description) ?? "";

  return {
    id,
    title: asNonEmptyString(tender?.title) ?? UNKNOWN_TEXT,
    description: description.slice(0, descriptionMaxLength),
    cpvCode,
    amount,
    currency,
    publishedDate: asNonEmptyString(release.date) ?? null,
    buyerNameRaw: asNonEmptyString(buyer?.name) ?? UNKNOWN_TEXT,
    buyerName: null,
    buyerCountry: extractBuyerCountry(release),
    status: asNonEmptyString(tender?.status) ?? null,
    source: CONTRACTS_FINDER_SOURCE,
  };
}
