/**
 * Contracts Finder API constants
 */

export const CONTRACTS_FINDER_SEARCH_URL =
  "https://www.contractsfinder.service.gov.uk/Published/Notices/OCDS/Search";

/**
 * Source label stored on every ingested contract
 */
export const CONTRACTS_FINDER_SOURCE = "UK Contracts Finder";

/**
 * Cursor key for the persisted "next" link
 */
export const CONTRACTS_FINDER_CURSOR_KEY = "contracts-finder";

export const CONTRACTS_FINDER_DEFAULT_PUBLISHED_FROM = "2025-01-01";
export const CONTRACTS_FINDER_DEFAULT_PUBLISHED_TO = "2025-12-31";
export const CONTRACTS_FINDER_DEFAULT_PAGE_LIMIT = 100;

/**
 * Pause between pages; the API has an undocumented rate limit
 */
export const CONTRACTS_FINDER_INTER_PAGE_DELAY_MS = 700;

export const CONTRACTS_FINDER_DESCRIPTION_MAX_LENGTH = 500;

export const DEFAULT_CURRENCY = "GBP";
export const DEFAULT_BUYER_COUNTRY = "GB";
export const UNKNOWN_TEXT = "Unknown";
