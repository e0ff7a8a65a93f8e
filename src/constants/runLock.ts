/**
 * Run lock constants
 *
 * One batch at a time: the ingestion cursor and the regenerated output
 * tables are shared by every run against the same database.
 */

export const RUN_LOCK_NAME = "batch";

/**
 * Lock TTL in seconds; an expired lock can be taken over by a new run.
 * A full-year ingestion runs for a few hours at the inter-page delay.
 */
export const RUN_LOCK_TTL_SECONDS = 6 * 3600;
