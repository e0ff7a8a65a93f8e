/**
 * Database constants
 */

/**
 * Database file used when DB_PATH is unset, relative to the working directory
 */
export const DEFAULT_DB_PATH = "data/app.db";

export const IN_MEMORY_DB_PATH = ":memory:";
