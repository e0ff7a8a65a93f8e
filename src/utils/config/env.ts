/**
 * Environment variable readers
 *
 * Empty or unset variables resolve to the provided default. Invalid values
 * log a warning and also fall back to the default.
 */

import * as logger from "@/logger";

/**
 * Read a string variable, falling back when unset or blank
 */
export function readEnvString(name: string, fallback: string): string {
  const raw = process.env[name]?.trim();
  return raw ? raw : fallback;
}

/**
 * Read a finite number variable
 *
 * @example
 * // MIN_SPEND_GBP="abc"
 * readEnvNumber("MIN_SPEND_GBP", 5000) // 5000 (warning logged)
 */
export function readEnvNumber(name: string, fallback: number): number {
  const raw = process.env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn("Invalid numeric environment variable, using default", {
      name,
      value: raw,
      fallback,
    });
    return fallback;
  }
  return value;
}

/**
 * Read a comma-separated list variable
 *
 * Entries are trimmed; empty entries are dropped. A list that ends up empty
 * falls back to the default.
 */
export function readEnvList(name: string, fallback: readonly string[]): string[] {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") {
    return [...fallback];
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    logger.warn("Empty list environment variable, using default", { name });
    return [...fallback];
  }
  return items;
}
