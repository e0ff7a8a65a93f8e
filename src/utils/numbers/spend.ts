/**
 * Numeric helpers for monetary text
 */

/**
 * Parse a raw amount leniently into a number
 *
 * Every character other than a digit or "." is stripped before parsing.
 * Missing, empty or unparsable input resolves to 0; this never throws.
 *
 * @example
 * parseSpend("£4,999.50") // 4999.5
 * parseSpend(120000)      // 120000
 * parseSpend("n/a")       // 0
 * parseSpend("1.2.3")     // 0
 */
export function parseSpend(raw: unknown): number {
  if (raw === null || raw === undefined) {
    return 0;
  }

  const cleaned = String(raw).replace(/[^\d.]/g, "");
  if (cleaned === "") {
    return 0;
  }

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : 0;
}

/**
 * Round to 2 decimal places
 */
export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}
