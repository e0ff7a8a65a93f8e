/**
 * Buyer name normalization rules
 *
 * Applied in order after trim + lowercase.
 */
export const BUYER_ABBREVIATION_RULES: ReadonlyArray<
  readonly [pattern: RegExp, replacement: string]
> = [
  [/\b(ltd\.?|limited)\b/g, "limited"],
  [/\b(plc\.?)\b/g, "plc"],
  [/\b(co\.?)\b/g, "company"],
  [/\b(gov\.?|govt)\b/g, "government"],
];
