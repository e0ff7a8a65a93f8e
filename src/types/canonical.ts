/**
 * Buyer canonicalization type definitions
 */

export type BuyerVariant = {
  name: string;
  /** Occurrences of this exact raw string in the input */
  count: number;
};

/**
 * Raw buyer names sharing one normalization key
 */
export type BuyerCluster = {
  key: string;
  /** Distinct raw names, first-seen order */
  variants: BuyerVariant[];
  canonical: string;
};

/**
 * One row of the buyer map artifact
 */
export type BuyerMapEntry = {
  buyerNameRaw: string;
  buyerNameCanonical: string;
};

export type BuyerCanonicalMap = {
  clusters: BuyerCluster[];
  entries: BuyerMapEntry[];
  /** raw -> canonical lookup */
  lookup: Map<string, string>;
};
