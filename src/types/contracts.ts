/**
 * Contract record type definitions
 */

/**
 * One civil-works procurement notice, normalized at ingestion time.
 *
 * `amount` keeps whatever the source delivered (number or text);
 * spend parsing is deferred to the risk engine.
 */
export type ContractRecord = {
  /** OCDS ocid, unique across the accumulated set */
  id: string;
  title: string;
  /** Tender description, truncated at ingestion */
  description: string;
  /** CPV classification code, digits only */
  cpvCode: string;
  amount: number | string;
  currency: string;
  publishedDate: string | null;
  buyerNameRaw: string;
  /** Canonical buyer name, null until canonicalization has run */
  buyerName: string | null;
  buyerCountry: string;
  status: string | null;
  source: string;
};
