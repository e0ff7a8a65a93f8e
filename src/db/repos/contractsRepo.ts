/**
 * Contracts repository
 *
 * Data access layer for contracts table.
 */

import type { ContractRecord, ContractRow } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Map a contracts row to the domain record
 */
export function toContractRecord(row: ContractRow): ContractRecord {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    cpvCode: row.cpv_code,
    amount: row.amount ?? 0,
    currency: row.currency,
    publishedDate: row.published_date,
    buyerNameRaw: row.buyer_name_raw,
    buyerName: row.buyer_name,
    buyerCountry: row.buyer_country,
    status: row.tender_status,
    source: row.source,
  };
}

/**
 * Upsert contracts based on PRIMARY KEY(id), in a single transaction
 *
 * A re-ingested contract refreshes its source fields; the canonical buyer
 * name is left alone (it is owned by the canonicalization stage).
 *
 * @returns Number of contracts written
 */
export function upsertContracts(contracts: ContractRecord[]): number {
  const db = getDb();

  const statement = db.prepare(
    `
    INSERT INTO contracts (
      id, title, description, cpv_code, amount, currency,
      published_date, buyer_name_raw, buyer_country, tender_status, source
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(id) DO UPDATE SET
      title = excluded.title,
      description = excluded.description,
      cpv_code = excluded.cpv_code,
      amount = excluded.amount,
      currency = excluded.currency,
      published_date = excluded.published_date,
      buyer_name_raw = excluded.buyer_name_raw,
      buyer_country = excluded.buyer_country,
      tender_status = excluded.tender_status,
      source = excluded.source,
      updated_at = datetime('now')
  `,
  );

  const writeAll = db.transaction((batch: ContractRecord[]) => {
    for (const c of batch) {
      statement.run(
        c.id,
        c.title,
        c.description,
        c.cpvCode,
        c.amount,
        c.currency,
        c.publishedDate,
        c.buyerNameRaw,
        c.buyerCountry,
        c.status,
        c.source,
      );
    }
  });

  writeAll(contracts);
  return contracts.length;
}

/**
 * List all contracts in ingestion order
 */
export function listContracts(): ContractRecord[] {
  const db = getDb();
  return db
    .prepare<[], ContractRow>("SELECT * FROM contracts ORDER BY rowid")
    .all()
    .map(toContractRecord);
}

/**
 * Get contract by id
 */
export function getContractById(id: string): ContractRecord | null {
  const db = getDb();
  const row = db
    .prepare<[string], ContractRow>("SELECT * FROM contracts WHERE id = ?")
    .get(id);
  return row ? toContractRecord(row) : null;
}

export function countContracts(): number {
  const db = getDb();
  const row = db
    .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM contracts")
    .get();
  return row?.n ?? 0;
}

/**
 * Persist buyer_name for contracts that went through canonicalization
 *
 * A contract without a canonical name stores its raw name.
 *
 * @returns Number of contract rows updated
 */
export function updateCanonicalBuyerNames(contracts: ContractRecord[]): number {
  const db = getDb();
  const statement = db.prepare(
    "UPDATE contracts SET buyer_name = ?, updated_at = datetime('now') WHERE id = ?",
  );

  const updateAll = db.transaction((batch: ContractRecord[]) => {
    let changed = 0;
    for (const c of batch) {
      changed += statement.run(c.buyerName ?? c.buyerNameRaw, c.id).changes;
    }
    return changed;
  });

  return updateAll(contracts);
}
