/**
 * Buyer canonical map repository
 *
 * Data access layer for buyer_canonical_map table. The table is a full
 * snapshot: every canonicalization run replaces it wholesale.
 */

import type { BuyerCanonicalMap, BuyerMapRow } from "@/types";
import { getDb } from "@/db/connection";

/**
 * Replace the stored map with the given clusters
 *
 * @returns Number of rows written
 */
export function replaceBuyerMap(map: BuyerCanonicalMap): number {
  const db = getDb();
  const insert = db.prepare(
    `
    INSERT INTO buyer_canonical_map (buyer_name_raw, buyer_name_canonical, cluster_key)
    VALUES (?, ?, ?)
  `,
  );

  const replaceAll = db.transaction(() => {
    db.prepare("DELETE FROM buyer_canonical_map").run();
    let written = 0;
    for (const cluster of map.clusters) {
      for (const variant of cluster.variants) {
        insert.run(variant.name, cluster.canonical, cluster.key);
        written++;
      }
    }
    return written;
  });

  return replaceAll();
}

/**
 * List all map rows ordered by cluster then raw name
 */
export function listBuyerMap(): BuyerMapRow[] {
  const db = getDb();
  return db
    .prepare<[], BuyerMapRow>(
      "SELECT * FROM buyer_canonical_map ORDER BY cluster_key, buyer_name_raw",
    )
    .all();
}
