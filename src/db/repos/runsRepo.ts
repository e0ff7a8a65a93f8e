/**
 * Ingestion runs repository
 *
 * Data access layer for ingestion_runs table.
 */

import type {
  IngestionRun,
  IngestionRunInput,
  IngestionRunUpdate,
} from "@/types";
import { getDb } from "@/db/connection";

/**
 * Create a new run row
 * Returns the run id
 */
export function createRun(input: IngestionRunInput): number {
  const db = getDb();
  const result = db
    .prepare("INSERT INTO ingestion_runs (stage) VALUES (?)")
    .run(input.stage);

  return Number(result.lastInsertRowid);
}

/**
 * Update/finish a run
 */
export function finishRun(runId: number, update: IngestionRunUpdate): void {
  const db = getDb();

  const fields: string[] = [];
  const values: Array<string | number | null> = [];

  if (update.finished_at !== undefined) {
    fields.push("finished_at = ?");
    values.push(update.finished_at);
  }
  if (update.status !== undefined) {
    fields.push("status = ?");
    values.push(update.status);
  }
  if (update.counters !== undefined) {
    fields.push("counters_json = ?");
    values.push(JSON.stringify(update.counters));
  }
  if (update.notes !== undefined) {
    fields.push("notes = ?");
    values.push(update.notes);
  }

  if (fields.length === 0) {
    return; // Nothing to update
  }

  values.push(runId);

  const sql = `UPDATE ingestion_runs SET ${fields.join(", ")} WHERE id = ?`;
  db.prepare(sql).run(...values);
}

/**
 * Get run by id
 */
export function getRunById(id: number): IngestionRun | undefined {
  const db = getDb();
  return db
    .prepare<[number], IngestionRun>("SELECT * FROM ingestion_runs WHERE id = ?")
    .get(id);
}

/**
 * Get the most recent run of a stage
 */
export function getLatestRunByStage(stage: string): IngestionRun | undefined {
  const db = getDb();
  return db
    .prepare<[string], IngestionRun>(
      "SELECT * FROM ingestion_runs WHERE stage = ? ORDER BY id DESC LIMIT 1",
    )
    .get(stage);
}
