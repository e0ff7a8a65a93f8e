/**
 * Runner entrypoint: executes the selected pipeline stages once
 *
 * Usage:
 *   npm start
 *   RUN_STAGE=screen npm start
 *
 * Environment variables:
 *   - RUN_STAGE: all | ingest | canonicalize | screen (defaults to all)
 *   - LOG_LEVEL: Logging level (debug, info, warn, error)
 *   - DB_PATH: Path to SQLite database file (optional, defaults to data/app.db)
 *   - CF_PUBLISHED_FROM / CF_PUBLISHED_TO / CF_PAGE_LIMIT / CF_ACCEPTED_CPV_PREFIXES
 *   - MIN_SPEND_GBP, MATERIAL_REFERENCE_PATH, EXPORT_DIR
 */

import "dotenv/config";
import { resolveRunStage, runStage } from "./orchestration/runner";
import { closeDb } from "./db";
import * as logger from "./logger";

async function main(): Promise<number> {
  const stage = resolveRunStage(process.env.RUN_STAGE);
  const result = await runStage(stage);

  logger.info("Runner finished", {
    stage,
    ok: result.ok,
    steps: result.steps.map((s) => `${s.taskKey}=${s.status}`),
  });

  if (!result.ok) {
    logger.warn("Runner did not complete - exiting with code 1", {
      reason: result.reason,
    });
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    closeDb();
    process.exit(code);
  })
  .catch((error) => {
    logger.error("Runner failed with fatal error", {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    closeDb();
    process.exit(1);
  });
