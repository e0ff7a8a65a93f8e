/**
 * Runner/orchestration constants
 */

import type { RunStage } from "@/types";

/**
 * Task keys per RUN_STAGE, executed in array order
 */
export const RUN_STAGE_TASKS: Record<RunStage, readonly string[]> = {
  all: ["contracts:ingest", "buyers:canonicalize", "carbon:screen"],
  ingest: ["contracts:ingest"],
  canonicalize: ["buyers:canonicalize"],
  screen: ["carbon:screen"],
};

export const DEFAULT_RUN_STAGE: RunStage = "all";
