/**
 * Ingestion module barrel exports
 */

export {
  startRun,
  finishRun,
  withRun,
  createRunAccumulator,
} from "./runLifecycle";

export { ContractIngestor } from "./contractIngestor";
export type { ContractIngestorDeps } from "./contractIngestor";

export { SqliteCursorStore } from "./sqliteCursorStore";

export {
  runContractsFinderPipeline,
  runBuyerCanonicalizationPipeline,
  runCarbonScreeningPipeline,
} from "./pipelines";
