/**
 * Pipeline barrel exports
 */

export {
  runContractsFinderPipeline,
  resolveIngestionConfig,
  CONTRACTS_INGEST_STAGE,
} from "./contractsFinder";
export {
  runBuyerCanonicalizationPipeline,
  BUYER_CANONICALIZE_STAGE,
} from "./buyerCanonicalization";
export {
  runCarbonScreeningPipeline,
  CARBON_SCREEN_STAGE,
} from "./carbonScreening";
