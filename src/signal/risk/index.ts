export {
  classifyRisk,
  screenContract,
  screenContracts,
  sortByCo2eDesc,
  summarizeRisk,
  co2eOf,
} from "./riskEngine";
