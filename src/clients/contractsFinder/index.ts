export {
  normalizeCpv,
  extractCpv,
  extractValue,
  extractBuyerCountry,
  parseSearchPage,
  mapReleaseToContract,
  isJsonObject,
} from "./mappers";
