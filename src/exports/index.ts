export {
  exportRiskRecordsCsv,
  exportBuyerMapCsv,
  renderRiskCsv,
  renderBuyerMapCsv,
  RISK_EXPORT_COLUMNS,
  BUYER_MAP_EXPORT_COLUMNS,
} from "./csvExport";
