export { formatTopRisks } from "./topRisks";
