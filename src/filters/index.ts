export { filterStrictCivilWorks, filterPositiveSpend } from "./strictCivilWorks";
