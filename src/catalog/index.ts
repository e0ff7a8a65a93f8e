export {
  loadMaterialReference,
  parseMaterialReference,
  toMaterialProfile,
} from "./materialsLoader";
export { MaterialReferenceError } from "@/utils/materialValidation";
