export { matchMaterial, isGenericMaterial } from "./materialMatcher";
