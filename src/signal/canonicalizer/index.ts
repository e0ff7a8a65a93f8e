export {
  buildBuyerCanonicalMap,
  applyCanonicalMap,
  chooseCanonical,
} from "./buyerCanonicalizer";
