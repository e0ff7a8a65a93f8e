/**
 * Utils barrel exports
 */

export * from "./identity/buyerIdentity";
export * from "./numbers/spend";
export * from "./text/encoding";
export * from "./config/env";
export * from "./materialValidation";
