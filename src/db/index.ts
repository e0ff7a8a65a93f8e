/**
 * Database module barrel exports
 */

export * from "./connection";
export * from "./migrate";
export * from "./repos/contractsRepo";
export * from "./repos/cursorRepo";
export * from "./repos/runsRepo";
export * from "./repos/buyerMapRepo";
export * from "./repos/riskRepo";
export * from "./repos/runLockRepo";
