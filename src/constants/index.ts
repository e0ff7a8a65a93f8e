export * from "./logger";
export * from "./runLock";
export * from "./civilWorks";
export * from "./canonical";
export * from "./materials";
export * from "./risk";
export * from "./exports";
export * from "./runner";
export * from "./db";
