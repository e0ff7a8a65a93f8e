export * from "./logger";
export * from "./db";
export * from "./contracts";
export * from "./ingestion";
export * from "./canonical";
export * from "./materials";
export * from "./risk";
export * from "./runLock";
export * from "./runner";
export * from "./tasks";
export * from "./clients/http";
// Contracts Finder payload types are not exported from the global barrel.
// Import directly from "@/types/clients/contractsFinder" where raw payloads are handled.
