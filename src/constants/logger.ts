/**
 * Logger constants
 */

import type { LogLevel } from "@/types";

/**
 * Level priority; messages below the configured level are dropped
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Level used when LOG_LEVEL is unset or not one of LOG_LEVELS
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";
