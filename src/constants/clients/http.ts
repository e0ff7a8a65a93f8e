/**
 * HTTP client constants: defaults and configuration
 */

/**
 * Default total request timeout in milliseconds (40 seconds)
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 40_000;

/**
 * Default headers for JSON GET requests
 */
export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  Accept: "application/json",
};

/**
 * Maximum length of body snippet kept on non-2xx responses
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;

/**
 * Default maximum number of attempts (including initial request)
 */
export const DEFAULT_MAX_ATTEMPTS = 5;

/**
 * Linear backoff step: attempt n waits n * 2s before the next attempt
 */
export const DEFAULT_BACKOFF_BASE_MS = 2_000;
