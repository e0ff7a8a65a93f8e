/**
 * HTTP client type definitions
 */

/**
 * Retry configuration for transport failures
 */
export interface HttpRetryConfig {
  /** Maximum number of attempts (including initial request). Default from constants. */
  maxAttempts?: number;
  /** Linear backoff step in ms: attempt n waits backoffBaseMs * n before retrying. */
  backoffBaseMs?: number;
}

export type HttpQuery = Record<string, string | number | boolean>;

export interface HttpGetRequest {
  url: string;
  headers?: Record<string, string>;
  query?: HttpQuery;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
}

/**
 * Response returned for any HTTP status.
 *
 * Non-2xx statuses are not errors at this layer; callers inspect `status`.
 * `body` is parsed JSON for JSON content types, raw text otherwise,
 * and undefined when a JSON body fails to parse.
 */
export interface HttpResponse {
  url: string;
  status: number;
  statusText: string;
  ok: boolean;
  body: unknown;
}

/**
 * GET function signature, injected into consumers for offline testing
 */
export type HttpGetFn = (req: HttpGetRequest) => Promise<HttpResponse>;

export interface HttpErrorDetails {
  status: number;
  statusText: string;
  url: string;
  bodySnippet?: string;
}
