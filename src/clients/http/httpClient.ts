/**
 * HTTP client: JSON GET over native fetch
 * Total-request timeouts, query params, linear backoff retries on transport failures
 */

import type { HttpGetRequest, HttpQuery, HttpResponse } from "@/types";
import { RetryExhaustedError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BACKOFF_BASE_MS,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters appended to any already present
 */
export function buildUrl(baseUrl: string, query?: HttpQuery): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    url.searchParams.append(key, String(value));
  }

  return url.toString();
}

/**
 * Truncate a response body for logs and error messages
 */
export function toBodySnippet(body: unknown): string | undefined {
  if (body === undefined || body === null || body === "") {
    return undefined;
  }
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH) + "..."
    : text;
}

/**
 * Linear backoff: the nth failed attempt waits n * base before retrying
 */
export function computeBackoffDelay(
  attempt: number,
  backoffBaseMs: number,
): number {
  return backoffBaseMs * attempt;
}

/**
 * Sleep for the specified number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Read and decode the response body
 *
 * JSON content types are parsed; anything else is returned as text.
 * A JSON body that fails to parse yields undefined so the caller's
 * shape validation decides what to do with it.
 */
async function readBody(response: Response, url: string): Promise<unknown> {
  const text = await response.text();
  const contentType = response.headers.get("content-type") ?? "";
  const isJson =
    contentType.includes("application/json") || contentType.includes("+json");

  if (!isJson) {
    if (response.ok) {
      logger.warn("Non-JSON response received", {
        url,
        status: response.status,
        contentType: contentType || "none",
      });
    }
    return text;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (parseError) {
    logger.warn("JSON parse failed", {
      url,
      status: response.status,
      error: parseError instanceof Error ? parseError.message : String(parseError),
    });
    return undefined;
  }
}

/**
 * Perform a single GET attempt (no retries)
 *
 * The timeout covers the whole exchange, body included.
 */
async function performRequest(
  req: HttpGetRequest,
  url: string,
  timeoutMs: number,
): Promise<HttpResponse> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, {
      method: "GET",
      headers: { ...DEFAULT_JSON_HEADERS, ...req.headers },
      signal: controller.signal,
    });

    const body = await readBody(response, url);

    return {
      url,
      status: response.status,
      statusText: response.statusText,
      ok: response.ok,
      body,
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Perform an HTTP GET with timeout and retries
 *
 * Only transport failures are retried: network errors, DNS failures and
 * timeouts (anything thrown before a complete response is read). A response
 * with a non-2xx status is returned as-is and never retried; the caller
 * inspects `status` and decides whether to stop.
 *
 * @param req - GET request configuration
 * @returns The response, whatever its status
 * @throws {RetryExhaustedError} When every attempt failed at transport level
 */
export async function httpGet(req: HttpGetRequest): Promise<HttpResponse> {
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const url = buildUrl(req.url, req.query);
  const maxAttempts = req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const backoffBaseMs = req.retry?.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await performRequest(req, url, timeoutMs);
    } catch (error) {
      lastError = error;

      const delayMs = computeBackoffDelay(attempt, backoffBaseMs);

      logger.warn("Network error", {
        url,
        attempt,
        maxAttempts,
        reason: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
        ...(attempt < maxAttempts && { retryInMs: delayMs }),
      });

      if (attempt < maxAttempts) {
        await sleep(delayMs);
      }
    }
  }

  throw new RetryExhaustedError(url, maxAttempts, lastError);
}
