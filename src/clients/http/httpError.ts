/**
 * HTTP error classes
 *
 * HttpError describes a non-2xx response the caller decided to stop on.
 * RetryExhaustedError is raised by the client itself when every attempt
 * failed at the transport level; it is fatal to the run.
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Structured error for a semantic HTTP failure (non-2xx status)
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;

    // Maintain proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

/**
 * Every attempt of a request failed with a transport error
 */
export class RetryExhaustedError extends Error {
  public readonly url: string;
  public readonly attempts: number;
  public readonly lastError: unknown;

  constructor(url: string, attempts: number, lastError: unknown) {
    const reason =
      lastError instanceof Error ? lastError.message : String(lastError);
    super(`Max retries exceeded (${attempts} attempts) - ${url} - ${reason}`);
    this.name = "RetryExhaustedError";
    this.url = url;
    this.attempts = attempts;
    this.lastError = lastError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetryExhaustedError);
    }
  }
}
