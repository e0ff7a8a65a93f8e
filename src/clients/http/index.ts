/**
 * HTTP client public API
 */

export { httpGet, buildUrl, toBodySnippet } from "./httpClient";
export { HttpError, RetryExhaustedError } from "./httpError";
export type {
  HttpGetRequest,
  HttpGetFn,
  HttpResponse,
  HttpErrorDetails,
  HttpRetryConfig,
} from "@/types";
