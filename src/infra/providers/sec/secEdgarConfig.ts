import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../../../core/entities/appError";
import type { HttpClientError, HttpRequest } from "../../http/httpClient";

export type SecEdgarConfig = {
  baseUrl: string;
  archivesBaseUrl: string;
  tickersUrl: string;
  userAgent: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export const SEC_EDGAR_PROVIDER = "sec-edgar";

/**
 * Fails fast on a blank agent because SEC answers anonymous clients with 403.
 */
export const assertUserAgent = (config: SecEdgarConfig): void => {
  if (!config.userAgent.trim()) {
    throw new Error(
      "SEC_EDGAR_USER_AGENT is required when SEC EDGAR adapters are enabled.",
    );
  }
};

/**
 * Applies SEC-required headers and timeout/retry policy consistently for all EDGAR requests.
 */
export const edgarRequest = (
  config: SecEdgarConfig,
  url: string,
  accept: string,
): HttpRequest => ({
  url,
  method: "GET",
  timeoutMs: config.timeoutMs,
  retries: config.retries,
  retryDelayMs: config.retryDelayMs,
  headers: {
    "User-Agent": config.userAgent,
    Accept: accept,
  },
});

const mapHttpCode = (failure: HttpClientError): AppBoundaryErrorCode => {
  if (failure.httpStatus === 429) {
    return "rate_limited";
  }

  if (failure.httpStatus === 401 || failure.httpStatus === 403) {
    return "auth_invalid";
  }

  if (failure.httpStatus === 404) {
    return "not_found";
  }

  switch (failure.code) {
    case "timeout":
    case "transport_error":
    case "invalid_json":
    case "malformed_response":
      return failure.code;
    case "non_success_status":
    default:
      return "provider_error";
  }
};

export const toBoundaryError = (
  source: AppBoundaryError["source"],
  failure: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(failure),
  provider: SEC_EDGAR_PROVIDER,
  message: failure.message,
  retryable: failure.retryable,
  httpStatus: failure.httpStatus,
  cause: failure.cause,
});
