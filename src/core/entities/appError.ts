/**
 * Which side of the market-data boundary failed: price history, company fundamentals,
 * or the run configuration itself.
 */
export type BoundarySource = "prices" | "fundamentals" | "config";

/** Failures of the request itself; the upstream may answer on a later call. */
export type TransportFailureCode =
  | "timeout"
  | "rate_limited"
  | "transport_error";

/** Failures in what the upstream answered, or in what we asked it. */
export type PayloadFailureCode =
  | "auth_invalid"
  | "config_invalid"
  | "not_found"
  | "provider_error"
  | "malformed_response"
  | "invalid_json";

export type AppBoundaryErrorCode = TransportFailureCode | PayloadFailureCode;

/**
 * A market-data failure as seen by the metrics layer. Adapters return these inside a
 * `Result` instead of throwing, and the metric that requested the data decides the fallback.
 */
export type AppBoundaryError = {
  source: BoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};
