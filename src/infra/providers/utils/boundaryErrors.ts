import type {
  AppBoundaryError,
  BoundarySource,
} from "../../../core/entities/appError";
import type { HttpClientError } from "../../http/httpJsonClient";

/**
 * Translates transport-level failures into boundary errors with the provider's provenance attached.
 */
export const fromHttpError = (
  source: BoundarySource,
  provider: string,
  error: HttpClientError,
): AppBoundaryError => {
  const status = error.httpStatus;
  const base = {
    source,
    provider,
    httpStatus: status,
    cause: error.cause,
  };

  if (status === 401 || status === 403) {
    return {
      ...base,
      code: "auth_invalid",
      message: `${provider} auth failed with status ${status}.`,
      retryable: false,
    };
  }

  if (status === 404) {
    return {
      ...base,
      code: "not_found",
      message: `${provider} has no data for the requested symbol.`,
      retryable: false,
    };
  }

  if (status === 429) {
    return {
      ...base,
      code: "rate_limited",
      message: `${provider} rate limit reached.`,
      retryable: true,
    };
  }

  if (error.code === "timeout") {
    return { ...base, code: "timeout", message: error.message, retryable: true };
  }

  if (error.code === "invalid_json") {
    return {
      ...base,
      code: "invalid_json",
      message: error.message,
      retryable: false,
    };
  }

  if (error.code === "transport_error") {
    return {
      ...base,
      code: "transport_error",
      message: error.message,
      retryable: true,
    };
  }

  return {
    ...base,
    code: "provider_error",
    message: error.message,
    retryable: error.retryable,
  };
};

export const parseNumericValue = (
  raw: string | number | null | undefined,
): number | null => {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }

  const normalized = raw.trim();
  if (!normalized) {
    return null;
  }

  const parsed = Number.parseFloat(normalized);
  return Number.isFinite(parsed) ? parsed : null;
};
