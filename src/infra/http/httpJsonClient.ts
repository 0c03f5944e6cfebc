import { err, ok, type Result } from "neverthrow";

export type HttpJsonRequest = {
  url: string;
  query?: Record<string, string | number>;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout and status parsing policy.
 * Every call is a single attempt; pacing between calls belongs to the batch loop.
 */
export class HttpJsonClient {
  async getJson<T>(request: HttpJsonRequest): Promise<Result<T, HttpClientError>> {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, String(value));
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      try {
        return ok((await response.json()) as T);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
