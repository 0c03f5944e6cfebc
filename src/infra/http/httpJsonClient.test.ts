import { afterEach, describe, expect, it } from "vitest";
import { HttpJsonClient } from "./httpJsonClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("HttpJsonClient", () => {
  it("appends query parameters and parses the JSON body", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const client = new HttpJsonClient();
    const result = await client.getJson<{ ok: boolean }>({
      url: "https://example.test/query",
      query: { function: "OVERVIEW", limit: 5 },
      timeoutMs: 500,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({ ok: true });
    expect(requestedUrl).toBe(
      "https://example.test/query?function=OVERVIEW&limit=5",
    );
  });

  it("makes a single attempt on transport failures", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      throw new Error("socket reset");
    });

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/reset",
      timeoutMs: 500,
    });

    expect(attempts).toBe(1);
    if (result.isOk()) {
      throw new Error("expected transport error");
    }
    expect(result.error.code).toBe("transport_error");
    expect(result.error.message).toBe("socket reset");
  });

  it("maps aborted requests to timeout errors", async () => {
    setFetch(
      async (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;

          if (!signal) {
            reject(new Error("missing abort signal"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/timeout",
      timeoutMs: 5,
    });

    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/status",
      timeoutMs: 500,
    });

    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }

    expect(result.error.code).toBe("non_success_status");
    expect(result.error.httpStatus).toBe(503);
    expect(result.error.retryable).toBe(true);
  });

  it("maps invalid JSON payloads as non-retryable", async () => {
    setFetch(async () => new Response("not-json", { status: 200 }));

    const client = new HttpJsonClient();
    const result = await client.getJson({
      url: "https://example.test/json",
      timeoutMs: 500,
    });

    if (result.isOk()) {
      throw new Error("expected invalid json error");
    }

    expect(result.error.code).toBe("invalid_json");
    expect(result.error.retryable).toBe(false);
  });
});
