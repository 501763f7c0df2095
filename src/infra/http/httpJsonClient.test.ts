import { afterEach, describe, expect, it } from "vitest";
import { buildUrl, HttpJsonClient } from "./httpJsonClient";

const originalFetch = globalThis.fetch;

const setFetch = (
  handler: (...args: Parameters<typeof fetch>) => ReturnType<typeof fetch>,
): void => {
  globalThis.fetch = handler as typeof fetch;
};

afterEach(() => {
  globalThis.fetch = originalFetch;
});

describe("buildUrl", () => {
  it("appends defined query values and skips undefined ones", () => {
    expect(
      buildUrl("https://example.test/stable/ratios", {
        symbol: "AAPL",
        limit: 5,
        period: undefined,
      }),
    ).toBe("https://example.test/stable/ratios?symbol=AAPL&limit=5");
  });

  it("returns the url untouched without a query", () => {
    expect(buildUrl("https://example.test/a?b=1", undefined)).toBe(
      "https://example.test/a?b=1",
    );
  });
});

describe("HttpJsonClient", () => {
  it("retries retryable failures up to configured attempts", async () => {
    let attempts = 0;

    setFetch(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw new Error("socket reset");
      }

      return new Response(JSON.stringify({ ok: true }), { status: 200 });
    });

    const delays: number[] = [];
    const client = new HttpJsonClient({
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
    const result = await client.requestJson<{ ok: boolean }>({
      url: "https://example.test/retry",
      method: "GET",
      timeoutMs: 500,
      retries: 2,
      retryDelayMs: 10,
    });

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(result.value).toEqual({ ok: true });
    expect(attempts).toBe(3);
    expect(delays).toEqual([10, 20]);
  });

  it("does not retry client errors", async () => {
    let attempts = 0;
    setFetch(async () => {
      attempts += 1;
      return new Response("missing", { status: 404 });
    });

    const client = new HttpJsonClient({ sleep: async () => {} });
    const result = await client.requestJson({
      url: "https://example.test/missing",
      method: "GET",
      timeoutMs: 500,
      retries: 3,
      retryDelayMs: 1,
    });

    expect(attempts).toBe(1);
    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected non-success status error");
    }
    expect(result.error.httpStatus).toBe(404);
    expect(result.error.retryable).toBe(false);
  });

  it("sends query parameters on the request url", async () => {
    let requestedUrl = "";
    setFetch(async (input) => {
      requestedUrl = String(input);
      return new Response("[]", { status: 200 });
    });

    const client = new HttpJsonClient();
    await client.requestJson({
      url: "https://example.test/stable/profile",
      method: "GET",
      query: { symbol: "MSFT", apikey: "test-key" },
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(requestedUrl).toBe(
      "https://example.test/stable/profile?symbol=MSFT&apikey=test-key",
    );
  });

  it("spaces consecutive requests by the minimum interval", async () => {
    setFetch(async () => new Response("{}", { status: 200 }));

    let clock = 1_000;
    const waits: number[] = [];
    const client = new HttpJsonClient({
      minIntervalMs: 100,
      now: () => clock,
      sleep: async (ms) => {
        waits.push(ms);
        clock += ms;
      },
    });

    const request = {
      url: "https://example.test/throttle",
      method: "GET" as const,
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    };

    await client.requestJson(request);
    clock += 30;
    await client.requestJson(request);

    expect(waits).toEqual([70]);
  });

  it("queues concurrent requests one interval apart", async () => {
    let fetches = 0;
    setFetch(async () => {
      fetches += 1;
      return new Response("{}", { status: 200 });
    });

    const waits: number[] = [];
    const client = new HttpJsonClient({
      minIntervalMs: 100,
      now: () => 1_000,
      sleep: async (ms) => {
        waits.push(ms);
      },
    });

    const request = {
      url: "https://example.test/concurrent",
      method: "GET" as const,
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    };

    await Promise.all([
      client.requestJson(request),
      client.requestJson(request),
      client.requestJson(request),
    ]);

    expect(fetches).toBe(3);
    expect(waits).toEqual([100, 200]);
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

          if (signal.aborted) {
            reject(new DOMException("Aborted", "AbortError"));
            return;
          }

          signal.addEventListener("abort", () => {
            reject(new DOMException("Aborted", "AbortError"));
          });
        }),
    );

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/timeout",
      method: "GET",
      timeoutMs: 5,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected timeout error");
    }

    expect(result.error.code).toBe("timeout");
    expect(result.error.retryable).toBe(true);
  });

  it("maps non-success statuses with retryability metadata", async () => {
    setFetch(async () => new Response("unavailable", { status: 503 }));

    const client = new HttpJsonClient();
    const result = await client.requestJson({
      url: "https://example.test/status",
      method: "GET",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
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
    const result = await client.requestJson({
      url: "https://example.test/json",
      method: "GET",
      timeoutMs: 500,
      retries: 0,
      retryDelayMs: 1,
    });

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected invalid json error");
    }

    expect(result.error.code).toBe("invalid_json");
    expect(result.error.retryable).toBe(false);
  });
});
