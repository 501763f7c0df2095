import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

type QueryValue = string | number | boolean | undefined;

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

export type HttpJsonClientOptions = {
  /** Minimum spacing between two outgoing requests from this client. */
  minIntervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
};

const defaultSleep = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

/**
 * Appends non-empty query values; undefined entries are skipped so optional filters can be passed through as-is.
 */
export const buildUrl = (
  url: string,
  query: Record<string, QueryValue> | undefined,
): string => {
  if (!query) {
    return url;
  }

  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    target.searchParams.set(key, String(value));
  }
  return target.toString();
};

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/retry/throttle/status parsing policy.
 */
export class HttpJsonClient {
  private readonly minIntervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private nextSlotAt = Number.NEGATIVE_INFINITY;

  constructor(options: HttpJsonClientOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /**
   * Executes JSON requests with bounded retries to avoid duplicated fetch policy across adapters.
   */
  async requestJson<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      await this.throttle();
      const response = await this.performRequest<T>(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.sleep(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  /**
   * Claims the next free send slot before waiting, so concurrent callers queue up instead of firing together.
   */
  private async throttle(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return;
    }

    const slot = Math.max(this.now(), this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;
    const waitMs = slot - this.now();
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }

  private async performRequest<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(buildUrl(request.url, request.query), {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
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
          message: "HTTP request timed out.",
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
