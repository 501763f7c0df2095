import { err, ok, type Result } from "neverthrow";
import type { z } from "zod";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { CompanyProfile } from "../../../core/entities/company";
import type {
  BalanceSheet,
  CashFlowStatement,
  IncomeStatement,
} from "../../../core/entities/financialStatement";
import type {
  FinancialRatios,
  FinancialScores,
  KeyMetrics,
} from "../../../core/entities/metrics";
import type {
  PriceTargetConsensus,
  PriceTargetSummary,
} from "../../../core/entities/priceTarget";
import type {
  MarketDataProviderPort,
  PeriodicRequest,
} from "../../../core/ports/inboundPorts";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";
import {
  fmpBalanceSheetSchema,
  fmpCashFlowStatementSchema,
  fmpErrorPayloadSchema,
  fmpFinancialRatiosSchema,
  fmpFinancialScoresSchema,
  fmpIncomeStatementSchema,
  fmpKeyMetricsSchema,
  fmpPriceTargetConsensusSchema,
  fmpPriceTargetSummarySchema,
  fmpProfileSchema,
} from "./fmpSchemas";

const PROVIDER = "fmp";

export type FmpProviderOptions = {
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
};

type WithRawPayload<T> = T & { rawPayload: unknown };

const boundaryError = (
  code: AppBoundaryError["code"],
  message: string,
  extra: Pick<AppBoundaryError, "httpStatus" | "cause"> & {
    retryable?: boolean;
  } = {},
): AppBoundaryError => ({
  source: "market_data",
  code,
  provider: PROVIDER,
  message,
  retryable: extra.retryable ?? false,
  httpStatus: extra.httpStatus,
  cause: extra.cause,
});

const mapHttpError = (
  endpoint: string,
  error: HttpClientError,
): AppBoundaryError => {
  const status = error.httpStatus;

  if (status === 401 || status === 403) {
    return boundaryError(
      "auth_invalid",
      `FMP rejected the API key on ${endpoint} with status ${status}.`,
      { httpStatus: status, cause: error.cause },
    );
  }

  if (status === 429) {
    return boundaryError("rate_limited", `FMP rate limit reached on ${endpoint}.`, {
      httpStatus: status,
      retryable: true,
    });
  }

  switch (error.code) {
    case "timeout":
      return boundaryError("timeout", `FMP ${endpoint} request timed out.`, {
        retryable: true,
        cause: error.cause,
      });
    case "invalid_json":
      return boundaryError("invalid_json", `FMP ${endpoint} returned invalid JSON.`, {
        cause: error.cause,
      });
    case "transport_error":
      return boundaryError("transport_error", error.message, {
        retryable: error.retryable,
        cause: error.cause,
      });
    case "non_success_status":
      return boundaryError(
        "provider_error",
        `FMP ${endpoint} failed with status ${status ?? "unknown"}.`,
        { httpStatus: status, retryable: error.retryable },
      );
  }
};

/**
 * Adapts Financial Modeling Prep `stable` endpoints into normalized fundamentals.
 */
export class FmpMarketDataProvider implements MarketDataProviderPort {
  readonly name = PROVIDER;

  private readonly timeoutMs: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    options: FmpProviderOptions = {},
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "FMP_API_KEY is required when the FMP market data provider is enabled.",
      );
    }

    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
  }

  async fetchCompanyProfile(
    symbol: string,
  ): Promise<Result<CompanyProfile | null, AppBoundaryError>> {
    return this.fetchSingle("profile", fmpProfileSchema, symbol);
  }

  async fetchIncomeStatements(
    request: PeriodicRequest,
  ): Promise<Result<IncomeStatement[], AppBoundaryError>> {
    return this.fetchPeriodic("income-statement", fmpIncomeStatementSchema, request);
  }

  async fetchBalanceSheets(
    request: PeriodicRequest,
  ): Promise<Result<BalanceSheet[], AppBoundaryError>> {
    return this.fetchPeriodic(
      "balance-sheet-statement",
      fmpBalanceSheetSchema,
      request,
    );
  }

  async fetchCashFlowStatements(
    request: PeriodicRequest,
  ): Promise<Result<CashFlowStatement[], AppBoundaryError>> {
    return this.fetchPeriodic(
      "cash-flow-statement",
      fmpCashFlowStatementSchema,
      request,
    );
  }

  async fetchKeyMetrics(
    request: PeriodicRequest,
  ): Promise<Result<KeyMetrics[], AppBoundaryError>> {
    return this.fetchPeriodic("key-metrics", fmpKeyMetricsSchema, request);
  }

  async fetchFinancialRatios(
    request: PeriodicRequest,
  ): Promise<Result<FinancialRatios[], AppBoundaryError>> {
    return this.fetchPeriodic("ratios", fmpFinancialRatiosSchema, request);
  }

  async fetchFinancialScores(
    symbol: string,
  ): Promise<Result<FinancialScores | null, AppBoundaryError>> {
    return this.fetchSingle("financial-scores", fmpFinancialScoresSchema, symbol);
  }

  async fetchPriceTargetConsensus(
    symbol: string,
  ): Promise<Result<PriceTargetConsensus | null, AppBoundaryError>> {
    return this.fetchSingle(
      "price-target-consensus",
      fmpPriceTargetConsensusSchema,
      symbol,
    );
  }

  async fetchPriceTargetSummary(
    symbol: string,
  ): Promise<Result<PriceTargetSummary | null, AppBoundaryError>> {
    return this.fetchSingle(
      "price-target-summary",
      fmpPriceTargetSummarySchema,
      symbol,
    );
  }

  private async fetchPeriodic<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    request: PeriodicRequest,
  ): Promise<Result<WithRawPayload<z.output<S>>[], AppBoundaryError>> {
    const rows = await this.requestRows(endpoint, {
      symbol: request.symbol.toUpperCase(),
      period: request.period,
      limit: request.limit,
    });

    return rows.andThen((payload) => parseRows(endpoint, schema, payload));
  }

  private async fetchSingle<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    symbol: string,
  ): Promise<Result<WithRawPayload<z.output<S>> | null, AppBoundaryError>> {
    const rows = await this.requestRows(endpoint, {
      symbol: symbol.toUpperCase(),
    });

    return rows
      .andThen((payload) => parseRows(endpoint, schema, payload.slice(0, 1)))
      .map((parsed) => parsed[0] ?? null);
  }

  /**
   * Fetches one endpoint and unwraps the payload into rows; an empty body is zero rows.
   */
  private async requestRows(
    endpoint: string,
    query: Record<string, string | number>,
  ): Promise<Result<unknown[], AppBoundaryError>> {
    const response = await this.httpClient.requestJson<unknown>({
      url: `${this.baseUrl.replace(/\/+$/, "")}/${endpoint}`,
      method: "GET",
      query: { ...query, apikey: this.apiKey },
      timeoutMs: this.timeoutMs,
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
    });

    if (response.isErr()) {
      return err(mapHttpError(endpoint, response.error));
    }

    const payload = response.value;
    if (payload === null || payload === undefined) {
      return ok([]);
    }

    if (Array.isArray(payload)) {
      return ok(payload);
    }

    const upstreamError = fmpErrorPayloadSchema.safeParse(payload);
    if (upstreamError.success) {
      const message = upstreamError.data["Error Message"].trim();
      const isAuthError = /api ?key|unauthorized|subscription/i.test(message);
      return err(
        boundaryError(isAuthError ? "auth_invalid" : "provider_error", message),
      );
    }

    if (typeof payload === "object" && Object.keys(payload).length > 0) {
      return ok([payload]);
    }

    return ok([]);
  }
}

const parseRows = <S extends z.ZodTypeAny>(
  endpoint: string,
  schema: S,
  rows: unknown[],
): Result<WithRawPayload<z.output<S>>[], AppBoundaryError> => {
  const parsed: WithRawPayload<z.output<S>>[] = [];

  for (const [index, row] of rows.entries()) {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issue = result.error.issues[0];
      const path = issue ? issue.path.join(".") : "";
      return err(
        boundaryError(
          "malformed_response",
          `FMP ${endpoint} row ${index} is malformed at "${path}": ${issue?.message ?? "invalid row"}`,
          { cause: result.error },
        ),
      );
    }

    parsed.push({ ...result.data, rawPayload: row });
  }

  return ok(parsed);
};
