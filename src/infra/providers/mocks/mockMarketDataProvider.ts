import { ok, type Result } from "neverthrow";
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
import {
  fmpBalanceSheetSchema,
  fmpCashFlowStatementSchema,
  fmpFinancialRatiosSchema,
  fmpFinancialScoresSchema,
  fmpIncomeStatementSchema,
  fmpKeyMetricsSchema,
  fmpPriceTargetConsensusSchema,
  fmpPriceTargetSummarySchema,
  fmpProfileSchema,
} from "../fmp/fmpSchemas";

const MOCK_PERIODS = 4;
const LATEST_FISCAL_YEAR = 2024;

type PeriodIdentity = {
  symbol: string;
  date: string;
  fiscalYear: string;
  period: string;
  reportedCurrency: string;
};

const periodIdentities = (request: PeriodicRequest): PeriodIdentity[] => {
  const symbol = request.symbol.toUpperCase();
  const count = Math.min(request.limit, MOCK_PERIODS);

  return Array.from({ length: count }, (_, index) => {
    if (request.period === "annual") {
      const year = LATEST_FISCAL_YEAR - index;
      return {
        symbol,
        date: `${year}-12-31`,
        fiscalYear: String(year),
        period: "FY",
        reportedCurrency: "USD",
      };
    }

    const quarter = 4 - index;
    const month = String(quarter * 3).padStart(2, "0");
    return {
      symbol,
      date: `${LATEST_FISCAL_YEAR}-${month}-30`,
      fiscalYear: String(LATEST_FISCAL_YEAR),
      period: `Q${quarter}`,
      reportedCurrency: "USD",
    };
  });
};

/** Older periods shrink a little so trends are visible in local data. */
const scale = (value: number, index: number): number =>
  Math.round(value * (1 - index * 0.05) * 100) / 100;

/**
 * Builds rows through the same schemas the FMP adapter uses, so unspecified fields default identically.
 */
const fromSparse = <S extends z.ZodTypeAny>(
  schema: S,
  sparse: Record<string, unknown>,
): z.output<S> & { rawPayload: unknown } => ({
  ...schema.parse(sparse),
  rawPayload: sparse,
});

/**
 * Provides predictable fundamentals so sync and health flows run without an FMP key.
 */
export class MockMarketDataProvider implements MarketDataProviderPort {
  readonly name = "mock";

  async fetchCompanyProfile(
    symbol: string,
  ): Promise<Result<CompanyProfile | null, AppBoundaryError>> {
    const upper = symbol.toUpperCase();
    return ok(
      fromSparse(fmpProfileSchema, {
        symbol: upper,
        companyName: `${upper} Holdings Inc.`,
        marketCap: 250_000_000_000,
        currency: "USD",
        exchange: "NASDAQ",
        exchangeFullName: "NASDAQ Global Select",
        industry: "Software - Infrastructure",
        sector: "Technology",
        country: "US",
        isActivelyTrading: true,
      }),
    );
  }

  async fetchIncomeStatements(
    request: PeriodicRequest,
  ): Promise<Result<IncomeStatement[], AppBoundaryError>> {
    return ok(
      periodIdentities(request).map((identity, index) =>
        fromSparse(fmpIncomeStatementSchema, {
          ...identity,
          revenue: scale(60_000_000_000, index),
          costOfRevenue: scale(18_000_000_000, index),
          grossProfit: scale(42_000_000_000, index),
          operatingIncome: scale(25_000_000_000, index),
          netIncome: scale(21_000_000_000, index),
          eps: scale(2.8, index),
          epsDiluted: scale(2.78, index),
        }),
      ),
    );
  }

  async fetchBalanceSheets(
    request: PeriodicRequest,
  ): Promise<Result<BalanceSheet[], AppBoundaryError>> {
    return ok(
      periodIdentities(request).map((identity, index) =>
        fromSparse(fmpBalanceSheetSchema, {
          ...identity,
          cashAndCashEquivalents: scale(30_000_000_000, index),
          totalCurrentAssets: scale(150_000_000_000, index),
          totalAssets: scale(500_000_000_000, index),
          totalCurrentLiabilities: scale(110_000_000_000, index),
          totalLiabilities: scale(240_000_000_000, index),
          totalStockholdersEquity: scale(260_000_000_000, index),
          totalDebt: scale(60_000_000_000, index),
        }),
      ),
    );
  }

  async fetchCashFlowStatements(
    request: PeriodicRequest,
  ): Promise<Result<CashFlowStatement[], AppBoundaryError>> {
    return ok(
      periodIdentities(request).map((identity, index) =>
        fromSparse(fmpCashFlowStatementSchema, {
          ...identity,
          netIncome: scale(21_000_000_000, index),
          operatingCashFlow: scale(30_000_000_000, index),
          capitalExpenditure: scale(-12_000_000_000, index),
          freeCashFlow: scale(18_000_000_000, index),
        }),
      ),
    );
  }

  async fetchKeyMetrics(
    request: PeriodicRequest,
  ): Promise<Result<KeyMetrics[], AppBoundaryError>> {
    return ok(
      periodIdentities(request).map((identity, index) =>
        fromSparse(fmpKeyMetricsSchema, {
          ...identity,
          marketCap: scale(250_000_000_000, index),
          evToEBITDA: scale(22.5, index),
          currentRatio: scale(1.36, index),
          returnOnEquity: scale(0.32, index),
          returnOnAssets: scale(0.17, index),
          returnOnInvestedCapital: scale(0.24, index),
          earningsYield: scale(0.034, index),
          freeCashFlowYield: scale(0.029, index),
          daysOfSalesOutstanding: scale(74, index),
          cashConversionCycle: scale(-12, index),
        }),
      ),
    );
  }

  async fetchFinancialRatios(
    request: PeriodicRequest,
  ): Promise<Result<FinancialRatios[], AppBoundaryError>> {
    return ok(
      periodIdentities(request).map((identity, index) =>
        fromSparse(fmpFinancialRatiosSchema, {
          ...identity,
          grossProfitMargin: scale(0.7, index),
          operatingProfitMargin: scale(0.42, index),
          netProfitMargin: scale(0.35, index),
          currentRatio: scale(1.36, index),
          quickRatio: scale(1.2, index),
          debtToEquityRatio: scale(0.23, index),
          priceToEarningsRatio: scale(29.4, index),
          financialLeverageRatio: scale(1.92, index),
          interestCoverageRatio: scale(38, index),
          dividendYield: scale(0.008, index),
          effectiveTaxRate: scale(0.18, index),
        }),
      ),
    );
  }

  async fetchFinancialScores(
    symbol: string,
  ): Promise<Result<FinancialScores | null, AppBoundaryError>> {
    return ok(
      fromSparse(fmpFinancialScoresSchema, {
        symbol: symbol.toUpperCase(),
        reportedCurrency: "USD",
        altmanZScore: 8.9,
        piotroskiScore: 7,
      }),
    );
  }

  async fetchPriceTargetConsensus(
    symbol: string,
  ): Promise<Result<PriceTargetConsensus | null, AppBoundaryError>> {
    return ok(
      fromSparse(fmpPriceTargetConsensusSchema, {
        symbol: symbol.toUpperCase(),
        targetHigh: 600,
        targetLow: 390,
        targetConsensus: 510.5,
        targetMedian: 505,
      }),
    );
  }

  async fetchPriceTargetSummary(
    symbol: string,
  ): Promise<Result<PriceTargetSummary | null, AppBoundaryError>> {
    return ok(
      fromSparse(fmpPriceTargetSummarySchema, {
        symbol: symbol.toUpperCase(),
        lastMonthCount: 4,
        lastMonthAvgPriceTarget: 512.25,
        lastQuarterCount: 11,
        lastQuarterAvgPriceTarget: 498.1,
        lastYearCount: 37,
        lastYearAvgPriceTarget: 470.4,
        allTimeCount: 120,
        allTimeAvgPriceTarget: 402.75,
        publishers: ["Benzinga", "TheFly", "MarketWatch"],
      }),
    );
  }
}
