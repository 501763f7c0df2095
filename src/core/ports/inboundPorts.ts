import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { CompanyProfile } from "../entities/company";
import type {
  BalanceSheet,
  CashFlowStatement,
  IncomeStatement,
  ReportingPeriod,
} from "../entities/financialStatement";
import type {
  FinancialRatios,
  FinancialScores,
  KeyMetrics,
} from "../entities/metrics";
import type {
  PriceTargetConsensus,
  PriceTargetSummary,
} from "../entities/priceTarget";

export type PeriodicRequest = {
  symbol: string;
  period: ReportingPeriod;
  limit: number;
};

type ProviderResult<T> = Promise<Result<T, AppBoundaryError>>;

/**
 * One method per upstream dataset. Empty upstream answers are `ok([])` / `ok(null)`, never errors.
 */
export interface MarketDataProviderPort {
  readonly name: string;
  fetchCompanyProfile(symbol: string): ProviderResult<CompanyProfile | null>;
  fetchIncomeStatements(request: PeriodicRequest): ProviderResult<IncomeStatement[]>;
  fetchBalanceSheets(request: PeriodicRequest): ProviderResult<BalanceSheet[]>;
  fetchCashFlowStatements(
    request: PeriodicRequest,
  ): ProviderResult<CashFlowStatement[]>;
  fetchKeyMetrics(request: PeriodicRequest): ProviderResult<KeyMetrics[]>;
  fetchFinancialRatios(request: PeriodicRequest): ProviderResult<FinancialRatios[]>;
  fetchFinancialScores(symbol: string): ProviderResult<FinancialScores | null>;
  fetchPriceTargetConsensus(
    symbol: string,
  ): ProviderResult<PriceTargetConsensus | null>;
  fetchPriceTargetSummary(
    symbol: string,
  ): ProviderResult<PriceTargetSummary | null>;
}
