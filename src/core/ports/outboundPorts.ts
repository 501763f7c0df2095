import type { CompanyEntity, CompanyProfile } from "../entities/company";
import type {
  BalanceSheet,
  CashFlowStatement,
  CompanyScoped,
  IncomeStatement,
  Stored,
} from "../entities/financialStatement";
import type {
  FinancialHealthRow,
  StoredFinancialHealthRow,
} from "../entities/financialHealth";
import type {
  FinancialRatios,
  FinancialScores,
  KeyMetrics,
} from "../entities/metrics";
import type {
  PriceTargetConsensus,
  PriceTargetSummary,
} from "../entities/priceTarget";

export interface CompanyRepositoryPort {
  findBySymbol(symbol: string): Promise<CompanyEntity | null>;
  upsert(profile: CompanyProfile): Promise<CompanyEntity>;
}

export interface FinancialStatementsRepositoryPort {
  upsertIncomeStatements(
    rows: CompanyScoped<IncomeStatement>[],
  ): Promise<Stored<IncomeStatement>[]>;
  upsertBalanceSheets(
    rows: CompanyScoped<BalanceSheet>[],
  ): Promise<Stored<BalanceSheet>[]>;
  upsertCashFlowStatements(
    rows: CompanyScoped<CashFlowStatement>[],
  ): Promise<Stored<CashFlowStatement>[]>;
}

export interface MetricsRepositoryPort {
  upsertKeyMetrics(rows: CompanyScoped<KeyMetrics>[]): Promise<Stored<KeyMetrics>[]>;
  upsertFinancialRatios(
    rows: CompanyScoped<FinancialRatios>[],
  ): Promise<Stored<FinancialRatios>[]>;
  upsertFinancialScores(
    row: CompanyScoped<FinancialScores>,
  ): Promise<Stored<FinancialScores>>;
  latestKeyMetrics(symbol: string): Promise<Stored<KeyMetrics> | null>;
  latestFinancialRatios(symbol: string): Promise<Stored<FinancialRatios> | null>;
}

export interface PriceTargetRepositoryPort {
  upsertConsensus(
    row: CompanyScoped<PriceTargetConsensus>,
  ): Promise<Stored<PriceTargetConsensus>>;
  upsertSummary(
    row: CompanyScoped<PriceTargetSummary>,
  ): Promise<Stored<PriceTargetSummary>>;
}

export interface FinancialHealthRepositoryPort {
  upsertMany(rows: FinancialHealthRow[]): Promise<StoredFinancialHealthRow[]>;
}

export interface ClockPort {
  now(): Date;
}

export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}
