import { ok } from "neverthrow";
import type { CompanyEntity, CompanyProfile } from "../../core/entities/company";
import type {
  FinancialHealthRow,
  StoredFinancialHealthRow,
} from "../../core/entities/financialHealth";
import type {
  BalanceSheet,
  CashFlowStatement,
  CompanyScoped,
  IncomeStatement,
  Stored,
} from "../../core/entities/financialStatement";
import type {
  FinancialRatios,
  FinancialScores,
  KeyMetrics,
} from "../../core/entities/metrics";
import type {
  PriceTargetConsensus,
  PriceTargetSummary,
} from "../../core/entities/priceTarget";
import type {
  CompanyRepositoryPort,
  FinancialHealthRepositoryPort,
  FinancialStatementsRepositoryPort,
  MetricsRepositoryPort,
  PriceTargetRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";
import { MockMarketDataProvider } from "../../infra/providers/mocks/mockMarketDataProvider";

export const FIXED_NOW = new Date("2025-03-01T12:00:00.000Z");

/**
 * Natural-key keyed store mirroring the upsert semantics of the Postgres repositories.
 */
class UpsertTable<T> {
  private readonly rows = new Map<string, Stored<T>>();
  private nextId = 1;

  constructor(private readonly keyOf: (row: CompanyScoped<T>) => string) {}

  upsert(row: CompanyScoped<T>): Stored<T> {
    const key = this.keyOf(row);
    const existing = this.rows.get(key);
    const stored: Stored<T> = {
      ...row,
      id: existing?.id ?? this.nextId++,
      createdAt: existing?.createdAt ?? FIXED_NOW,
      updatedAt: FIXED_NOW,
    };
    this.rows.set(key, stored);
    return stored;
  }

  all(): Stored<T>[] {
    return [...this.rows.values()];
  }
}

const periodKey = (row: {
  companyId: number;
  fiscalYear: string;
  period: string;
}): string => `${row.companyId}|${row.fiscalYear}|${row.period}`;

const latestBySymbol = <T extends { symbol: string; date: string }>(
  rows: Stored<T>[],
  symbol: string,
): Stored<T> | null =>
  rows
    .filter((row) => row.symbol === symbol)
    .sort((left, right) => right.date.localeCompare(left.date))[0] ?? null;

export class InMemoryCompanyRepository implements CompanyRepositoryPort {
  readonly companies = new Map<string, CompanyEntity>();
  private nextId = 1;

  async findBySymbol(symbol: string): Promise<CompanyEntity | null> {
    return this.companies.get(symbol.toUpperCase()) ?? null;
  }

  async upsert(profile: CompanyProfile): Promise<CompanyEntity> {
    const symbol = profile.symbol.toUpperCase();
    const existing = this.companies.get(symbol);
    const entity: CompanyEntity = {
      ...profile,
      symbol,
      id: existing?.id ?? this.nextId++,
      createdAt: existing?.createdAt ?? FIXED_NOW,
      updatedAt: FIXED_NOW,
    };
    this.companies.set(symbol, entity);
    return entity;
  }
}

export class InMemoryFinancialStatementsRepository
  implements FinancialStatementsRepositoryPort
{
  readonly income = new UpsertTable<IncomeStatement>(periodKey);
  readonly balance = new UpsertTable<BalanceSheet>(periodKey);
  readonly cashFlow = new UpsertTable<CashFlowStatement>(periodKey);

  async upsertIncomeStatements(
    rows: CompanyScoped<IncomeStatement>[],
  ): Promise<Stored<IncomeStatement>[]> {
    return rows.map((row) => this.income.upsert(row));
  }

  async upsertBalanceSheets(
    rows: CompanyScoped<BalanceSheet>[],
  ): Promise<Stored<BalanceSheet>[]> {
    return rows.map((row) => this.balance.upsert(row));
  }

  async upsertCashFlowStatements(
    rows: CompanyScoped<CashFlowStatement>[],
  ): Promise<Stored<CashFlowStatement>[]> {
    return rows.map((row) => this.cashFlow.upsert(row));
  }
}

export class InMemoryMetricsRepository implements MetricsRepositoryPort {
  readonly keyMetrics = new UpsertTable<KeyMetrics>(periodKey);
  readonly ratios = new UpsertTable<FinancialRatios>(periodKey);
  readonly scores = new UpsertTable<FinancialScores>((row) =>
    String(row.companyId),
  );

  async upsertKeyMetrics(
    rows: CompanyScoped<KeyMetrics>[],
  ): Promise<Stored<KeyMetrics>[]> {
    return rows.map((row) => this.keyMetrics.upsert(row));
  }

  async upsertFinancialRatios(
    rows: CompanyScoped<FinancialRatios>[],
  ): Promise<Stored<FinancialRatios>[]> {
    return rows.map((row) => this.ratios.upsert(row));
  }

  async upsertFinancialScores(
    row: CompanyScoped<FinancialScores>,
  ): Promise<Stored<FinancialScores>> {
    return this.scores.upsert(row);
  }

  async latestKeyMetrics(symbol: string): Promise<Stored<KeyMetrics> | null> {
    return latestBySymbol(this.keyMetrics.all(), symbol.toUpperCase());
  }

  async latestFinancialRatios(
    symbol: string,
  ): Promise<Stored<FinancialRatios> | null> {
    return latestBySymbol(this.ratios.all(), symbol.toUpperCase());
  }
}

export class InMemoryPriceTargetRepository implements PriceTargetRepositoryPort {
  readonly consensus = new UpsertTable<PriceTargetConsensus>((row) =>
    String(row.companyId),
  );
  readonly summaries = new UpsertTable<PriceTargetSummary>((row) =>
    String(row.companyId),
  );

  async upsertConsensus(
    row: CompanyScoped<PriceTargetConsensus>,
  ): Promise<Stored<PriceTargetConsensus>> {
    return this.consensus.upsert(row);
  }

  async upsertSummary(
    row: CompanyScoped<PriceTargetSummary>,
  ): Promise<Stored<PriceTargetSummary>> {
    return this.summaries.upsert(row);
  }
}

export class InMemoryFinancialHealthRepository
  implements FinancialHealthRepositoryPort
{
  readonly rows = new Map<string, StoredFinancialHealthRow>();
  private nextId = 1;

  async upsertMany(
    rows: FinancialHealthRow[],
  ): Promise<StoredFinancialHealthRow[]> {
    return rows.map((row) => {
      const key = `${row.symbol}|${row.section}|${row.metric}`;
      const existing = this.rows.get(key);
      const stored: StoredFinancialHealthRow = {
        ...row,
        id: existing?.id ?? this.nextId++,
        createdAt: existing?.createdAt ?? FIXED_NOW,
        updatedAt: FIXED_NOW,
      };
      this.rows.set(key, stored);
      return stored;
    });
  }
}

/**
 * Mock provider with selected datasets overridden per test.
 */
export const providerWith = (
  overrides: Partial<MarketDataProviderPort>,
): MarketDataProviderPort => {
  const base = new MockMarketDataProvider();
  return {
    name: overrides.name ?? base.name,
    fetchCompanyProfile:
      overrides.fetchCompanyProfile ?? ((symbol) => base.fetchCompanyProfile(symbol)),
    fetchIncomeStatements:
      overrides.fetchIncomeStatements ??
      ((request) => base.fetchIncomeStatements(request)),
    fetchBalanceSheets:
      overrides.fetchBalanceSheets ?? ((request) => base.fetchBalanceSheets(request)),
    fetchCashFlowStatements:
      overrides.fetchCashFlowStatements ??
      ((request) => base.fetchCashFlowStatements(request)),
    fetchKeyMetrics:
      overrides.fetchKeyMetrics ?? ((request) => base.fetchKeyMetrics(request)),
    fetchFinancialRatios:
      overrides.fetchFinancialRatios ??
      ((request) => base.fetchFinancialRatios(request)),
    fetchFinancialScores:
      overrides.fetchFinancialScores ??
      ((symbol) => base.fetchFinancialScores(symbol)),
    fetchPriceTargetConsensus:
      overrides.fetchPriceTargetConsensus ??
      ((symbol) => base.fetchPriceTargetConsensus(symbol)),
    fetchPriceTargetSummary:
      overrides.fetchPriceTargetSummary ??
      ((symbol) => base.fetchPriceTargetSummary(symbol)),
  };
};

export const emptyList = async () => ok([]);

export const nothing = async () => ok(null);
