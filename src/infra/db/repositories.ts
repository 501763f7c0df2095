import { desc, eq, getTableColumns, sql, type SQL } from "drizzle-orm";
import type { PgTable } from "drizzle-orm/pg-core";
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
import type { Database } from "./client";
import {
  balanceSheetsTable,
  cashFlowStatementsTable,
  companiesTable,
  financialHealthTable,
  financialRatiosTable,
  financialScoresTable,
  incomeStatementsTable,
  keyMetricsTable,
  priceTargetSummariesTable,
  priceTargetsTable,
} from "./schema";

const NEVER_OVERWRITTEN = new Set(["id", "createdAt"]);

/**
 * Builds the `DO UPDATE SET` clause: every column takes the incoming row's value except
 * identity and natural-key columns, and `updatedAt` is bumped.
 */
export const excludedColumns = (
  table: PgTable,
  naturalKey: readonly string[],
): Record<string, SQL> => {
  const set = Object.fromEntries(
    Object.entries(getTableColumns(table))
      .filter(
        ([key]) =>
          !NEVER_OVERWRITTEN.has(key) &&
          key !== "updatedAt" &&
          !naturalKey.includes(key),
      )
      .map(([key, column]) => [key, sql.raw(`excluded."${column.name}"`)]),
  );

  return { ...set, updatedAt: sql`now()` };
};

const optional = (value: string | null): string | undefined =>
  value ?? undefined;

const PERIODIC_KEY = ["companyId", "fiscalYear", "period"] as const;

/**
 * Persists company profiles keyed by ticker symbol.
 */
export class PostgresCompanyRepository implements CompanyRepositoryPort {
  constructor(private readonly db: Database) {}

  async findBySymbol(symbol: string): Promise<CompanyEntity | null> {
    const [row] = await this.db
      .select()
      .from(companiesTable)
      .where(eq(companiesTable.symbol, symbol.toUpperCase()))
      .limit(1);

    return row ? toCompanyEntity(row) : null;
  }

  async upsert(profile: CompanyProfile): Promise<CompanyEntity> {
    const [row] = await this.db
      .insert(companiesTable)
      .values({ ...profile, symbol: profile.symbol.toUpperCase() })
      .onConflictDoUpdate({
        target: companiesTable.symbol,
        set: excludedColumns(companiesTable, ["symbol"]),
      })
      .returning();

    if (!row) {
      throw new Error(`Company upsert returned no row for ${profile.symbol}.`);
    }
    return toCompanyEntity(row);
  }
}

const toCompanyEntity = (
  row: typeof companiesTable.$inferSelect,
): CompanyEntity => ({
  ...row,
  industry: optional(row.industry),
  sector: optional(row.sector),
  country: optional(row.country),
  website: optional(row.website),
  description: optional(row.description),
  ceo: optional(row.ceo),
  image: optional(row.image),
  ipoDate: optional(row.ipoDate),
});

/**
 * Stores income statements, balance sheets and cash-flow statements per company and fiscal period.
 */
export class PostgresFinancialStatementsRepository
  implements FinancialStatementsRepositoryPort
{
  constructor(private readonly db: Database) {}

  async upsertIncomeStatements(
    rows: CompanyScoped<IncomeStatement>[],
  ): Promise<Stored<IncomeStatement>[]> {
    if (rows.length === 0) return [];
    const stored = await this.db.transaction(async (tx) =>
      tx
        .insert(incomeStatementsTable)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            incomeStatementsTable.companyId,
            incomeStatementsTable.fiscalYear,
            incomeStatementsTable.period,
          ],
          set: excludedColumns(incomeStatementsTable, PERIODIC_KEY),
        })
        .returning(),
    );

    return stored.map((row) => ({
      ...row,
      reportedCurrency: optional(row.reportedCurrency),
      filingDate: optional(row.filingDate),
    }));
  }

  async upsertBalanceSheets(
    rows: CompanyScoped<BalanceSheet>[],
  ): Promise<Stored<BalanceSheet>[]> {
    if (rows.length === 0) return [];
    const stored = await this.db.transaction(async (tx) =>
      tx
        .insert(balanceSheetsTable)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            balanceSheetsTable.companyId,
            balanceSheetsTable.fiscalYear,
            balanceSheetsTable.period,
          ],
          set: excludedColumns(balanceSheetsTable, PERIODIC_KEY),
        })
        .returning(),
    );

    return stored.map((row) => ({
      ...row,
      reportedCurrency: optional(row.reportedCurrency),
      filingDate: optional(row.filingDate),
    }));
  }

  async upsertCashFlowStatements(
    rows: CompanyScoped<CashFlowStatement>[],
  ): Promise<Stored<CashFlowStatement>[]> {
    if (rows.length === 0) return [];
    const stored = await this.db.transaction(async (tx) =>
      tx
        .insert(cashFlowStatementsTable)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            cashFlowStatementsTable.companyId,
            cashFlowStatementsTable.fiscalYear,
            cashFlowStatementsTable.period,
          ],
          set: excludedColumns(cashFlowStatementsTable, PERIODIC_KEY),
        })
        .returning(),
    );

    return stored.map((row) => ({
      ...row,
      reportedCurrency: optional(row.reportedCurrency),
      filingDate: optional(row.filingDate),
    }));
  }
}

/**
 * Stores key metrics, ratios and scores; the latest period feeds the health report.
 */
export class PostgresMetricsRepository implements MetricsRepositoryPort {
  constructor(private readonly db: Database) {}

  async upsertKeyMetrics(
    rows: CompanyScoped<KeyMetrics>[],
  ): Promise<Stored<KeyMetrics>[]> {
    if (rows.length === 0) return [];
    const stored = await this.db.transaction(async (tx) =>
      tx
        .insert(keyMetricsTable)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            keyMetricsTable.companyId,
            keyMetricsTable.fiscalYear,
            keyMetricsTable.period,
          ],
          set: excludedColumns(keyMetricsTable, PERIODIC_KEY),
        })
        .returning(),
    );

    return stored.map((row) => ({
      ...row,
      reportedCurrency: optional(row.reportedCurrency),
    }));
  }

  async upsertFinancialRatios(
    rows: CompanyScoped<FinancialRatios>[],
  ): Promise<Stored<FinancialRatios>[]> {
    if (rows.length === 0) return [];
    const stored = await this.db.transaction(async (tx) =>
      tx
        .insert(financialRatiosTable)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            financialRatiosTable.companyId,
            financialRatiosTable.fiscalYear,
            financialRatiosTable.period,
          ],
          set: excludedColumns(financialRatiosTable, PERIODIC_KEY),
        })
        .returning(),
    );

    return stored.map((row) => ({
      ...row,
      reportedCurrency: optional(row.reportedCurrency),
    }));
  }

  async upsertFinancialScores(
    row: CompanyScoped<FinancialScores>,
  ): Promise<Stored<FinancialScores>> {
    const [stored] = await this.db
      .insert(financialScoresTable)
      .values(row)
      .onConflictDoUpdate({
        target: financialScoresTable.companyId,
        set: excludedColumns(financialScoresTable, ["companyId"]),
      })
      .returning();

    if (!stored) {
      throw new Error(`Financial scores upsert returned no row for ${row.symbol}.`);
    }
    return { ...stored, reportedCurrency: optional(stored.reportedCurrency) };
  }

  async latestKeyMetrics(symbol: string): Promise<Stored<KeyMetrics> | null> {
    const [row] = await this.db
      .select()
      .from(keyMetricsTable)
      .where(eq(keyMetricsTable.symbol, symbol.toUpperCase()))
      .orderBy(desc(keyMetricsTable.date))
      .limit(1);

    return row ? { ...row, reportedCurrency: optional(row.reportedCurrency) } : null;
  }

  async latestFinancialRatios(
    symbol: string,
  ): Promise<Stored<FinancialRatios> | null> {
    const [row] = await this.db
      .select()
      .from(financialRatiosTable)
      .where(eq(financialRatiosTable.symbol, symbol.toUpperCase()))
      .orderBy(desc(financialRatiosTable.date))
      .limit(1);

    return row ? { ...row, reportedCurrency: optional(row.reportedCurrency) } : null;
  }
}

/**
 * Keeps one consensus and one summary row per company.
 */
export class PostgresPriceTargetRepository implements PriceTargetRepositoryPort {
  constructor(private readonly db: Database) {}

  async upsertConsensus(
    row: CompanyScoped<PriceTargetConsensus>,
  ): Promise<Stored<PriceTargetConsensus>> {
    const [stored] = await this.db
      .insert(priceTargetsTable)
      .values(row)
      .onConflictDoUpdate({
        target: priceTargetsTable.companyId,
        set: excludedColumns(priceTargetsTable, ["companyId"]),
      })
      .returning();

    if (!stored) {
      throw new Error(`Price target upsert returned no row for ${row.symbol}.`);
    }
    return stored;
  }

  async upsertSummary(
    row: CompanyScoped<PriceTargetSummary>,
  ): Promise<Stored<PriceTargetSummary>> {
    const [stored] = await this.db
      .insert(priceTargetSummariesTable)
      .values(row)
      .onConflictDoUpdate({
        target: priceTargetSummariesTable.companyId,
        set: excludedColumns(priceTargetSummariesTable, ["companyId"]),
      })
      .returning();

    if (!stored) {
      throw new Error(
        `Price target summary upsert returned no row for ${row.symbol}.`,
      );
    }
    return stored;
  }
}

/**
 * Replaces health records per (symbol, section, metric) so a re-run overwrites the previous report.
 */
export class PostgresFinancialHealthRepository
  implements FinancialHealthRepositoryPort
{
  constructor(private readonly db: Database) {}

  async upsertMany(
    rows: FinancialHealthRow[],
  ): Promise<StoredFinancialHealthRow[]> {
    if (rows.length === 0) return [];
    return this.db.transaction(async (tx) =>
      tx
        .insert(financialHealthTable)
        .values(rows)
        .onConflictDoUpdate({
          target: [
            financialHealthTable.symbol,
            financialHealthTable.section,
            financialHealthTable.metric,
          ],
          set: excludedColumns(financialHealthTable, [
            "symbol",
            "section",
            "metric",
          ]),
        })
        .returning(),
    );
  }
}
