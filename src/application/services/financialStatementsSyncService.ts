import type {
  BalanceSheet,
  CashFlowStatement,
  IncomeStatement,
  Stored,
} from "../../core/entities/financialStatement";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";
import type {
  CompanyRepositoryPort,
  FinancialStatementsRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import {
  DEFAULT_PERIODIC_SYNC_OPTIONS,
  periodicDataset,
  syncDataset,
  type PeriodicSyncOptions,
  type SyncResult,
} from "./syncSupport";

/**
 * Syncs income statements, balance sheets and cash-flow statements per fiscal period.
 */
export class FinancialStatementsSyncService {
  constructor(
    private readonly provider: MarketDataProviderPort,
    private readonly companies: CompanyRepositoryPort,
    private readonly statements: FinancialStatementsRepositoryPort,
    private readonly logger: Logger = rootLogger.child({
      service: "financial-statements-sync",
    }),
  ) {}

  async syncIncomeStatements(
    symbol: string,
    options: PeriodicSyncOptions = DEFAULT_PERIODIC_SYNC_OPTIONS,
  ): Promise<SyncResult<Stored<IncomeStatement>[]>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      periodicDataset(
        "Income statements",
        () => this.provider.fetchIncomeStatements({ symbol: upper, ...options }),
        (rows) => this.statements.upsertIncomeStatements(rows),
      ),
    );
  }

  async syncBalanceSheets(
    symbol: string,
    options: PeriodicSyncOptions = DEFAULT_PERIODIC_SYNC_OPTIONS,
  ): Promise<SyncResult<Stored<BalanceSheet>[]>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      periodicDataset(
        "Balance sheets",
        () => this.provider.fetchBalanceSheets({ symbol: upper, ...options }),
        (rows) => this.statements.upsertBalanceSheets(rows),
      ),
    );
  }

  async syncCashFlowStatements(
    symbol: string,
    options: PeriodicSyncOptions = DEFAULT_PERIODIC_SYNC_OPTIONS,
  ): Promise<SyncResult<Stored<CashFlowStatement>[]>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      periodicDataset(
        "Cash flow statements",
        () => this.provider.fetchCashFlowStatements({ symbol: upper, ...options }),
        (rows) => this.statements.upsertCashFlowStatements(rows),
      ),
    );
  }
}
