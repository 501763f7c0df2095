import type { Stored } from "../../core/entities/financialStatement";
import type {
  FinancialRatios,
  FinancialScores,
  KeyMetrics,
} from "../../core/entities/metrics";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";
import type {
  CompanyRepositoryPort,
  MetricsRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import {
  DEFAULT_PERIODIC_SYNC_OPTIONS,
  periodicDataset,
  singleDataset,
  syncDataset,
  type PeriodicSyncOptions,
  type SyncResult,
} from "./syncSupport";

/**
 * Syncs key metrics and financial ratios per period, plus the point-in-time financial scores.
 */
export class MetricsSyncService {
  constructor(
    private readonly provider: MarketDataProviderPort,
    private readonly companies: CompanyRepositoryPort,
    private readonly metrics: MetricsRepositoryPort,
    private readonly logger: Logger = rootLogger.child({
      service: "metrics-sync",
    }),
  ) {}

  async syncKeyMetrics(
    symbol: string,
    options: PeriodicSyncOptions = DEFAULT_PERIODIC_SYNC_OPTIONS,
  ): Promise<SyncResult<Stored<KeyMetrics>[]>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      periodicDataset(
        "Key metrics",
        () => this.provider.fetchKeyMetrics({ symbol: upper, ...options }),
        (rows) => this.metrics.upsertKeyMetrics(rows),
      ),
    );
  }

  async syncFinancialRatios(
    symbol: string,
    options: PeriodicSyncOptions = DEFAULT_PERIODIC_SYNC_OPTIONS,
  ): Promise<SyncResult<Stored<FinancialRatios>[]>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      periodicDataset(
        "Financial ratios",
        () => this.provider.fetchFinancialRatios({ symbol: upper, ...options }),
        (rows) => this.metrics.upsertFinancialRatios(rows),
      ),
    );
  }

  async syncFinancialScores(
    symbol: string,
  ): Promise<SyncResult<Stored<FinancialScores>>> {
    const upper = symbol.toUpperCase();
    return syncDataset(
      this.companies,
      this.logger,
      upper,
      singleDataset(
        "Financial scores",
        () => this.provider.fetchFinancialScores(upper),
        (row) => this.metrics.upsertFinancialScores(row),
      ),
    );
  }
}
