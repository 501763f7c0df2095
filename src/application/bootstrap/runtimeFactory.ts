import { CompanyFullDataSyncService } from "../services/companyFullDataSyncService";
import { CompanySyncService } from "../services/companySyncService";
import { FinancialHealthSyncService } from "../services/financialHealthSyncService";
import { FinancialStatementsSyncService } from "../services/financialStatementsSyncService";
import { MetricsSyncService } from "../services/metricsSyncService";
import { PriceTargetSyncService } from "../services/priceTargetSyncService";
import { env, marketDataProvider } from "../../shared/config/env";
import { financialHealthConfig } from "../../shared/config/financialHealthConfig";
import { createDb } from "../../infra/db/client";
import {
  PostgresCompanyRepository,
  PostgresFinancialHealthRepository,
  PostgresFinancialStatementsRepository,
  PostgresMetricsRepository,
  PostgresPriceTargetRepository,
} from "../../infra/db/repositories";
import { HttpJsonClient } from "../../infra/http/httpJsonClient";
import { FmpMarketDataProvider } from "../../infra/providers/fmp/fmpMarketDataProvider";
import { MockMarketDataProvider } from "../../infra/providers/mocks/mockMarketDataProvider";
import { SystemClock, TimerSleeper } from "../../infra/system/systemPorts";
import type { MarketDataProviderPort } from "../../core/ports/inboundPorts";

/**
 * Resolves the configured market-data adapter while preserving a mock fallback for local development.
 */
export const createMarketDataProvider = (): MarketDataProviderPort => {
  if (marketDataProvider() === "fmp") {
    return new FmpMarketDataProvider(
      env.FMP_BASE_URL,
      env.FMP_API_KEY,
      {
        timeoutMs: env.FMP_TIMEOUT_MS,
        retries: env.FMP_MAX_RETRIES,
        retryDelayMs: env.FMP_RETRY_DELAY_MS,
      },
      new HttpJsonClient({ minIntervalMs: env.FMP_RATE_LIMIT_DELAY_MS }),
    );
  }

  return new MockMarketDataProvider();
};

/**
 * The services the HTTP routes and CLI commands call into.
 */
export type SyncServices = {
  company: CompanySyncService;
  statements: FinancialStatementsSyncService;
  metrics: MetricsSyncService;
  priceTargets: PriceTargetSyncService;
  health: FinancialHealthSyncService;
  fullSync: CompanyFullDataSyncService;
};

export type Runtime = {
  services: SyncServices;
  provider: MarketDataProviderPort;
  close: () => Promise<void>;
};

/**
 * Centralizes runtime wiring so the HTTP server and CLI share one composition root.
 */
export const createRuntime = (): Runtime => {
  const { db, sql } = createDb(env.POSTGRES_URL, env.POSTGRES_MAX_CONNECTIONS);
  const healthConfig = financialHealthConfig(env.FINANCIAL_HEALTH_CONFIG_DIR);

  const companiesRepo = new PostgresCompanyRepository(db);
  const statementsRepo = new PostgresFinancialStatementsRepository(db);
  const metricsRepo = new PostgresMetricsRepository(db);
  const priceTargetsRepo = new PostgresPriceTargetRepository(db);
  const healthRepo = new PostgresFinancialHealthRepository(db);

  const provider = createMarketDataProvider();

  const company = new CompanySyncService(provider, companiesRepo);
  const statements = new FinancialStatementsSyncService(
    provider,
    companiesRepo,
    statementsRepo,
  );
  const metrics = new MetricsSyncService(provider, companiesRepo, metricsRepo);
  const priceTargets = new PriceTargetSyncService(
    provider,
    companiesRepo,
    priceTargetsRepo,
  );
  const health = new FinancialHealthSyncService(
    companiesRepo,
    metricsRepo,
    healthRepo,
    healthConfig,
  );
  const fullSync = new CompanyFullDataSyncService(
    company,
    priceTargets,
    metrics,
    statements,
    health,
    new TimerSleeper(),
    new SystemClock(),
  );

  return {
    services: { company, statements, metrics, priceTargets, health, fullSync },
    provider,
    close: async () => {
      await sql.end({ timeout: 5 });
    },
  };
};
