import { err, ok, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { CompanyEntity } from "../../core/entities/company";
import type {
  CompanyScoped,
  ReportingPeriod,
  Stored,
} from "../../core/entities/financialStatement";
import type { CompanyRepositoryPort } from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

export type SyncError = AppBoundaryError;

export type SyncResult<T> = Result<T, SyncError>;

export type PeriodicSyncOptions = {
  period: ReportingPeriod;
  limit: number;
};

export const DEFAULT_PERIODIC_SYNC_OPTIONS: PeriodicSyncOptions = {
  period: "quarter",
  limit: 40,
};

/**
 * Names the "<Dataset> not found for symbol: X" failure that HTTP maps to 404.
 */
export const notFound = (
  source: AppBoundarySource,
  dataset: string,
  symbol: string,
): SyncError => ({
  source,
  code: "not_found",
  provider: "database",
  message: `${dataset} not found for symbol: ${symbol}`,
  retryable: false,
});

/**
 * Loads the stored company a dataset hangs off; syncing any dataset for an unknown company is a not_found.
 */
export const resolveCompany = async (
  companies: CompanyRepositoryPort,
  symbol: string,
): Promise<SyncResult<CompanyEntity>> => {
  const company = await companies.findBySymbol(symbol);
  return company ? ok(company) : err(notFound("company", "Company", symbol));
};

type DatasetSync<TFetched, TStored> = {
  label: string;
  source: AppBoundarySource;
  fetch: () => Promise<Result<TFetched | null, AppBoundaryError>>;
  store: (companyId: number, fetched: TFetched) => Promise<TStored>;
  /** Upstream sent rows but none usable, e.g. an empty array. */
  isEmpty?: (fetched: TFetched) => boolean;
  count?: (stored: TStored) => number;
};

/**
 * Shared sync pipeline: resolve company, fetch, reject empty data, attach the company and upsert.
 */
export const syncDataset = async <TFetched, TStored>(
  companies: CompanyRepositoryPort,
  logger: Logger,
  symbol: string,
  dataset: DatasetSync<TFetched, TStored>,
): Promise<SyncResult<TStored>> => {
  const company = await resolveCompany(companies, symbol);
  if (company.isErr()) {
    logger.info({ symbol, dataset: dataset.label }, "Company not synced yet");
    return err(company.error);
  }

  const fetched = await dataset.fetch();
  if (fetched.isErr()) {
    logger.warn(
      {
        symbol,
        dataset: dataset.label,
        code: fetched.error.code,
        reason: fetched.error.message,
      },
      "Dataset fetch failed",
    );
    return err(fetched.error);
  }

  const value = fetched.value;
  if (value === null || dataset.isEmpty?.(value)) {
    logger.info({ symbol, dataset: dataset.label }, "No upstream data");
    return err(notFound(dataset.source, dataset.label, symbol));
  }

  const stored = await dataset.store(company.value.id, value);
  logger.info(
    {
      symbol,
      dataset: dataset.label,
      records: dataset.count ? dataset.count(stored) : 1,
    },
    "Dataset synced",
  );
  return ok(stored);
};

/**
 * Adapter for list datasets keyed by fiscal period.
 */
export const periodicDataset = <T>(
  label: string,
  fetch: () => Promise<Result<T[], AppBoundaryError>>,
  store: (rows: CompanyScoped<T>[]) => Promise<Stored<T>[]>,
): DatasetSync<T[], Stored<T>[]> => ({
  label,
  source: "market_data",
  fetch,
  store: (companyId, rows) => store(rows.map((row) => ({ ...row, companyId }))),
  isEmpty: (rows) => rows.length === 0,
  count: (stored) => stored.length,
});

/**
 * Adapter for datasets holding one row per company.
 */
export const singleDataset = <T>(
  label: string,
  fetch: () => Promise<Result<T | null, AppBoundaryError>>,
  store: (row: CompanyScoped<T>) => Promise<Stored<T>>,
): DatasetSync<T, Stored<T>> => ({
  label,
  source: "market_data",
  fetch,
  store: (companyId, row) => store({ ...row, companyId }),
});
