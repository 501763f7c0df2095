import { err, ok } from "neverthrow";
import type {
  MetricInput,
  MetricValues,
  StoredFinancialHealthRow,
} from "../../core/entities/financialHealth";
import { buildHealthRecords } from "../../core/health/benchmarkEvaluator";
import type {
  CompanyRepositoryPort,
  FinancialHealthRepositoryPort,
  MetricsRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { FinancialHealthConfig } from "../../shared/config/financialHealthConfig";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { notFound, resolveCompany, type SyncResult } from "./syncSupport";

const isMetricInput = (value: unknown): value is MetricInput =>
  value === null ||
  value === undefined ||
  typeof value === "number" ||
  typeof value === "string";

/**
 * Keeps only scalar fields of a stored row; timestamps and payloads never feed a benchmark.
 */
export const toMetricValues = (row: object): Record<string, MetricInput> => {
  const values: Record<string, MetricInput> = {};
  for (const [key, value] of Object.entries(row)) {
    if (isMetricInput(value)) {
      values[key] = value;
    }
  }
  return values;
};

/**
 * Grades the latest stored key metrics and ratios against the benchmark table and persists the report.
 */
export class FinancialHealthSyncService {
  constructor(
    private readonly companies: CompanyRepositoryPort,
    private readonly metrics: MetricsRepositoryPort,
    private readonly health: FinancialHealthRepositoryPort,
    private readonly config: FinancialHealthConfig,
    private readonly logger: Logger = rootLogger.child({
      service: "financial-health-sync",
    }),
  ) {}

  async syncFinancialHealth(
    symbol: string,
  ): Promise<SyncResult<StoredFinancialHealthRow[]>> {
    const upper = symbol.toUpperCase();
    const company = await resolveCompany(this.companies, upper);
    if (company.isErr()) {
      return err(company.error);
    }

    const [keyMetrics, ratios] = await Promise.all([
      this.metrics.latestKeyMetrics(upper),
      this.metrics.latestFinancialRatios(upper),
    ]);

    if (!keyMetrics) {
      this.logger.info({ symbol: upper }, "No key metrics for health report");
      return err(notFound("financial_health", "Key metrics", upper));
    }
    if (!ratios) {
      this.logger.info({ symbol: upper }, "No financial ratios for health report");
      return err(notFound("financial_health", "Financial ratios", upper));
    }

    // Ratios win where both datasets carry the same key (e.g. currentRatio).
    const merged: MetricValues = {
      ...toMetricValues(keyMetrics),
      ...toMetricValues(ratios),
    };

    const records = buildHealthRecords(
      merged,
      this.config.sectionMap,
      this.config.benchmarks,
    );

    const stored = await this.health.upsertMany(
      records.map((record) => ({
        ...record,
        companyId: company.value.id,
        symbol: upper,
      })),
    );

    this.logger.info(
      {
        symbol: upper,
        records: stored.length,
        warnings: stored.filter((row) => row.status === "warning").length,
      },
      "Financial health synced",
    );
    return ok(stored);
  }
}
