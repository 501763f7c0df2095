import type { ReportingPeriod } from "../../core/entities/financialStatement";
import type { ClockPort, SleeperPort } from "../../core/ports/outboundPorts";
import {
  logger as rootLogger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import type { CompanySyncService } from "./companySyncService";
import type { FinancialHealthSyncService } from "./financialHealthSyncService";
import type { FinancialStatementsSyncService } from "./financialStatementsSyncService";
import type { MetricsSyncService } from "./metricsSyncService";
import type { PriceTargetSyncService } from "./priceTargetSyncService";
import type { SyncResult } from "./syncSupport";

export type SyncStepName =
  | "company_profile"
  | "price_target"
  | "price_target_summary"
  | "key_metrics"
  | "financial_ratios"
  | "financial_scores"
  | "income_statements"
  | "balance_sheets"
  | "cash_flow_statements"
  | "financial_health";

export type SyncStepOutcome = {
  step: SyncStepName;
  status: "success" | "failed";
  records: number;
  error?: { code: string; message: string };
};

export type FullSyncStatus = "success" | "partial" | "failed";

export type FullSyncReport = {
  symbol: string;
  status: FullSyncStatus;
  steps: SyncStepOutcome[];
  totalApiCalls: number;
  totalTimeSeconds: number;
};

export type FullSyncOptions = {
  financialLimit: number;
  metricsLimit: number;
  stepDelayMs: number;
};

type SyncStep = {
  name: SyncStepName;
  callsApi: boolean;
  run: () => Promise<SyncResult<unknown>>;
};

/** Periodic datasets in a full sync are always fetched as fiscal years. */
const FULL_SYNC_PERIOD: ReportingPeriod = "annual";

const countRecords = (value: unknown): number =>
  Array.isArray(value) ? value.length : 1;

/**
 * Runs every dataset sync for one symbol in a fixed order, recording each step instead of stopping at the first failure.
 */
export class CompanyFullDataSyncService {
  constructor(
    private readonly company: CompanySyncService,
    private readonly priceTargets: PriceTargetSyncService,
    private readonly metrics: MetricsSyncService,
    private readonly statements: FinancialStatementsSyncService,
    private readonly health: FinancialHealthSyncService,
    private readonly sleeper: SleeperPort,
    private readonly clock: ClockPort,
    private readonly logger: Logger = rootLogger.child({
      service: "company-full-sync",
    }),
  ) {}

  async syncAll(symbol: string, options: FullSyncOptions): Promise<FullSyncReport> {
    const upper = symbol.toUpperCase();
    const startedAt = this.clock.now().getTime();
    const steps = this.buildSteps(upper, options);
    const outcomes: SyncStepOutcome[] = [];
    let totalApiCalls = 0;

    for (const [index, step] of steps.entries()) {
      this.logger.info(
        { symbol: upper, step: step.name, position: `${index + 1}/${steps.length}` },
        "Running sync step",
      );

      const outcome = await this.runStep(upper, step);
      outcomes.push(outcome);
      if (outcome.status === "success" && step.callsApi) {
        totalApiCalls += 1;
      }

      const isLast = index === steps.length - 1;
      if (!isLast && options.stepDelayMs > 0) {
        await this.sleeper.sleep(options.stepDelayMs);
      }
    }

    const report: FullSyncReport = {
      symbol: upper,
      status: summarize(outcomes),
      steps: outcomes,
      totalApiCalls,
      totalTimeSeconds:
        Math.round(this.clock.now().getTime() - startedAt) / 1_000,
    };

    this.logger.info(
      {
        symbol: upper,
        status: report.status,
        totalApiCalls,
        totalTimeSeconds: report.totalTimeSeconds,
      },
      "Full sync finished",
    );
    return report;
  }

  private buildSteps(symbol: string, options: FullSyncOptions): SyncStep[] {
    const metricsOptions = { period: FULL_SYNC_PERIOD, limit: options.metricsLimit };
    const financialOptions = {
      period: FULL_SYNC_PERIOD,
      limit: options.financialLimit,
    };

    return [
      {
        name: "company_profile",
        callsApi: true,
        run: () => this.company.syncCompany(symbol),
      },
      {
        name: "price_target",
        callsApi: true,
        run: () => this.priceTargets.syncPriceTarget(symbol),
      },
      {
        name: "price_target_summary",
        callsApi: true,
        run: () => this.priceTargets.syncPriceTargetSummary(symbol),
      },
      {
        name: "key_metrics",
        callsApi: true,
        run: () => this.metrics.syncKeyMetrics(symbol, metricsOptions),
      },
      {
        name: "financial_ratios",
        callsApi: true,
        run: () => this.metrics.syncFinancialRatios(symbol, metricsOptions),
      },
      {
        name: "financial_scores",
        callsApi: true,
        run: () => this.metrics.syncFinancialScores(symbol),
      },
      {
        name: "income_statements",
        callsApi: true,
        run: () => this.statements.syncIncomeStatements(symbol, financialOptions),
      },
      {
        name: "balance_sheets",
        callsApi: true,
        run: () => this.statements.syncBalanceSheets(symbol, financialOptions),
      },
      {
        name: "cash_flow_statements",
        callsApi: true,
        run: () => this.statements.syncCashFlowStatements(symbol, financialOptions),
      },
      {
        name: "financial_health",
        callsApi: false,
        run: () => this.health.syncFinancialHealth(symbol),
      },
    ];
  }

  private async runStep(symbol: string, step: SyncStep): Promise<SyncStepOutcome> {
    try {
      const result = await step.run();
      if (result.isErr()) {
        this.logger.warn(
          { symbol, step: step.name, code: result.error.code, reason: result.error.message },
          "Sync step failed",
        );
        return {
          step: step.name,
          status: "failed",
          records: 0,
          error: { code: result.error.code, message: result.error.message },
        };
      }

      return {
        step: step.name,
        status: "success",
        records: countRecords(result.value),
      };
    } catch (error) {
      this.logger.error(
        { symbol, step: step.name, error: toErrorDetails(error) },
        "Sync step threw",
      );
      return {
        step: step.name,
        status: "failed",
        records: 0,
        error: {
          code: "internal_error",
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }
  }
}

/**
 * Without a company profile nothing else can be stored, so that step alone decides a failed run.
 */
const summarize = (outcomes: readonly SyncStepOutcome[]): FullSyncStatus => {
  const profile = outcomes.find((outcome) => outcome.step === "company_profile");
  if (!profile || profile.status === "failed") {
    return "failed";
  }
  return outcomes.every((outcome) => outcome.status === "success")
    ? "success"
    : "partial";
};
