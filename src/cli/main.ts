import { Command, InvalidArgumentError } from "commander";
import { createRuntime, type Runtime } from "../application/bootstrap/runtimeFactory";
import type { SyncResult } from "../application/services/syncSupport";
import { startServer } from "../http/server";
import { symbolSchema } from "../http/validation";
import { env, marketDataProvider } from "../shared/config/env";
import {
  DEFAULT_FINANCIAL_HEALTH_CONFIG_DIR,
  financialHealthConfig,
} from "../shared/config/financialHealthConfig";
import { logger } from "../shared/logger/logger";
import { formatHealthReport } from "./healthReport";

const datasets = [
  "company",
  "income-statement",
  "balance-sheet",
  "cash-flow",
  "key-metrics",
  "financial-ratios",
  "financial-scores",
  "price-target",
  "price-target-summary",
  "financial-health",
  "all",
] as const;

type Dataset = (typeof datasets)[number];

const isDataset = (value: string): value is Dataset =>
  datasets.some((dataset) => dataset === value);

const parseDataset = (value: string): Dataset => {
  if (!isDataset(value)) {
    throw new InvalidArgumentError(`Expected one of: ${datasets.join(", ")}`);
  }
  return value;
};

const parseSymbol = (value: string): string => {
  const parsed = symbolSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError("Symbol must be 1-12 letters, digits, dots or dashes");
  }
  return parsed.data;
};

const parsePeriod = (value: string): "annual" | "quarter" => {
  if (value !== "annual" && value !== "quarter") {
    throw new InvalidArgumentError("Expected annual or quarter");
  }
  return value;
};

const parseLimit = (value: string): number => {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 100) {
    throw new InvalidArgumentError("Expected an integer between 1 and 100");
  }
  return limit;
};

const parseDelay = (value: string): number => {
  const delay = Number(value);
  if (!Number.isInteger(delay) || delay < 0 || delay > 5_000) {
    throw new InvalidArgumentError("Expected milliseconds between 0 and 5000");
  }
  return delay;
};

type SyncCommandOptions = {
  symbol: string;
  period: "annual" | "quarter";
  limit?: number;
};

const runDatasetSync = async (
  runtime: Runtime,
  dataset: Exclude<Dataset, "all">,
  options: SyncCommandOptions,
): Promise<SyncResult<object>> => {
  const { services } = runtime;
  const { symbol, period } = options;
  const financial = { period, limit: options.limit ?? env.SYNC_FINANCIAL_LIMIT };
  const metrics = { period, limit: options.limit ?? env.SYNC_METRICS_LIMIT };

  switch (dataset) {
    case "company":
      return services.company.syncCompany(symbol);
    case "income-statement":
      return services.statements.syncIncomeStatements(symbol, financial);
    case "balance-sheet":
      return services.statements.syncBalanceSheets(symbol, financial);
    case "cash-flow":
      return services.statements.syncCashFlowStatements(symbol, financial);
    case "key-metrics":
      return services.metrics.syncKeyMetrics(symbol, metrics);
    case "financial-ratios":
      return services.metrics.syncFinancialRatios(symbol, metrics);
    case "financial-scores":
      return services.metrics.syncFinancialScores(symbol);
    case "price-target":
      return services.priceTargets.syncPriceTarget(symbol);
    case "price-target-summary":
      return services.priceTargets.syncPriceTargetSummary(symbol);
    case "financial-health":
      return services.health.syncFinancialHealth(symbol);
  }
};

const withRuntime = async (
  work: (runtime: Runtime) => Promise<number>,
): Promise<void> => {
  const runtime = createRuntime();
  try {
    process.exitCode = await work(runtime);
  } finally {
    await runtime.close();
  }
};

/**
 * Defines a single command surface so operational tasks share the server's wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("fundamentals-sync").description("Financial fundamentals sync service");

  cli
    .command("serve")
    .description("Start the internal sync HTTP API")
    .action(() => {
      startServer(createRuntime());
    });

  cli
    .command("sync")
    .description("Sync one dataset (or all of them) for a symbol")
    .argument("<dataset>", `One of: ${datasets.join(", ")}`, parseDataset)
    .requiredOption("--symbol <symbol>", "Ticker symbol", parseSymbol)
    .option("--period <period>", "annual or quarter", parsePeriod, "quarter")
    .option("--limit <limit>", "Number of periods (1-100)", parseLimit)
    .option("--step-delay <ms>", "Pause between full-sync steps", parseDelay)
    .action(
      async (
        dataset: Dataset,
        opts: SyncCommandOptions & { stepDelay?: number },
      ) => {
        await withRuntime(async (runtime) => {
          if (dataset === "all") {
            const report = await runtime.services.fullSync.syncAll(opts.symbol, {
              financialLimit: opts.limit ?? env.SYNC_FINANCIAL_LIMIT,
              metricsLimit: opts.limit ?? env.SYNC_METRICS_LIMIT,
              stepDelayMs: opts.stepDelay ?? env.SYNC_STEP_DELAY_MS,
            });
            logger.info({ report }, "Full sync report");
            return report.status === "failed" ? 1 : 0;
          }

          const result = await runDatasetSync(runtime, dataset, opts);
          if (result.isErr()) {
            logger.error(
              { symbol: opts.symbol, dataset, error: result.error },
              "Sync failed",
            );
            return 1;
          }

          const records = Array.isArray(result.value) ? result.value.length : 1;
          logger.info({ symbol: opts.symbol, dataset, records }, "Sync complete");
          return 0;
        });
      },
    );

  cli
    .command("health")
    .description("Rebuild and print the financial health report from stored metrics")
    .requiredOption("--symbol <symbol>", "Ticker symbol", parseSymbol)
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: { symbol: string; prettify?: boolean }) => {
      await withRuntime(async (runtime) => {
        const result = await runtime.services.health.syncFinancialHealth(opts.symbol);
        if (result.isErr()) {
          logger.error({ symbol: opts.symbol, error: result.error }, "Health report failed");
          return 1;
        }

        if (opts.prettify) {
          console.log(formatHealthReport(opts.symbol, result.value));
        } else {
          logger.info({ symbol: opts.symbol, records: result.value }, "Financial health");
        }
        return 0;
      });
    });

  cli
    .command("status")
    .description("Report runtime configuration")
    .action(() => {
      const healthConfig = financialHealthConfig(env.FINANCIAL_HEALTH_CONFIG_DIR);
      logger.info(
        {
          http: `${env.HTTP_HOST}:${env.HTTP_PORT}`,
          postgres: env.POSTGRES_URL,
          marketDataProvider: marketDataProvider(),
          fmpBaseUrl: env.FMP_BASE_URL,
          fmpApiKeyConfigured: env.FMP_API_KEY.trim().length > 0,
          syncDefaults: {
            financialLimit: env.SYNC_FINANCIAL_LIMIT,
            metricsLimit: env.SYNC_METRICS_LIMIT,
            stepDelayMs: env.SYNC_STEP_DELAY_MS,
          },
          financialHealth: {
            configDir:
              env.FINANCIAL_HEALTH_CONFIG_DIR || DEFAULT_FINANCIAL_HEALTH_CONFIG_DIR,
            sections: healthConfig.sectionMap.length,
            benchmarks: healthConfig.benchmarks.size,
          },
          startupWorkflow: [
            "docker compose up -d postgres",
            "npm run db:migrate",
            "npm start",
            "curl localhost:8080/internal/company/AAPL/sync-all",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
