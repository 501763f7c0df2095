import { Hono, type Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { SyncServices } from "../application/bootstrap/runtimeFactory";
import type { PeriodicSyncOptions, SyncResult } from "../application/services/syncSupport";
import type { AppBoundaryErrorCode } from "../core/entities/appError";
import { logger as rootLogger, toErrorDetails, type Logger } from "../shared/logger/logger";
import {
  fullSyncQuerySchema,
  parseOrThrow,
  periodicQuerySchema,
  RequestValidationError,
  symbolSchema,
} from "./validation";

export type SyncDefaults = {
  financialLimit: number;
  metricsLimit: number;
  stepDelayMs: number;
};

type ErrorStatus = 404 | 422 | 429 | 502;

const statusForCode = (code: AppBoundaryErrorCode): ErrorStatus => {
  switch (code) {
    case "not_found":
      return 404;
    case "validation_error":
      return 422;
    case "rate_limited":
      return 429;
    default:
      return 502;
  }
};

const respond = (c: Context, result: SyncResult<object>) => {
  if (result.isOk()) {
    return c.json(result.value);
  }

  const { code, message, provider } = result.error;
  const status = statusForCode(code);
  return status === 404
    ? c.json({ detail: message }, status)
    : c.json({ detail: message, code, provider }, status);
};

type PeriodicRoute = {
  path: string;
  limit: "financialLimit" | "metricsLimit";
  run: (symbol: string, options: PeriodicSyncOptions) => Promise<SyncResult<object>>;
};

type SingleRoute = {
  path: string;
  run: (symbol: string) => Promise<SyncResult<object>>;
};

/**
 * Internal sync API: one GET per dataset plus the full sync, all keyed by ticker symbol.
 */
export const createApp = (
  services: SyncServices,
  defaults: SyncDefaults,
  logger: Logger = rootLogger.child({ component: "http" }),
) => {
  const app = new Hono();

  app.use(async (c, next) => {
    const startedAt = performance.now();
    await next();
    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Math.round(performance.now() - startedAt),
      },
      "HTTP request",
    );
  });

  app.get("/healthz", (c) => c.json({ status: "ok" }));

  const singleRoutes: SingleRoute[] = [
    { path: "company", run: (symbol) => services.company.syncCompany(symbol) },
    {
      path: "financial-scores",
      run: (symbol) => services.metrics.syncFinancialScores(symbol),
    },
    {
      path: "price-target",
      run: (symbol) => services.priceTargets.syncPriceTarget(symbol),
    },
    {
      path: "price-target-summary",
      run: (symbol) => services.priceTargets.syncPriceTargetSummary(symbol),
    },
    {
      path: "financial-health",
      run: (symbol) => services.health.syncFinancialHealth(symbol),
    },
  ];

  const periodicRoutes: PeriodicRoute[] = [
    {
      path: "income-statement",
      limit: "financialLimit",
      run: (symbol, options) =>
        services.statements.syncIncomeStatements(symbol, options),
    },
    {
      path: "balance-sheet",
      limit: "financialLimit",
      run: (symbol, options) => services.statements.syncBalanceSheets(symbol, options),
    },
    {
      path: "cash-flow",
      limit: "financialLimit",
      run: (symbol, options) =>
        services.statements.syncCashFlowStatements(symbol, options),
    },
    {
      path: "key-metrics",
      limit: "metricsLimit",
      run: (symbol, options) => services.metrics.syncKeyMetrics(symbol, options),
    },
    {
      path: "financial-ratios",
      limit: "metricsLimit",
      run: (symbol, options) => services.metrics.syncFinancialRatios(symbol, options),
    },
  ];

  for (const route of singleRoutes) {
    app.get(`/internal/${route.path}/:symbol/sync`, async (c) => {
      const symbol = parseOrThrow(symbolSchema, c.req.param("symbol"), "path");
      return respond(c, await route.run(symbol));
    });
  }

  for (const route of periodicRoutes) {
    const querySchema = periodicQuerySchema(defaults[route.limit]);
    app.get(`/internal/${route.path}/:symbol/sync`, async (c) => {
      const symbol = parseOrThrow(symbolSchema, c.req.param("symbol"), "path");
      const options = parseOrThrow(querySchema, c.req.query(), "query");
      return respond(c, await route.run(symbol, options));
    });
  }

  const fullSyncQuery = fullSyncQuerySchema(defaults);
  app.get("/internal/company/:symbol/sync-all", async (c) => {
    const symbol = parseOrThrow(symbolSchema, c.req.param("symbol"), "path");
    const options = parseOrThrow(fullSyncQuery, c.req.query(), "query");
    return c.json(await services.fullSync.syncAll(symbol, options));
  });

  app.notFound((c) => c.json({ detail: "Not found" }, 404));

  app.onError((error, c) => {
    if (error instanceof RequestValidationError) {
      return c.json({ detail: error.message, issues: error.issues }, 422);
    }

    if (error instanceof HTTPException) {
      return error.getResponse();
    }

    logger.error(
      { method: c.req.method, path: c.req.path, error: toErrorDetails(error) },
      "Unhandled request error",
    );
    return c.json({ detail: "Internal server error" }, 500);
  });

  return app;
};
