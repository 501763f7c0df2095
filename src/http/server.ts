import { serve, type ServerType } from "@hono/node-server";
import type { Runtime } from "../application/bootstrap/runtimeFactory";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { createApp } from "./app";

/**
 * Serves the sync API until SIGINT/SIGTERM, then drains the server and the database pool.
 */
export const startServer = (runtime: Runtime): ServerType => {
  const app = createApp(runtime.services, {
    financialLimit: env.SYNC_FINANCIAL_LIMIT,
    metricsLimit: env.SYNC_METRICS_LIMIT,
    stepDelayMs: env.SYNC_STEP_DELAY_MS,
  });

  const server = serve(
    { fetch: app.fetch, hostname: env.HTTP_HOST, port: env.HTTP_PORT },
    (info) => {
      logger.info(
        { host: info.address, port: info.port, provider: runtime.provider.name },
        "HTTP server listening",
      );
    },
  );

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "Shutting down");
    server.close(() => {
      runtime
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error({ error }, "Database pool did not close cleanly");
          process.exit(1);
        });
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  return server;
};
