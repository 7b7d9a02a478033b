import express from "express";
import { createServer } from "http";
import { PageAnalyzer } from "./analyzer";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { MemoryMetricsSink } from "./metrics";
import { registerRoutes } from "./routes";

const SHUTDOWN_GRACE_MS = 10000;

async function main(): Promise<void> {
  const logger = createLogger();
  const config = loadConfig();

  const metrics = new MemoryMetricsSink();
  const analyzer = new PageAnalyzer({ config: config.analyzer, logger, metrics });

  const app = express();
  app.use(express.json());

  const httpServer = createServer(app);
  await registerRoutes(httpServer, app, {
    analyzer,
    metrics,
    logger,
    requestTimeoutMs: config.server.requestTimeoutMs,
  });

  httpServer.listen(config.server.port, () => {
    logger.info({ port: config.server.port }, "page-inspector listening");
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    const forceExit = setTimeout(() => process.exit(1), SHUTDOWN_GRACE_MS);
    forceExit.unref();
    httpServer.close((error) => {
      if (error) {
        logger.error({ error: error.message }, "error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
