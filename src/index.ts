// Import env config first (loads .env and validates required vars immediately)
import { env } from "./config/env";
import { errorMessage, logger } from "./config/logger";
import { createApp } from "./app";
import { createContext } from "./context";

function start(): void {
  const ctx = createContext({
    dataDir: env.DATA_DIR,
    startingBalance: env.STARTING_BALANCE,
    stockUpdateIntervalSeconds: env.STOCK_UPDATE_INTERVAL_SECONDS,
  });
  logger.info("server", `Data directory: ${env.DATA_DIR}`, {
    achievements: ctx.tracker.achievements().map((d) => d.name),
  });

  // Start the price scheduler (skip in test environment)
  if (env.NODE_ENV !== "test") {
    ctx.scheduler.start();
  }

  const app = createApp(ctx);
  const server = app.listen(env.PORT, () => {
    logger.info("server", `Server is running on http://localhost:${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    });
    logger.info("server", `Health check: http://localhost:${env.PORT}/api/health`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info("server", `${signal} received. Shutting down gracefully...`);
    ctx.scheduler.stop();
    server.close(() => {
      logger.info("server", "Server shut down.");
      process.exit(0);
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

try {
  start();
} catch (err) {
  logger.error("server", "Failed to start", { error: errorMessage(err) });
  process.exit(1);
}
