import { type AppConfig, ConfigError, loadConfig } from "./config";
import { createApp } from "./app";
import { initSchema } from "./infrastructure/db/database";
import { loggerFromConfig } from "./infrastructure/logging/logger";

function main() {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const logger = loggerFromConfig(config);

  try {
    initSchema({
      path: config.database.path,
      busyTimeoutMs: config.database.busyTimeoutMs,
      reset: config.database.resetOnStart,
    });
    logger.info(
      { database: config.database.path, reset: config.database.resetOnStart },
      "database initialized"
    );
  } catch (err) {
    logger.fatal({ err }, "failed to initialize database");
    process.exit(1);
  }

  const app = createApp({ config, logger });
  const server = app.listen(config.port, config.host, () => {
    logger.info({ host: config.host, port: config.port }, "task list listening");
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down");
    server.close((err) => {
      if (err) {
        logger.error({ err }, "error while closing server");
        process.exit(1);
      }
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main();
