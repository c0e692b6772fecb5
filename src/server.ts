import { loadedEnvFile, readConfig } from './config/env.js';
import logger from './utils/logger.js';
import { openDatabase } from './config/database.js';
import { registerDefaultMetrics } from './metrics/metrics.js';
import { createLedgerServices, loadCategoryCatalog } from './ledger/index.js';
import { createApp } from './app.js';

async function bootstrap(): Promise<void> {
  const config = readConfig();
  logger.info(
    loadedEnvFile
      ? `dotenv: loaded ${loadedEnvFile} for NODE_ENV=${config.environment}`
      : `dotenv: no env file for NODE_ENV=${config.environment}, using process.env`,
  );

  registerDefaultMetrics();

  const catalog = loadCategoryCatalog(config.catalogPath);
  logger.info(
    `Category catalog loaded from ${config.catalogPath} (expense=${Object.keys(catalog.expense).length}, credit=${Object.keys(catalog.credit).length}, subcategories=${config.subcategoryPolicy})`,
  );

  const database = await openDatabase({ storage: config.dbStorage, logging: config.dbLogging });

  const { toolkit } = createLedgerServices({ database, catalog, subcategoryPolicy: config.subcategoryPolicy });
  const app = createApp({ toolkit, corsOrigins: config.corsOrigins, rateLimitMax: config.rateLimitMax });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Ledger tools listening on http://${config.host}:${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, closing server`);
    server.close(() => {
      try {
        database.close();
        process.exit(0);
      } catch (error) {
        logger.error(`Failed to close database: ${error instanceof Error ? error.message : String(error)}`);
        process.exit(1);
      }
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error: unknown) => {
  logger.error(`Startup failed: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
