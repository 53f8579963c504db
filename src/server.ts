import 'reflect-metadata';
import { collectDefaultMetrics } from 'prom-client';
import { createApp } from './app.js';
import { createCacheDatabase } from './config/database.js';
import { loadConfig, loadEnvFile } from './config/env.js';
import { startCacheFreshnessJob, stopCacheFreshnessJob } from './jobs/cacheFreshness.cron.js';
import register from './metrics/metrics.js';
import { GovernanceContext } from './services/governanceContext.js';
import { PgRemoteAdapter } from './services/remote/pgRemoteAdapter.js';
import { WarehouseRemoteStore } from './services/remote/warehouseRemoteStore.js';
import logger from './utils/logger.js';

collectDefaultMetrics({ register });

async function bootstrap(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();

  const database = await createCacheDatabase(config.cacheDbPath);
  const adapter = new PgRemoteAdapter(config.warehouse);
  const remote = new WarehouseRemoteStore(adapter, config.warehouse);
  const context = new GovernanceContext({
    database,
    remote,
    settings: config,
    onClose: () => adapter.close(),
  });

  context.refresher
    .ensureFresh()
    .then((progress) => logger.info(`[cache-refresh] Startup check finished: ${progress.message}`))
    .catch((error: unknown) => logger.error('[cache-refresh] Startup check failed', error));

  startCacheFreshnessJob(context.refresher, {
    expression: config.cacheCheckCron,
    timezone: config.cacheCheckTimezone,
  });

  const app = createApp(context);
  const server = app.listen(config.apiPort, config.apiHost, () => {
    logger.info(`Server is running on http://${config.apiHost}:${config.apiPort}`);
  });

  const shutdown = (signal: string): void => {
    logger.info(`${signal} received, draining pending changes`);
    stopCacheFreshnessJob();
    server.close();
    context
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error: unknown) => {
  logger.error('Service failed to start', error);
  process.exitCode = 1;
});
