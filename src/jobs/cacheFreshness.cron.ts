import cron, { ScheduledTask } from 'node-cron';
import logger from '../utils/logger.js';
import type { RefreshOrchestrator } from '../services/cache/refreshOrchestrator.js';

export type CacheFreshnessJobOptions = {
  expression: string;
  timezone: string;
};

type FreshnessRefresher = Pick<RefreshOrchestrator, 'refreshIfStale' | 'getProgress'>;

let scheduledTask: ScheduledTask | null = null;

export const checkCacheFreshness = async (refresher: FreshnessRefresher): Promise<void> => {
  try {
    const refreshed = await refresher.refreshIfStale();
    if (refreshed) {
      logger.info(`[cache-check] Stale cache refreshed (status=${refresher.getProgress().status})`);
    } else {
      logger.debug('[cache-check] Cache is fresh or a refresh is already running');
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    logger.error(`[cache-check] Freshness check failed: ${message}`, error);
  }
};

export const startCacheFreshnessJob = (refresher: FreshnessRefresher, options: CacheFreshnessJobOptions): void => {
  if (scheduledTask) {
    scheduledTask.stop();
  }

  scheduledTask = cron.schedule(options.expression, () => checkCacheFreshness(refresher), {
    timezone: options.timezone,
  });

  logger.info(`[cache-check] Cron job registered (expression="${options.expression}", timezone="${options.timezone}")`);
};

export const stopCacheFreshnessJob = (): void => {
  if (scheduledTask) {
    scheduledTask.stop();
    scheduledTask = null;
  }
};
