import { stalenessCheckCounter } from '../../metrics/metrics.js';
import type { DataSource, RemoteStore, RemoteTimestamps } from '../../types/remote.js';
import logger from '../../utils/logger.js';
import { isOlderThan, type Clock } from '../../utils/time.js';
import type { CacheStore } from './cacheStore.js';

type CachedTimestamps = {
  values: RemoteTimestamps;
  fetchedAt: Date;
};

export type StalenessOracleOptions = {
  ttlSeconds: number;
  clock: Clock;
};

export class StalenessOracle {
  private cached: CachedTimestamps | null = null;

  constructor(
    private readonly cache: CacheStore,
    private readonly remote: RemoteStore,
    private readonly options: StalenessOracleOptions,
  ) {}

  invalidate(): void {
    this.cached = null;
  }

  /** Fetches remote timestamps, bypassing and then refilling the TTL cache. */
  async snapshot(): Promise<RemoteTimestamps> {
    const values = await this.remote.fetchDataSourceTimestamps();
    this.cached = { values, fetchedAt: this.options.clock() };
    return values;
  }

  async remoteTimestamps(): Promise<RemoteTimestamps> {
    if (this.cached && !isOlderThan(this.cached.fetchedAt, this.options.ttlSeconds, this.options.clock)) {
      return this.cached.values;
    }
    return this.snapshot();
  }

  async isStale(sources: readonly DataSource[]): Promise<boolean> {
    try {
      const remote = await this.remoteTimestamps();
      for (const source of sources) {
        const metadata = await this.cache.getMetadata(source);
        if (!metadata) {
          stalenessCheckCounter.inc({ result: 'cold' });
          return true;
        }
        const remoteModified = remote[source];
        if (remoteModified && (!metadata.remoteModified || metadata.remoteModified < remoteModified)) {
          stalenessCheckCounter.inc({ result: 'stale' });
          return true;
        }
      }
      stalenessCheckCounter.inc({ result: 'fresh' });
      return false;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      logger.warn(`[cache-staleness] Staleness check failed, treating cache as stale: ${message}`);
      stalenessCheckCounter.inc({ result: 'error' });
      return true;
    }
  }
}
