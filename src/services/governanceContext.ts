import type { Sequelize } from 'sequelize-typescript';
import type { AppConfig } from '../config/env.js';
import type { RemoteStore } from '../types/remote.js';
import { systemClock, type Clock } from '../utils/time.js';
import { ApprovalChainResolver } from './approvals/approvalChainResolver.js';
import { RequestService } from './approvals/requestService.js';
import { CacheStore } from './cache/cacheStore.js';
import { RefreshOrchestrator } from './cache/refreshOrchestrator.js';
import { StalenessOracle } from './cache/stalenessOracle.js';
import { IdentityResolver } from './identity/identityResolver.js';
import { LookupService } from './lookup/lookupService.js';
import { WriteReconciler } from './sync/writeReconciler.js';

export type GovernanceSettings = Pick<
  AppConfig,
  | 'adminUsername'
  | 'timestampTtlSeconds'
  | 'refreshMaxRetries'
  | 'refreshRetryDelayMs'
  | 'syncConcurrency'
  | 'syncMaxPending'
  | 'employeeSearchTtlSeconds'
>;

export type GovernanceContextOptions = {
  database: Sequelize;
  remote: RemoteStore;
  settings: GovernanceSettings;
  clock?: Clock;
  /** Called on shutdown after pending syncs have drained. */
  onClose?: () => Promise<void>;
};

/**
 * Owns every component of one running service: the cache, the remote store
 * and the services built on them.
 */
export class GovernanceContext {
  readonly cache: CacheStore;
  readonly remote: RemoteStore;
  readonly oracle: StalenessOracle;
  readonly refresher: RefreshOrchestrator;
  readonly reconciler: WriteReconciler;
  readonly resolver: ApprovalChainResolver;
  readonly identity: IdentityResolver;
  readonly requests: RequestService;
  readonly lookups: LookupService;

  private readonly database: Sequelize;
  private readonly onClose?: () => Promise<void>;

  constructor(options: GovernanceContextOptions) {
    const clock = options.clock ?? systemClock;
    const { settings } = options;

    this.database = options.database;
    this.onClose = options.onClose;
    this.remote = options.remote;
    this.cache = new CacheStore();
    this.oracle = new StalenessOracle(this.cache, this.remote, { ttlSeconds: settings.timestampTtlSeconds, clock });
    this.refresher = new RefreshOrchestrator(this.cache, this.remote, this.oracle, {
      clock,
      maxRetries: settings.refreshMaxRetries,
      retryDelayMs: settings.refreshRetryDelayMs,
      preservedRequestIds: () => this.reconciler.temporaryRequestIds(),
    });
    this.reconciler = new WriteReconciler(this.oracle, this.refresher, {
      concurrency: settings.syncConcurrency,
      maxPending: settings.syncMaxPending,
    });
    this.resolver = new ApprovalChainResolver(this.cache, this.remote);
    this.identity = new IdentityResolver(this.cache, this.remote, {
      adminUsername: settings.adminUsername,
      employeeSearchTtlSeconds: settings.employeeSearchTtlSeconds,
      clock,
    });
    this.requests = new RequestService(this.cache, this.remote, this.resolver, this.identity, this.reconciler, clock);
    this.lookups = new LookupService(this.cache, this.remote, this.identity);
  }

  async close(): Promise<void> {
    await this.reconciler.idle();
    await this.refresher.whenIdle();
    if (this.onClose) {
      await this.onClose();
    }
    await this.database.close();
  }
}
