import { cacheRefreshCounter, cacheRefreshDuration } from '../../metrics/metrics.js';
import { DATA_SOURCES, type DataSource, type RemoteStore, type RemoteTimestamps } from '../../types/remote.js';
import type { InvestmentRequestRecord } from '../../types/request.js';
import { AsyncLock, type Release } from '../../utils/asyncLock.js';
import logger from '../../utils/logger.js';
import { nowIso, sleep, type Clock } from '../../utils/time.js';
import type { CacheStore } from './cacheStore.js';
import type { StalenessOracle } from './stalenessOracle.js';

export const REFRESH_STEPS = [
  'connect',
  'current_user',
  'final_approvers',
  'requests',
  'requests_cache',
  'approval_steps',
  'accounts',
] as const;

export type RefreshStep = (typeof REFRESH_STEPS)[number];

export type RefreshStatus = 'idle' | 'checking' | 'loading' | 'complete' | 'error';

export type RefreshProgress = Readonly<{
  status: RefreshStatus;
  currentStep: RefreshStep | null;
  stepsCompleted: number;
  totalSteps: number;
  message: string;
  failedStep: RefreshStep | null;
  startedAt: string | null;
  finishedAt: string | null;
}>;

export type TriggerResult = {
  started: boolean;
  message: string;
};

export type RefreshOrchestratorOptions = {
  clock: Clock;
  maxRetries: number;
  retryDelayMs: number;
  /** Temporary request ids that a full-table replace must keep. */
  preservedRequestIds?: () => ReadonlySet<number>;
};

const STEP_LABELS: Record<RefreshStep, string> = {
  connect: 'Connecting to warehouse',
  current_user: 'Loading current user',
  final_approvers: 'Loading final approvers',
  requests: 'Loading investment requests',
  requests_cache: 'Caching investment requests',
  approval_steps: 'Loading approval steps',
  accounts: 'Loading accounts',
};

class RefreshStepError extends Error {
  constructor(
    readonly step: RefreshStep,
    cause: unknown,
  ) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = 'RefreshStepError';
  }
}

const initialProgress = (): RefreshProgress =>
  Object.freeze({
    status: 'idle',
    currentStep: null,
    stepsCompleted: 0,
    totalSteps: REFRESH_STEPS.length,
    message: 'Cache has not been loaded',
    failedStep: null,
    startedAt: null,
    finishedAt: null,
  });

/**
 * Pulls the mirrored tables from the warehouse in a fixed order. One refresh
 * runs at a time; progress is published as frozen snapshots.
 */
export class RefreshOrchestrator {
  private readonly lock = new AsyncLock();
  private progress: RefreshProgress = initialProgress();
  private running: Promise<void> | null = null;

  constructor(
    private readonly cache: CacheStore,
    private readonly remote: RemoteStore,
    private readonly oracle: StalenessOracle,
    private readonly options: RefreshOrchestratorOptions,
  ) {}

  getProgress(): RefreshProgress {
    return this.progress;
  }

  isRunning(): boolean {
    return this.lock.isLocked;
  }

  triggerRefresh(): TriggerResult {
    const release = this.lock.tryAcquire();
    if (!release) {
      return { started: false, message: 'Cache refresh already in progress' };
    }
    this.running = this.runFullRefresh(release);
    return { started: true, message: 'Cache refresh started' };
  }

  /** Resolves when the refresh started by the last trigger has finished. */
  async whenIdle(): Promise<void> {
    if (this.running) {
      await this.running;
    }
  }

  async ensureFresh(): Promise<RefreshProgress> {
    this.setProgress({ status: 'checking', message: 'Checking cache freshness' });
    const accountCount = await this.cache.countAccounts();
    const stale = accountCount === 0 || (await this.oracle.isStale(['INVESTMENT_REQUESTS']));
    if (!stale) {
      const at = nowIso(this.options.clock);
      this.setProgress({
        status: 'complete',
        currentStep: null,
        stepsCompleted: REFRESH_STEPS.length,
        message: 'Cache is fresh',
        failedStep: null,
        startedAt: at,
        finishedAt: at,
      });
      return this.progress;
    }
    const result = this.triggerRefresh();
    if (!result.started) {
      logger.info('[cache-refresh] Startup check found a refresh already running');
    }
    await this.whenIdle();
    return this.progress;
  }

  async refreshIfStale(sources: readonly DataSource[] = DATA_SOURCES): Promise<boolean> {
    if (this.lock.isLocked) {
      cacheRefreshCounter.inc({ scope: 'full', outcome: 'skipped' });
      return false;
    }
    if (!(await this.oracle.isStale(sources))) {
      return false;
    }
    const result = this.triggerRefresh();
    await this.whenIdle();
    return result.started;
  }

  /** Re-pulls requests and approval steps. Waits for a running refresh. */
  async refreshRequestsAndSteps(): Promise<void> {
    const release = await this.lock.acquire();
    const endTimer = cacheRefreshDuration.startTimer({ scope: 'partial' });
    try {
      const timestamps = await this.oracle.snapshot();
      const requests = await this.remote.fetchRequests();
      const steps = await this.remote.fetchApprovalSteps();
      const preserveIds = this.preservedIds();
      await this.cache.replaceRequests(requests, { preserveIds });
      await this.cache.replaceAllSteps(steps, { preserveIds });
      const refreshedAt = nowIso(this.options.clock);
      await this.cache.setMetadata('INVESTMENT_REQUESTS', timestamps.INVESTMENT_REQUESTS ?? null, refreshedAt);
      await this.cache.setMetadata('APPROVAL_STEPS', timestamps.APPROVAL_STEPS ?? null, refreshedAt);
      cacheRefreshCounter.inc({ scope: 'partial', outcome: 'success' });
      logger.debug(`[cache-refresh] Re-pulled ${requests.length} requests and ${steps.length} steps`);
    } catch (error) {
      cacheRefreshCounter.inc({ scope: 'partial', outcome: 'error' });
      throw error;
    } finally {
      endTimer();
      release();
    }
  }

  private preservedIds(): ReadonlySet<number> {
    return this.options.preservedRequestIds ? this.options.preservedRequestIds() : new Set<number>();
  }

  private setProgress(update: Partial<RefreshProgress>): void {
    this.progress = Object.freeze({ ...this.progress, ...update });
  }

  private async runFullRefresh(release: Release): Promise<void> {
    const endTimer = cacheRefreshDuration.startTimer({ scope: 'full' });
    this.setProgress({
      status: 'loading',
      currentStep: null,
      stepsCompleted: 0,
      message: 'Refreshing cache',
      failedStep: null,
      startedAt: nowIso(this.options.clock),
      finishedAt: null,
    });
    const attempts = this.options.maxRetries + 1;
    try {
      for (let attempt = 1; attempt <= attempts; attempt += 1) {
        try {
          await this.runSteps();
          this.setProgress({
            status: 'complete',
            currentStep: null,
            stepsCompleted: REFRESH_STEPS.length,
            message: 'Cache refresh complete',
            failedStep: null,
            finishedAt: nowIso(this.options.clock),
          });
          cacheRefreshCounter.inc({ scope: 'full', outcome: 'success' });
          logger.info('[cache-refresh] Cache refresh complete');
          return;
        } catch (error) {
          const step = error instanceof RefreshStepError ? error.step : (this.progress.currentStep ?? 'connect');
          const message = error instanceof Error ? error.message : 'Unknown error';
          logger.warn(`[cache-refresh] Attempt ${attempt}/${attempts} failed at ${step}: ${message}`);
          if (attempt < attempts) {
            this.setProgress({ failedStep: step, message: `Retrying after failure in ${step}` });
            await sleep(this.options.retryDelayMs);
            continue;
          }
          this.setProgress({
            status: 'error',
            currentStep: step,
            failedStep: step,
            message: `Failed to load ${step}: ${message}`,
            finishedAt: nowIso(this.options.clock),
          });
          cacheRefreshCounter.inc({ scope: 'full', outcome: 'error' });
          logger.error(`[cache-refresh] Cache refresh failed at ${step}: ${message}`);
        }
      }
    } finally {
      endTimer();
      release();
    }
  }

  private async runSteps(): Promise<void> {
    let timestamps: RemoteTimestamps = {};
    let requests: InvestmentRequestRecord[] = [];
    const preserveIds = this.preservedIds();

    for (const [index, step] of REFRESH_STEPS.entries()) {
      this.setProgress({ currentStep: step, message: STEP_LABELS[step] });
      try {
        switch (step) {
          case 'connect':
            await this.remote.ping();
            timestamps = await this.oracle.snapshot();
            break;
          case 'current_user':
            await this.cache.replaceCurrentUser(await this.remote.fetchCurrentUser(), nowIso(this.options.clock));
            break;
          case 'final_approvers':
            await this.cache.replaceFinalApprovers(await this.remote.fetchFinalApprovers());
            break;
          case 'requests':
            requests = await this.remote.fetchRequests();
            break;
          case 'requests_cache':
            await this.cache.replaceRequests(requests, { preserveIds });
            break;
          case 'approval_steps':
            await this.cache.replaceAllSteps(await this.remote.fetchApprovalSteps(), { preserveIds });
            break;
          case 'accounts':
            await this.cache.replaceAccounts(await this.remote.fetchAccounts());
            break;
        }
      } catch (error) {
        throw new RefreshStepError(step, error);
      }
      this.setProgress({ stepsCompleted: Math.max(this.progress.stepsCompleted, index + 1) });
    }

    const refreshedAt = nowIso(this.options.clock);
    for (const source of DATA_SOURCES) {
      await this.cache.setMetadata(source, timestamps[source] ?? null, refreshedAt);
    }
  }
}
