import { ServiceUnavailableError, describeError } from '../../errors/governanceErrors.js';
import { remoteSyncCounter } from '../../metrics/metrics.js';
import logger from '../../utils/logger.js';

export type SyncTask = () => Promise<void>;

export type SyncOutcome = {
  label: string;
  remoteError: string | null;
  refreshError: string | null;
};

export type SyncHandle = {
  id: number;
  label: string;
  done: Promise<SyncOutcome>;
};

export type ScheduleOptions = {
  /** Temporary request id created by this sync, kept in the cache until it runs. */
  temporaryRequestId?: number;
};

export interface TimestampInvalidator {
  invalidate(): void;
}

export interface RequestsRefresher {
  refreshRequestsAndSteps(): Promise<void>;
}

export type WriteReconcilerOptions = {
  concurrency: number;
  maxPending: number;
};

type QueueItem = {
  id: number;
  label: string;
  task: SyncTask;
  temporaryRequestId: number | null;
  resolve: (outcome: SyncOutcome) => void;
};

/**
 * Runs the remote half of each mutation in the background. The cache has
 * already been written when a task is scheduled; after the remote call the
 * requests and steps are re-pulled whatever the outcome.
 */
export class WriteReconciler {
  private readonly queue: QueueItem[] = [];
  private readonly pendingTemporaryIds = new Set<number>();
  private readonly idleWaiters: Array<() => void> = [];
  private active = 0;
  private sequence = 0;

  constructor(
    private readonly oracle: TimestampInvalidator,
    private readonly refresher: RequestsRefresher,
    private readonly options: WriteReconcilerOptions,
  ) {}

  get pending(): number {
    return this.queue.length + this.active;
  }

  temporaryRequestIds(): ReadonlySet<number> {
    return new Set(this.pendingTemporaryIds);
  }

  ensureCapacity(): void {
    if (this.pending >= this.options.maxPending) {
      throw new ServiceUnavailableError('Too many pending changes are waiting to sync. Try again shortly.');
    }
  }

  schedule(label: string, task: SyncTask, options: ScheduleOptions = {}): SyncHandle {
    this.sequence += 1;
    const id = this.sequence;
    const temporaryRequestId = options.temporaryRequestId ?? null;
    if (temporaryRequestId !== null) {
      this.pendingTemporaryIds.add(temporaryRequestId);
    }
    const done = new Promise<SyncOutcome>((resolve) => {
      this.queue.push({ id, label, task, temporaryRequestId, resolve });
    });
    this.drain();
    return { id, label, done };
  }

  idle(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.active < this.options.concurrency && this.queue.length > 0) {
      const item = this.queue.shift();
      if (!item) {
        break;
      }
      this.active += 1;
      void this.run(item).then((outcome) => {
        this.active -= 1;
        item.resolve(outcome);
        this.drain();
        this.notifyIdle();
      });
    }
  }

  private notifyIdle(): void {
    if (this.pending > 0) {
      return;
    }
    const waiters = this.idleWaiters.splice(0);
    waiters.forEach((resolve) => resolve());
  }

  private async run(item: QueueItem): Promise<SyncOutcome> {
    let remoteError: string | null = null;
    let refreshError: string | null = null;

    try {
      await item.task();
      remoteSyncCounter.inc({ operation: item.label, outcome: 'success' });
      logger.info(`[remote-sync] #${item.id} ${item.label} synced`);
    } catch (error) {
      remoteError = describeError(error);
      remoteSyncCounter.inc({ operation: item.label, outcome: 'error' });
      logger.error(`[remote-sync] #${item.id} ${item.label} failed: ${remoteError}`);
    }

    if (item.temporaryRequestId !== null) {
      this.pendingTemporaryIds.delete(item.temporaryRequestId);
    }

    this.oracle.invalidate();
    try {
      await this.refresher.refreshRequestsAndSteps();
    } catch (error) {
      refreshError = describeError(error);
      logger.warn(`[remote-sync] #${item.id} re-pull after ${item.label} failed: ${refreshError}`);
    }

    return { label: item.label, remoteError, refreshError };
  }
}
