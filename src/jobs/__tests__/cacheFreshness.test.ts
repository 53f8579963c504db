import logger from '../../utils/logger';
import { checkCacheFreshness } from '../cacheFreshness.cron';
import type { RefreshProgress } from '../../services/cache/refreshOrchestrator';

const progress: RefreshProgress = {
  status: 'complete',
  currentStep: null,
  stepsCompleted: 7,
  totalSteps: 7,
  message: 'Cache refresh complete',
  failedStep: null,
  startedAt: null,
  finishedAt: null,
};

describe('checkCacheFreshness', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('asks the orchestrator to refresh stale sources', async () => {
    const refresher = {
      refreshIfStale: jest.fn().mockResolvedValue(true),
      getProgress: jest.fn().mockReturnValue(progress),
    };

    await checkCacheFreshness(refresher);

    expect(refresher.refreshIfStale).toHaveBeenCalledTimes(1);
    expect(refresher.getProgress).toHaveBeenCalledTimes(1);
  });

  it('logs failures instead of rejecting', async () => {
    const errorSpy = jest.spyOn(logger, 'error');
    const failure = new Error('database is locked');
    const refresher = {
      refreshIfStale: jest.fn().mockRejectedValue(failure),
      getProgress: jest.fn().mockReturnValue(progress),
    };

    await expect(checkCacheFreshness(refresher)).resolves.toBeUndefined();
    expect(errorSpy).toHaveBeenCalledWith('[cache-check] Freshness check failed: database is locked', failure);
  });
});
