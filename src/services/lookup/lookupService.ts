import { NotFoundError, PendingSyncError, RemoteUnavailableError } from '../../errors/governanceErrors.js';
import { isInReviewStatus } from '../../types/approval.js';
import type { BudgetRecord, OpportunityRecord, RemoteStore } from '../../types/remote.js';
import logger from '../../utils/logger.js';
import type { AccountSearchResult, CacheStore } from '../cache/cacheStore.js';
import type { IdentityResolver } from '../identity/identityResolver.js';

export const ACCOUNT_SEARCH_MIN_LENGTH = 2;
export const ACCOUNT_SEARCH_LIMIT = 20;
export const OPPORTUNITY_LIMIT = 50;

export type DashboardSummary = {
  totalRequests: number;
  totalDraft: number;
  totalSubmitted: number;
  totalApproved: number;
  totalRejected: number;
  totalPendingMyApproval: number;
  totalInvestmentRequested: number;
  totalInvestmentApproved: number;
};

export type TheaterIndustryLookup = {
  theaters: string[];
  industries: string[];
  industriesByTheater: Record<string, string[]>;
};

const hasText = (value: string | null): value is string => typeof value === 'string' && value.length > 0;

export class LookupService {
  constructor(
    private readonly cache: CacheStore,
    private readonly remote: Pick<
      RemoteStore,
      'fetchBudgets' | 'listAccountOpportunities' | 'listRequestOpportunities' | 'linkOpportunity' | 'unlinkOpportunity'
    >,
    private readonly identity: IdentityResolver,
  ) {}

  async getSummary(): Promise<DashboardSummary> {
    const requests = await this.cache.listRequests();
    const effective = await this.identity.effective();
    const myName = effective?.displayName ?? null;

    const summary: DashboardSummary = {
      totalRequests: requests.length,
      totalDraft: 0,
      totalSubmitted: 0,
      totalApproved: 0,
      totalRejected: 0,
      totalPendingMyApproval: 0,
      totalInvestmentRequested: 0,
      totalInvestmentApproved: 0,
    };

    for (const request of requests) {
      const amount = request.requestedAmount ?? 0;
      summary.totalInvestmentRequested += amount;
      if (request.status === 'DRAFT') {
        summary.totalDraft += 1;
      } else if (isInReviewStatus(request.status)) {
        summary.totalSubmitted += 1;
      } else if (request.status === 'FINAL_APPROVED') {
        summary.totalApproved += 1;
        summary.totalInvestmentApproved += amount;
      } else if (request.status === 'REJECTED') {
        summary.totalRejected += 1;
      }
      if (myName && request.nextApproverName === myName) {
        summary.totalPendingMyApproval += 1;
      }
    }
    return summary;
  }

  async searchAccounts(query: string): Promise<AccountSearchResult> {
    const term = query.trim();
    if (term.length < ACCOUNT_SEARCH_MIN_LENGTH) {
      return { accounts: [], total: 0 };
    }
    return this.cache.searchAccounts(term, ACCOUNT_SEARCH_LIMIT);
  }

  async getTheatersAndIndustries(): Promise<TheaterIndustryLookup> {
    const rows = await this.cache.listAccountDimensions();
    const theaters = new Set<string>();
    const industries = new Set<string>();
    const combos = new Map<string, Set<string>>();

    for (const row of rows) {
      if (hasText(row.theater)) {
        theaters.add(row.theater);
      }
      if (hasText(row.industrySegment)) {
        industries.add(row.industrySegment);
      }
      if (hasText(row.theater) && hasText(row.industrySegment)) {
        const bucket = combos.get(row.theater) ?? new Set<string>();
        bucket.add(row.industrySegment);
        combos.set(row.theater, bucket);
      }
    }

    const industriesByTheater: Record<string, string[]> = {};
    for (const theater of [...combos.keys()].sort()) {
      industriesByTheater[theater] = [...(combos.get(theater) ?? [])].sort();
    }

    return {
      theaters: [...theaters].sort(),
      industries: [...industries].sort(),
      industriesByTheater,
    };
  }

  /** Yearly budgets, read straight from the warehouse. Empty when it cannot be reached. */
  async listBudgets(): Promise<BudgetRecord[]> {
    try {
      return await this.remote.fetchBudgets();
    } catch (error) {
      if (error instanceof RemoteUnavailableError) {
        logger.warn(`[lookup] ${error.message}`);
        return [];
      }
      throw error;
    }
  }

  listAccountOpportunities(accountId: string): Promise<OpportunityRecord[]> {
    return this.remote.listAccountOpportunities(accountId, OPPORTUNITY_LIMIT);
  }

  async listRequestOpportunities(requestId: number): Promise<OpportunityRecord[]> {
    if (requestId < 0) {
      return [];
    }
    return this.remote.listRequestOpportunities(requestId);
  }

  async linkOpportunity(requestId: number, opportunityId: string): Promise<void> {
    await this.requireRemoteRequest(requestId);
    const identity = await this.identity.effective();
    await this.remote.linkOpportunity(requestId, opportunityId, identity?.username ?? 'UNKNOWN');
  }

  async unlinkOpportunity(requestId: number, opportunityId: string): Promise<void> {
    await this.requireRemoteRequest(requestId);
    await this.remote.unlinkOpportunity(requestId, opportunityId);
  }

  private async requireRemoteRequest(requestId: number): Promise<void> {
    const request = await this.cache.getRequest(requestId);
    if (!request) {
      throw new NotFoundError('Request not found');
    }
    if (requestId < 0) {
      throw new PendingSyncError(requestId);
    }
  }
}
