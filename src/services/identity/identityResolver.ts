import { ForbiddenError, NotFoundError, ServiceUnavailableError } from '../../errors/governanceErrors.js';
import type { EffectiveUser, Identity, ImpersonationStatus, UserProfile } from '../../types/identity.js';
import type { EmployeeRecord, EmployeeSummary, RemoteStore } from '../../types/remote.js';
import logger from '../../utils/logger.js';
import { isOlderThan, type Clock } from '../../utils/time.js';
import type { CacheStore } from '../cache/cacheStore.js';

export const EMPLOYEE_SEARCH_MIN_LENGTH = 2;
export const EMPLOYEE_SEARCH_LIMIT = 20;
export const EMPLOYEE_SEARCH_CACHE_SIZE = 100;

export type IdentityResolverOptions = {
  adminUsername: string | null;
  employeeSearchTtlSeconds: number;
  clock: Clock;
};

type SearchCacheEntry = {
  results: EmployeeSummary[];
  fetchedAt: Date;
};

const freeze = (profile: UserProfile): Identity => Object.freeze({ ...profile });

export const impersonationUsername = (employee: Pick<EmployeeRecord, 'firstName' | 'lastName'>): string => {
  const initial = (employee.firstName ?? '').slice(0, 1);
  const lastName = (employee.lastName ?? '').replace(/ /g, '');
  return `${initial}${lastName}`.toUpperCase();
};

/**
 * Resolves who is acting. The effective identity drives authorship and
 * approvals; administrator checks always use the real session.
 */
export class IdentityResolver {
  private override: Identity | null = null;
  private readonly searchCache = new Map<string, SearchCacheEntry>();

  constructor(
    private readonly cache: CacheStore,
    private readonly remote: Pick<RemoteStore, 'getEmployee' | 'isFinalApprover' | 'searchEmployees' | 'fetchSessionUsername'>,
    private readonly options: IdentityResolverOptions,
  ) {}

  async real(): Promise<Identity | null> {
    const profile = await this.cache.getCurrentUser();
    return profile ? freeze(profile) : null;
  }

  async effective(): Promise<Identity | null> {
    if (this.override) {
      return this.override;
    }
    return this.real();
  }

  /** Effective identity for operations that need an actor. */
  async requireEffective(): Promise<Identity> {
    const identity = await this.effective();
    if (!identity) {
      throw new ServiceUnavailableError('Current user is not loaded yet. Refresh the cache and try again.');
    }
    return identity;
  }

  async isAdmin(): Promise<boolean> {
    const real = await this.real();
    return this.isAdminUsername(real?.username ?? null);
  }

  async requireAdmin(): Promise<void> {
    if (!(await this.isAdmin())) {
      throw new ForbiddenError();
    }
  }

  isImpersonating(): boolean {
    return this.override !== null;
  }

  async getEffectiveUser(): Promise<EffectiveUser> {
    const real = await this.real();
    const identity = this.override ?? real;
    if (identity) {
      return {
        ...identity,
        isImpersonating: this.override !== null,
        realUsername: this.override ? (real?.username ?? null) : null,
        isAdmin: this.isAdminUsername(real?.username ?? null),
      };
    }

    const username = await this.remote.fetchSessionUsername();
    if (!username) {
      throw new ServiceUnavailableError('Current user is not available');
    }
    return {
      username,
      userId: 0,
      employeeId: null,
      displayName: username,
      title: 'User',
      role: 'USER',
      theater: null,
      industrySegment: null,
      managerId: null,
      managerName: null,
      approvalLevel: 0,
      isFinalApprover: false,
      isImpersonating: false,
      realUsername: null,
      isAdmin: this.isAdminUsername(username),
    };
  }

  async impersonate(employeeId: number): Promise<Identity> {
    await this.requireAdmin();
    const employee = await this.remote.getEmployee(employeeId);
    if (!employee || !employee.active) {
      throw new NotFoundError('Employee not found');
    }
    const isFinalApprover =
      (await this.cache.isFinalApprover(employee.employeeId)) || (await this.remote.isFinalApprover(employee.employeeId));

    const identity = freeze({
      username: impersonationUsername(employee),
      userId: null,
      employeeId: employee.employeeId,
      displayName: employee.name,
      title: employee.title,
      role: isFinalApprover ? 'FINAL_APPROVER' : employee.isManager ? 'MANAGER' : 'USER',
      theater: employee.costCenterName,
      industrySegment: null,
      managerId: employee.managerId,
      managerName: employee.managerName,
      approvalLevel: isFinalApprover ? 99 : 0,
      isFinalApprover,
    });
    this.override = identity;
    logger.info(`[identity] Now acting as ${employee.name} (${employee.employeeId})`);
    return identity;
  }

  async stopImpersonate(): Promise<Identity | null> {
    await this.requireAdmin();
    this.override = null;
    logger.info('[identity] Impersonation cleared');
    return this.real();
  }

  status(): ImpersonationStatus {
    if (!this.override) {
      return { active: false };
    }
    return {
      active: true,
      employeeId: this.override.employeeId,
      displayName: this.override.displayName,
      title: this.override.title,
    };
  }

  async searchEmployees(query: string): Promise<EmployeeSummary[]> {
    await this.requireAdmin();
    const term = query.trim().toLowerCase();
    if (term.length < EMPLOYEE_SEARCH_MIN_LENGTH) {
      return [];
    }
    const cached = this.searchCache.get(term);
    if (cached && !isOlderThan(cached.fetchedAt, this.options.employeeSearchTtlSeconds, this.options.clock)) {
      return cached.results;
    }
    const results = await this.remote.searchEmployees(term, EMPLOYEE_SEARCH_LIMIT);
    this.rememberSearch(term, results);
    return results;
  }

  get cachedSearchCount(): number {
    return this.searchCache.size;
  }

  private rememberSearch(term: string, results: EmployeeSummary[]): void {
    const { clock, employeeSearchTtlSeconds } = this.options;
    for (const [key, entry] of this.searchCache) {
      if (isOlderThan(entry.fetchedAt, employeeSearchTtlSeconds, clock)) {
        this.searchCache.delete(key);
      }
    }
    this.searchCache.delete(term);
    // Map order is insertion order, so the first key is the oldest search.
    while (this.searchCache.size >= EMPLOYEE_SEARCH_CACHE_SIZE) {
      const oldest = this.searchCache.keys().next();
      if (oldest.done) {
        break;
      }
      this.searchCache.delete(oldest.value);
    }
    this.searchCache.set(term, { results, fetchedAt: clock() });
  }

  private isAdminUsername(username: string | null): boolean {
    const admin = this.options.adminUsername;
    if (!admin || !username) {
      return false;
    }
    return username.toLowerCase() === admin.toLowerCase();
  }
}
