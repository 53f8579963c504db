import { ForbiddenError, NotFoundError } from '../../../errors/governanceErrors';
import {
  ADMIN,
  FIXED_NOW,
  REQUESTER,
  createTestContext,
  employee,
  seedOrganization,
  type TestContext,
} from '../../../testing/governanceFixtures';
import { InMemoryRemoteStore } from '../../../testing/inMemoryRemoteStore';
import { EMPLOYEE_SEARCH_CACHE_SIZE, impersonationUsername } from '../identityResolver';

const contextFor = async (currentUser = ADMIN): Promise<TestContext> => {
  const remote = new InMemoryRemoteStore();
  seedOrganization(remote, currentUser);
  const ctx = await createTestContext(remote);
  await ctx.context.refresher.ensureFresh();
  return ctx;
};

describe('impersonationUsername', () => {
  it('joins the first initial and the last name without spaces', () => {
    expect(impersonationUsername({ firstName: 'Maria', lastName: 'de la Cruz' })).toBe('MDELACRUZ');
    expect(impersonationUsername({ firstName: null, lastName: 'Kim' })).toBe('KIM');
  });
});

describe('IdentityResolver', () => {
  let ctx: TestContext;

  afterEach(async () => {
    await ctx.context.close();
  });

  it('reports the session user when nobody is impersonated', async () => {
    ctx = await contextFor(REQUESTER);

    const user = await ctx.context.identity.getEffectiveUser();

    expect(user).toMatchObject({
      username: 'DFIELD',
      displayName: 'Dana Field',
      isImpersonating: false,
      realUsername: null,
      isAdmin: false,
    });
    expect(ctx.context.identity.status()).toEqual({ active: false });
  });

  it('falls back to the session username before the user profile is cached', async () => {
    const remote = new InMemoryRemoteStore();
    remote.sessionUsername = 'admin.user';
    ctx = await createTestContext(remote);

    await expect(ctx.context.identity.getEffectiveUser()).resolves.toEqual({
      username: 'admin.user',
      userId: 0,
      employeeId: null,
      displayName: 'admin.user',
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
      isAdmin: true,
    });
  });

  it('lets the administrator act as another employee', async () => {
    ctx = await contextFor();

    const identity = await ctx.context.identity.impersonate(300);

    expect(identity).toMatchObject({
      username: 'SORTEGA',
      employeeId: 300,
      displayName: 'Sam Ortega',
      title: 'Regional Director',
      role: 'FINAL_APPROVER',
      approvalLevel: 99,
      isFinalApprover: true,
      theater: 'EMEA',
      managerId: 400,
    });
    await expect(ctx.context.identity.getEffectiveUser()).resolves.toMatchObject({
      username: 'SORTEGA',
      isImpersonating: true,
      realUsername: 'ADMIN.USER',
      isAdmin: true,
    });
    expect(ctx.context.identity.status()).toEqual({
      active: true,
      employeeId: 300,
      displayName: 'Sam Ortega',
      title: 'Regional Director',
    });
  });

  it('gives managers and individual contributors their own roles', async () => {
    ctx = await contextFor();

    await expect(ctx.context.identity.impersonate(200)).resolves.toMatchObject({ role: 'MANAGER', approvalLevel: 0 });
    await expect(ctx.context.identity.impersonate(100)).resolves.toMatchObject({ role: 'USER', username: 'DFIELD' });
  });

  it('does not grant administrator rights through impersonation', async () => {
    ctx = await contextFor();
    await ctx.context.identity.impersonate(100);

    await ctx.context.cache.replaceCurrentUser(REQUESTER, '2026-03-02T10:00:00.000Z');

    await expect(ctx.context.identity.isAdmin()).resolves.toBe(false);
    await expect(ctx.context.identity.searchEmployees('moss')).rejects.toBeInstanceOf(ForbiddenError);
    await expect(ctx.context.identity.stopImpersonate()).rejects.toThrow(new ForbiddenError('Admin access required'));
  });

  it('refuses impersonation for non-administrators', async () => {
    ctx = await contextFor(REQUESTER);

    await expect(ctx.context.identity.impersonate(200)).rejects.toBeInstanceOf(ForbiddenError);
    expect(ctx.context.identity.isImpersonating()).toBe(false);
  });

  it('refuses unknown and inactive employees', async () => {
    ctx = await contextFor();
    ctx.remote.addEmployee(employee(500, 'Lee', 'Park', 'Former Manager', null, { active: false }));

    await expect(ctx.context.identity.impersonate(777)).rejects.toThrow(new NotFoundError('Employee not found'));
    await expect(ctx.context.identity.impersonate(500)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('restores the real identity on stop', async () => {
    ctx = await contextFor();
    await ctx.context.identity.impersonate(200);

    const real = await ctx.context.identity.stopImpersonate();

    expect(real?.username).toBe('ADMIN.USER');
    expect(ctx.context.identity.isImpersonating()).toBe(false);
    await expect(ctx.context.identity.effective()).resolves.toMatchObject({ username: 'ADMIN.USER' });
  });

  it('caches employee searches per normalized term', async () => {
    ctx = await contextFor();

    const first = await ctx.context.identity.searchEmployees('  Moss ');
    const second = await ctx.context.identity.searchEmployees('moss');

    expect(first).toEqual([
      { employeeId: 200, name: 'Riley Moss', title: 'District Manager', managerName: 'Sam Ortega', department: 'Sales' },
    ]);
    expect(second).toBe(first);
    expect(ctx.remote.calls.filter((call) => call === 'searchEmployees')).toHaveLength(1);
    await expect(ctx.context.identity.searchEmployees('m')).resolves.toEqual([]);
  });

  it('drops expired searches when a new one is stored', async () => {
    let now = new Date(FIXED_NOW);
    const remote = new InMemoryRemoteStore();
    seedOrganization(remote, ADMIN);
    ctx = await createTestContext(remote, {}, () => now);
    await ctx.context.refresher.ensureFresh();

    await ctx.context.identity.searchEmployees('moss');
    now = new Date(now.getTime() + 301 * 1000);
    await ctx.context.identity.searchEmployees('ortega');

    expect(ctx.context.identity.cachedSearchCount).toBe(1);
  });

  it('evicts the oldest search once the cache is full', async () => {
    ctx = await contextFor();
    const { identity } = ctx.context;

    for (let index = 0; index <= EMPLOYEE_SEARCH_CACHE_SIZE; index += 1) {
      await identity.searchEmployees(`term-${index}`);
    }
    await identity.searchEmployees('term-1');
    await identity.searchEmployees('term-0');

    expect(identity.cachedSearchCount).toBe(EMPLOYEE_SEARCH_CACHE_SIZE);
    expect(ctx.remote.calls.filter((call) => call === 'searchEmployees')).toHaveLength(EMPLOYEE_SEARCH_CACHE_SIZE + 2);
  });
});
