import type { Sequelize } from 'sequelize-typescript';
import { createCacheDatabase } from '../../../config/database';
import { draftRequest } from '../../../testing/governanceFixtures';
import { CacheStore } from '../cacheStore';

describe('CacheStore', () => {
  let database: Sequelize;
  let cache: CacheStore;

  beforeEach(async () => {
    database = await createCacheDatabase(':memory:');
    cache = new CacheStore();
  });

  afterEach(async () => {
    await database.close();
  });

  it('hands out decreasing temporary ids', async () => {
    await expect(cache.nextTemporaryRequestId()).resolves.toBe(-1);

    await cache.insertRequest(draftRequest(-1));
    await cache.insertRequest(draftRequest(5));

    await expect(cache.nextTemporaryRequestId()).resolves.toBe(-2);
  });

  it('inserts concurrent temporary requests under distinct ids', async () => {
    const inserted = await Promise.all([
      cache.insertTemporaryRequest((temporaryId) => draftRequest(temporaryId, { requestTitle: 'First' })),
      cache.insertTemporaryRequest((temporaryId) => draftRequest(temporaryId, { requestTitle: 'Second' })),
    ]);

    expect(inserted.map((request) => [request.requestId, request.requestTitle])).toEqual([
      [-1, 'First'],
      [-2, 'Second'],
    ]);
    await expect(cache.getRequest(-2)).resolves.toMatchObject({ requestTitle: 'Second' });
  });

  it('filters requests and orders them newest first', async () => {
    await cache.replaceRequests([
      draftRequest(1, { createdAt: '2026-01-10T00:00:00.000Z' }),
      draftRequest(2, { createdAt: '2026-01-12T00:00:00.000Z', theater: 'APAC' }),
      draftRequest(3, { createdAt: '2026-01-11T00:00:00.000Z', status: 'SUBMITTED' }),
    ]);

    const all = await cache.listRequests();
    const emea = await cache.listRequests({ theater: 'EMEA' });
    const submitted = await cache.listRequests({ status: 'SUBMITTED', quarter: 'FY2027-Q1' });

    expect(all.map((request) => request.requestId)).toEqual([2, 3, 1]);
    expect(emea.map((request) => request.requestId)).toEqual([3, 1]);
    expect(submitted.map((request) => request.requestId)).toEqual([3]);
  });

  it('keeps preserved temporary rows whose insert has not reached the warehouse', async () => {
    await cache.insertRequest(draftRequest(-1, { createdAt: '2026-03-01T00:00:00.000Z', requestTitle: 'Pending' }));
    await cache.insertRequest(draftRequest(-2, { createdAt: '2026-03-01T00:05:00.000Z', requestTitle: 'Landed' }));
    await cache.insertRequest(draftRequest(-3, { createdAt: '2026-03-01T00:10:00.000Z', requestTitle: 'Abandoned' }));

    await cache.replaceRequests([draftRequest(1001, { createdAt: '2026-03-01T00:05:00.000Z', requestTitle: 'Landed' })], {
      preserveIds: new Set([-1, -2]),
    });

    const ids = (await cache.listRequests()).map((request) => request.requestId);
    expect(ids.sort((a, b) => a - b)).toEqual([-1, 1001]);
  });

  it('replaces the steps of one request with temporary ids', async () => {
    const steps = await cache.replaceSteps(-1, [
      {
        requestId: -1,
        stepOrder: 1,
        approverEmployeeId: 200,
        approverName: 'Riley Moss',
        approverTitle: 'District Manager',
        status: 'PENDING',
        approvedAt: null,
        comments: null,
        isFinalStep: false,
        createdAt: null,
      },
      {
        requestId: -1,
        stepOrder: 2,
        approverEmployeeId: 300,
        approverName: 'Sam Ortega',
        approverTitle: 'Regional Director',
        status: 'PENDING',
        approvedAt: null,
        comments: null,
        isFinalStep: true,
        createdAt: null,
      },
    ]);

    expect(steps.map((step) => step.stepId)).toEqual([-1, -2]);

    await cache.updateStep(-1, 1, { status: 'APPROVED', approvedAt: '2026-03-02T10:00:00.000Z', comments: 'ok' });
    const stored = await cache.listSteps(-1);
    expect(stored.map((step) => [step.stepOrder, step.status, step.isFinalStep])).toEqual([
      [1, 'APPROVED', false],
      [2, 'PENDING', true],
    ]);
  });

  it('searches accounts by name fragment with a total count', async () => {
    await cache.replaceAccounts([
      { accountId: 'A-1', accountName: 'Northwind Traders', theater: 'EMEA', industrySegment: 'Retail' },
      { accountId: 'A-2', accountName: 'Northbank Foods', theater: 'EMEA', industrySegment: 'Consumer Goods' },
      { accountId: 'A-3', accountName: 'Pacific Freight', theater: 'APAC', industrySegment: 'Logistics' },
      { accountId: 'A-4', accountName: 'Pacific Freight', theater: 'APAC', industrySegment: 'Logistics' },
    ]);

    await expect(cache.countAccounts()).resolves.toBe(3);
    const result = await cache.searchAccounts('north', 1);
    expect(result.total).toBe(2);
    expect(result.accounts).toEqual([
      { accountId: 'A-2', accountName: 'Northbank Foods', theater: 'EMEA', industrySegment: 'Consumer Goods' },
    ]);
  });

  it('stores one current user at a time', async () => {
    const profile = {
      username: 'DFIELD',
      userId: 7,
      employeeId: 100,
      displayName: 'Dana Field',
      title: 'Account Executive',
      role: 'USER',
      theater: 'EMEA',
      industrySegment: 'Retail',
      managerId: 200,
      managerName: 'Riley Moss',
      approvalLevel: 0,
      isFinalApprover: false,
    };

    await cache.replaceCurrentUser(profile, '2026-03-02T10:00:00.000Z');
    await expect(cache.getCurrentUser()).resolves.toEqual(profile);

    await cache.replaceCurrentUser(null, '2026-03-02T10:05:00.000Z');
    await expect(cache.getCurrentUser()).resolves.toBeNull();
  });
});
