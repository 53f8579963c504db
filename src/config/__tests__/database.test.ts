import { QueryTypes } from 'sequelize';
import type { Sequelize } from 'sequelize-typescript';
import { createCacheDatabase } from '../database';
import { CachedApprovalStep, CachedRequest } from '../../models';
import { draftRequest } from '../../testing/governanceFixtures';

type IndexRow = { name: string };

const indexNames = async (sequelize: Sequelize, table: string): Promise<string[]> => {
  const rows = await sequelize.query<IndexRow>(
    "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = :table ORDER BY name",
    { replacements: { table }, type: QueryTypes.SELECT },
  );
  return rows.map((row: IndexRow) => row.name);
};

describe('createCacheDatabase', () => {
  let sequelize: Sequelize;

  beforeEach(async () => {
    sequelize = await createCacheDatabase(':memory:');
  });

  afterEach(async () => {
    await sequelize.close();
  });

  it('creates the request indexes on their snake_case columns', async () => {
    await expect(indexNames(sequelize, 'cached_investment_requests')).resolves.toEqual(
      expect.arrayContaining([
        'cached_investment_requests_created_at',
        'cached_investment_requests_created_by_employee_id',
        'cached_investment_requests_status',
        'cached_investment_requests_theater',
      ]),
    );
    await expect(indexNames(sequelize, 'cached_approval_steps')).resolves.toEqual(
      expect.arrayContaining(['cached_approval_steps_request_id']),
    );
  });

  it('stores and reads back a request and its step', async () => {
    await CachedRequest.create(draftRequest(42, { requestTitle: 'Partner workshop' }));
    await CachedApprovalStep.create({
      stepId: 7,
      requestId: 42,
      stepOrder: 1,
      approverEmployeeId: 200,
      approverName: 'Riley Moss',
      approverTitle: 'District Manager',
      status: 'PENDING',
      approvedAt: null,
      comments: null,
      isFinalStep: false,
      createdAt: null,
    });

    const request = await CachedRequest.findByPk(42);
    const steps = await CachedApprovalStep.findAll({ where: { requestId: 42 } });

    expect(request?.requestTitle).toBe('Partner workshop');
    expect(request?.createdByEmployeeId).toBe(100);
    expect(steps.map((step: CachedApprovalStep) => step.stepId)).toEqual([7]);
  });
});
