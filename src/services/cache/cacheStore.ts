import { Op, type WhereAttributeHash } from 'sequelize';
import {
  CacheMetadata,
  CachedAccount,
  CachedApprovalStep,
  CachedCurrentUser,
  CachedFinalApprover,
  CachedRequest,
} from '../../models/index.js';
import type { CacheMetadataAttributes } from '../../models/CacheMetadata.js';
import type { FinalApprover } from '../../types/approval.js';
import type { UserProfile } from '../../types/identity.js';
import type { AccountRecord, DataSource } from '../../types/remote.js';
import type {
  ApprovalStepRecord,
  InvestmentRequestRecord,
  NewApprovalStep,
  RequestFilters,
  RequestPatch,
} from '../../types/request.js';
import { AsyncLock } from '../../utils/asyncLock.js';

export type AccountSearchResult = {
  accounts: AccountRecord[];
  total: number;
};

export type ReplaceRequestsOptions = {
  /** Temporary rows whose remote insert has not run yet. */
  preserveIds?: ReadonlySet<number>;
};

const toRequest = (row: CachedRequest): InvestmentRequestRecord => row.get({ plain: true });
const toStep = (row: CachedApprovalStep): ApprovalStepRecord => ({
  ...row.get({ plain: true }),
  isFinalStep: Boolean(row.isFinalStep),
});
const toAccount = (row: CachedAccount): AccountRecord => row.get({ plain: true });
const toFinalApprover = (row: CachedFinalApprover): FinalApprover => row.get({ plain: true });

const toProfile = (row: CachedCurrentUser): UserProfile => ({
  username: row.username,
  userId: row.userId,
  employeeId: row.employeeId,
  displayName: row.displayName,
  title: row.title,
  role: row.role,
  theater: row.theater,
  industrySegment: row.industrySegment,
  managerId: row.managerId,
  managerName: row.managerName,
  approvalLevel: row.approvalLevel,
  isFinalApprover: Boolean(row.isFinalApprover),
});

/**
 * Local mirror of the warehouse tables. Plain reads and writes only; callers
 * order writes that span the request and step tables.
 */
export class CacheStore {
  /** Held while a temporary id is picked and its row written. */
  private readonly temporaryIds = new AsyncLock();

  async listRequests(filters: RequestFilters = {}): Promise<InvestmentRequestRecord[]> {
    const where: WhereAttributeHash<InvestmentRequestRecord> = {};
    if (filters.theater) {
      where.theater = filters.theater;
    }
    if (filters.industrySegment) {
      where.industrySegment = filters.industrySegment;
    }
    if (filters.quarter) {
      where.investmentQuarter = filters.quarter;
    }
    if (filters.status) {
      where.status = filters.status;
    }
    const rows = await CachedRequest.findAll({
      where,
      order: [
        ['createdAt', 'DESC'],
        ['requestId', 'DESC'],
      ],
    });
    return rows.map(toRequest);
  }

  async getRequest(requestId: number): Promise<InvestmentRequestRecord | null> {
    const row = await CachedRequest.findByPk(requestId);
    return row ? toRequest(row) : null;
  }

  async findRequestByNaturalKey(createdBy: string, createdAt: string): Promise<InvestmentRequestRecord | null> {
    const row = await CachedRequest.findOne({
      where: { createdBy, createdAt },
      order: [['requestId', 'DESC']],
    });
    return row ? toRequest(row) : null;
  }

  async nextTemporaryRequestId(): Promise<number> {
    const row = await CachedRequest.findOne({
      where: { requestId: { [Op.lt]: 0 } },
      order: [['requestId', 'ASC']],
    });
    return row ? row.requestId - 1 : -1;
  }

  async insertRequest(record: InvestmentRequestRecord): Promise<void> {
    await CachedRequest.create(record);
  }

  /** Inserts a request under the next free temporary id and returns the stored row. */
  async insertTemporaryRequest(
    build: (temporaryId: number) => InvestmentRequestRecord,
  ): Promise<InvestmentRequestRecord> {
    const release = await this.temporaryIds.acquire();
    try {
      const record = build(await this.nextTemporaryRequestId());
      await CachedRequest.create(record);
      return record;
    } finally {
      release();
    }
  }

  async updateRequest(requestId: number, patch: RequestPatch): Promise<void> {
    await CachedRequest.update(patch, { where: { requestId } });
  }

  async deleteRequest(requestId: number): Promise<void> {
    await CachedRequest.destroy({ where: { requestId } });
  }

  async replaceRequests(records: InvestmentRequestRecord[], options: ReplaceRequestsOptions = {}): Promise<void> {
    const preserved = [...(options.preserveIds ?? [])].filter((id) => id < 0);
    const incomingKeys = new Set(records.map((record) => `${record.createdBy ?? ''}|${record.createdAt ?? ''}`));

    const kept = preserved.length
      ? (await CachedRequest.findAll({ where: { requestId: { [Op.in]: preserved } } }))
          .map(toRequest)
          .filter((record) => !incomingKeys.has(`${record.createdBy ?? ''}|${record.createdAt ?? ''}`))
      : [];

    await CachedRequest.destroy({ where: {} });
    await CachedRequest.bulkCreate([...records, ...kept]);
  }

  async listSteps(requestId: number): Promise<ApprovalStepRecord[]> {
    const rows = await CachedApprovalStep.findAll({
      where: { requestId },
      order: [['stepOrder', 'ASC']],
    });
    return rows.map(toStep);
  }

  async listAllSteps(): Promise<ApprovalStepRecord[]> {
    const rows = await CachedApprovalStep.findAll({
      order: [
        ['requestId', 'ASC'],
        ['stepOrder', 'ASC'],
      ],
    });
    return rows.map(toStep);
  }

  async nextTemporaryStepId(): Promise<number> {
    const row = await CachedApprovalStep.findOne({
      where: { stepId: { [Op.lt]: 0 } },
      order: [['stepId', 'ASC']],
    });
    return row ? row.stepId - 1 : -1;
  }

  /** Replaces the steps of one request, giving each new row a temporary id. */
  async replaceSteps(requestId: number, steps: NewApprovalStep[]): Promise<ApprovalStepRecord[]> {
    const release = await this.temporaryIds.acquire();
    try {
      await CachedApprovalStep.destroy({ where: { requestId } });
      const firstId = await this.nextTemporaryStepId();
      const records = steps.map((step, index) => ({ ...step, requestId, stepId: firstId - index }));
      await CachedApprovalStep.bulkCreate(records);
      return records;
    } finally {
      release();
    }
  }

  async updateStep(
    requestId: number,
    stepOrder: number,
    patch: Partial<Pick<ApprovalStepRecord, 'status' | 'approvedAt' | 'comments'>>,
  ): Promise<void> {
    await CachedApprovalStep.update(patch, { where: { requestId, stepOrder } });
  }

  async deleteSteps(requestId: number): Promise<void> {
    await CachedApprovalStep.destroy({ where: { requestId } });
  }

  async replaceAllSteps(records: ApprovalStepRecord[], options: ReplaceRequestsOptions = {}): Promise<void> {
    const preserved = [...(options.preserveIds ?? [])].filter((id) => id < 0);
    if (preserved.length) {
      await CachedApprovalStep.destroy({ where: { requestId: { [Op.notIn]: preserved } } });
    } else {
      await CachedApprovalStep.destroy({ where: {} });
    }
    await CachedApprovalStep.bulkCreate(records);
  }

  async getMetadata(source: DataSource): Promise<CacheMetadataAttributes | null> {
    const row = await CacheMetadata.findByPk(source);
    return row ? row.get({ plain: true }) : null;
  }

  async setMetadata(source: DataSource, remoteModified: string | null, localRefreshed: string): Promise<void> {
    await CacheMetadata.upsert({ dataSource: source, remoteModified, localRefreshed });
  }

  async getCurrentUser(): Promise<UserProfile | null> {
    const row = await CachedCurrentUser.findOne();
    return row ? toProfile(row) : null;
  }

  async replaceCurrentUser(profile: UserProfile | null, cachedAt: string): Promise<void> {
    await CachedCurrentUser.destroy({ where: {} });
    if (profile) {
      await CachedCurrentUser.create({ ...profile, cachedAt });
    }
  }

  async listFinalApprovers(): Promise<FinalApprover[]> {
    const rows = await CachedFinalApprover.findAll({ order: [['theater', 'ASC']] });
    return rows.map(toFinalApprover);
  }

  async findFinalApprover(theater: string): Promise<FinalApprover | null> {
    const row = await CachedFinalApprover.findByPk(theater);
    return row ? toFinalApprover(row) : null;
  }

  async isFinalApprover(employeeId: number): Promise<boolean> {
    const count = await CachedFinalApprover.count({ where: { approverEmployeeId: employeeId } });
    return count > 0;
  }

  async replaceFinalApprovers(records: FinalApprover[]): Promise<void> {
    await CachedFinalApprover.destroy({ where: {} });
    await CachedFinalApprover.bulkCreate(records);
  }

  async countAccounts(): Promise<number> {
    return CachedAccount.count();
  }

  async replaceAccounts(records: AccountRecord[]): Promise<void> {
    await CachedAccount.destroy({ where: {} });
    await CachedAccount.bulkCreate(records, { ignoreDuplicates: true });
  }

  async searchAccounts(term: string, limit: number): Promise<AccountSearchResult> {
    const { rows, count } = await CachedAccount.findAndCountAll({
      where: { accountName: { [Op.substring]: term } },
      order: [['accountName', 'ASC']],
      limit,
    });
    return { accounts: rows.map(toAccount), total: count };
  }

  async listAccountDimensions(): Promise<Array<Pick<AccountRecord, 'theater' | 'industrySegment'>>> {
    const rows = await CachedAccount.findAll({ attributes: ['theater', 'industrySegment'] });
    return rows.map((row) => ({ theater: row.theater, industrySegment: row.industrySegment }));
  }
}
