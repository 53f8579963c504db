import { NotFoundError, PendingSyncError } from '../../errors/governanceErrors.js';
import type { Approver } from '../../types/approval.js';
import type { Identity } from '../../types/identity.js';
import type { RemoteRequestInsert, RemoteStore } from '../../types/remote.js';
import {
  EDITABLE_REQUEST_FIELDS,
  type ApprovalStepRecord,
  type InvestmentRequestRecord,
  type RequestFields,
  type RequestFilters,
  type RequestPatch,
  type RequestWithSteps,
  type RevisionFields,
} from '../../types/request.js';
import { nowIso, type Clock } from '../../utils/time.js';
import type { CacheStore } from '../cache/cacheStore.js';
import type { IdentityResolver } from '../identity/identityResolver.js';
import type { SyncHandle, WriteReconciler } from '../sync/writeReconciler.js';
import type { ApprovalChainResolver } from './approvalChainResolver.js';
import {
  assertDraft,
  assertRejected,
  planApprove,
  planDeny,
  planReject,
  planReviseToDraft,
  planSendBack,
  planSubmit,
  planWithdraw,
  type Actor,
  type TransitionPlan,
} from './approvalStateMachine.js';

export type CreateOptions = {
  autoSubmit?: boolean;
  submitComment?: string | null;
};

export type UpdateOptions = CreateOptions & {
  draftComment?: string | null;
};

export type ReviseOptions = {
  submit?: boolean;
  comment?: string | null;
};

export type MutationResult = {
  request: InvestmentRequestRecord | null;
  chain: Approver[] | null;
  sync: SyncHandle;
};

type RemoteWriter = Pick<
  RemoteStore,
  'insertRequest' | 'updateRequest' | 'deleteRequest' | 'replaceApprovalSteps' | 'approveStep' | 'deleteApprovalSteps'
>;

export const blankRequest = (requestId: number): InvestmentRequestRecord => ({
  requestId,
  requestTitle: null,
  accountId: null,
  accountName: null,
  investmentType: null,
  requestedAmount: null,
  investmentQuarter: null,
  businessJustification: null,
  expectedOutcome: null,
  riskAssessment: null,
  createdBy: null,
  createdByName: null,
  createdByEmployeeId: null,
  createdAt: null,
  theater: null,
  industrySegment: null,
  status: 'DRAFT',
  currentApprovalLevel: 0,
  nextApproverId: null,
  nextApproverName: null,
  nextApproverTitle: null,
  dmApprovedBy: null,
  dmApprovedByTitle: null,
  dmApprovedAt: null,
  dmComments: null,
  rdApprovedBy: null,
  rdApprovedByTitle: null,
  rdApprovedAt: null,
  rdComments: null,
  avpApprovedBy: null,
  avpApprovedByTitle: null,
  avpApprovedAt: null,
  avpComments: null,
  gvpApprovedBy: null,
  gvpApprovedByTitle: null,
  gvpApprovedAt: null,
  gvpComments: null,
  updatedAt: null,
  withdrawnBy: null,
  withdrawnByName: null,
  withdrawnAt: null,
  withdrawnComment: null,
  submittedComment: null,
  submittedByName: null,
  submittedAt: null,
  draftComment: null,
  draftByName: null,
  draftAt: null,
  onBehalfOfEmployeeId: null,
  onBehalfOfName: null,
  opportunityLink: null,
  expectedRoi: null,
});

/** Copies only the editable fields that are present on the input. */
export const pickEditableFields = (fields: RequestFields): RequestPatch => {
  const patch: RequestPatch = {};
  for (const key of EDITABLE_REQUEST_FIELDS) {
    if (fields[key] !== undefined) {
      Object.assign(patch, { [key]: fields[key] });
    }
  }
  return patch;
};

const pickRevisionFields = (fields: RevisionFields): RequestPatch => {
  const patch: RequestPatch = {};
  if (fields.businessJustification !== undefined) patch.businessJustification = fields.businessJustification;
  if (fields.expectedOutcome !== undefined) patch.expectedOutcome = fields.expectedOutcome;
  if (fields.riskAssessment !== undefined) patch.riskAssessment = fields.riskAssessment;
  return patch;
};

const toActor = (identity: Identity): Actor => ({
  username: identity.username,
  displayName: identity.displayName ?? identity.username,
  title: identity.title,
});

const toRemoteInsert = (record: InvestmentRequestRecord): RemoteRequestInsert => {
  const { requestId: _temporaryId, ...values } = record;
  return values;
};

/**
 * Request lifecycle operations. Every mutation validates against the cache,
 * writes the cache, then queues the matching warehouse writes.
 */
export class RequestService {
  constructor(
    private readonly cache: CacheStore,
    private readonly remote: RemoteWriter,
    private readonly resolver: ApprovalChainResolver,
    private readonly identity: IdentityResolver,
    private readonly reconciler: WriteReconciler,
    private readonly clock: Clock,
  ) {}

  listRequests(filters: RequestFilters = {}): Promise<InvestmentRequestRecord[]> {
    return this.cache.listRequests(filters);
  }

  async getRequest(requestId: number): Promise<RequestWithSteps> {
    const request = await this.load(requestId);
    const approvalSteps = await this.cache.listSteps(requestId);
    return { ...request, approvalSteps };
  }

  async listApprovalSteps(requestId: number): Promise<ApprovalStepRecord[]> {
    return this.cache.listSteps(requestId);
  }

  findRequestByNaturalKey(createdBy: string, createdAt: string): Promise<InvestmentRequestRecord | null> {
    return this.cache.findRequestByNaturalKey(createdBy, createdAt);
  }

  resolveApprovalChain(employeeId: number, theater: string): Promise<Approver[]> {
    return this.resolver.resolve(employeeId, theater);
  }

  async createRequest(fields: RequestFields, options: CreateOptions = {}): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const identity = await this.identity.requireEffective();
    const actor = toActor(identity);
    const impersonating = this.identity.isImpersonating();
    const now = nowIso(this.clock);

    // Id 0 stands in until the insert picks a temporary id; submit plans do not depend on it.
    let template: InvestmentRequestRecord = {
      ...blankRequest(0),
      ...pickEditableFields(fields),
      createdBy: identity.username,
      createdByName: actor.displayName,
      createdByEmployeeId: identity.employeeId,
      createdAt: now,
      nextApproverName: identity.managerName,
      updatedAt: now,
      onBehalfOfEmployeeId: impersonating ? identity.employeeId : null,
      onBehalfOfName: impersonating ? actor.displayName : null,
    };

    let plan: TransitionPlan | null = null;
    let chain: Approver[] | null = null;
    if (options.autoSubmit) {
      chain = await this.chainFor(template);
      plan = planSubmit(template, chain, actor, now, options.submitComment ?? null);
      template = { ...template, ...plan.patch };
    }

    const pending = template;
    const record = await this.cache.insertTemporaryRequest((temporaryId) => ({ ...pending, requestId: temporaryId }));
    const temporaryId = record.requestId;
    if (plan) {
      await this.applyToCache(temporaryId, plan);
    }

    const submitPlan = plan;
    const values = toRemoteInsert(record);
    const sync = this.reconciler.schedule(
      'create',
      async () => {
        const requestId = await this.remote.insertRequest(values);
        if (submitPlan && submitPlan.steps.kind === 'replace') {
          await this.remote.replaceApprovalSteps(
            requestId,
            submitPlan.steps.steps.map((step) => ({ ...step, requestId })),
          );
        }
      },
      { temporaryRequestId: temporaryId },
    );

    return { request: record, chain, sync };
  }

  async updateRequest(requestId: number, fields: RequestFields, options: UpdateOptions = {}): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    assertDraft(request, 'edited');
    const identity = await this.identity.requireEffective();
    const actor = toActor(identity);
    const now = nowIso(this.clock);

    const patch = pickEditableFields(fields);
    if (options.draftComment) {
      patch.draftComment = options.draftComment;
      patch.draftByName = actor.displayName;
      patch.draftAt = now;
    }
    if (Object.keys(patch).length > 0) {
      patch.updatedAt = now;
      await this.cache.updateRequest(requestId, patch);
    }

    let plan: TransitionPlan | null = null;
    let chain: Approver[] | null = null;
    if (options.autoSubmit) {
      const edited = { ...request, ...patch };
      chain = await this.chainFor(edited);
      plan = planSubmit(edited, chain, actor, now, options.submitComment ?? null);
      await this.applyToCache(requestId, plan);
    }

    const updated = await this.cache.getRequest(requestId);
    const submitPlan = plan;
    const sync = this.reconciler.schedule('update', async () => {
      if (Object.keys(patch).length > 0) {
        await this.remote.updateRequest(requestId, patch);
      }
      if (submitPlan) {
        await this.applyToRemote(requestId, submitPlan);
      }
    });

    return { request: updated, chain, sync };
  }

  async deleteRequest(requestId: number): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    assertDraft(request, 'deleted');

    await this.cache.deleteRequest(requestId);
    await this.cache.deleteSteps(requestId);

    const sync = this.reconciler.schedule('delete', async () => {
      await this.remote.deleteApprovalSteps(requestId);
      await this.remote.deleteRequest(requestId);
    });
    return { request: null, chain: null, sync };
  }

  async submitRequest(requestId: number, comment: string | null = null): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    assertDraft(request, 'submitted');
    const actor = toActor(await this.identity.requireEffective());

    const chain = await this.chainFor(request);
    const plan = planSubmit(request, chain, actor, nowIso(this.clock), comment);
    return this.commit(requestId, 'submit', plan, chain);
  }

  async withdrawRequest(requestId: number, comment: string | null = null): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    const real = (await this.identity.real()) ?? (await this.identity.requireEffective());
    const plan = planWithdraw(request, toActor(real), nowIso(this.clock), comment);
    return this.commit(requestId, 'withdraw', plan);
  }

  async approveRequest(requestId: number, comments: string | null = null): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    const actor = toActor(await this.identity.requireEffective());
    const steps = await this.cache.listSteps(requestId);
    const plan = planApprove(request, steps, actor, nowIso(this.clock), comments);
    return this.commit(requestId, 'approve', plan);
  }

  async rejectRequest(requestId: number, comments: string | null = null): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    return this.commit(requestId, 'reject', planReject(request, nowIso(this.clock), comments));
  }

  async denyRequest(requestId: number, comments: string | null = null): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    return this.commit(requestId, 'deny', planDeny(request, nowIso(this.clock), comments));
  }

  async sendBack(requestId: number, comments: string | null = null): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    const actor = toActor(await this.identity.requireEffective());
    return this.commit(requestId, 'send-back', planSendBack(request, actor, nowIso(this.clock), comments));
  }

  async reviseRequest(requestId: number, fields: RevisionFields, options: ReviseOptions = {}): Promise<MutationResult> {
    this.reconciler.ensureCapacity();
    const request = await this.loadMutable(requestId);
    assertRejected(request);
    const actor = toActor(await this.identity.requireEffective());
    const now = nowIso(this.clock);
    const revised = pickRevisionFields(fields);
    const comment = options.comment ?? null;

    if (!options.submit) {
      return this.commit(requestId, 'revise', planReviseToDraft(request, revised, actor, now, comment));
    }

    const edited = { ...request, ...revised };
    const chain = await this.chainFor(edited);
    const submitted = planSubmit(edited, chain, actor, now, comment);
    const plan: TransitionPlan = { patch: { ...revised, ...submitted.patch }, steps: submitted.steps };
    return this.commit(requestId, 'revise', plan, chain);
  }

  private async commit(
    requestId: number,
    label: string,
    plan: TransitionPlan,
    chain: Approver[] | null = null,
  ): Promise<MutationResult> {
    await this.applyToCache(requestId, plan);
    const request = await this.cache.getRequest(requestId);
    const sync = this.reconciler.schedule(label, () => this.applyToRemote(requestId, plan));
    return { request, chain, sync };
  }

  private async applyToCache(requestId: number, plan: TransitionPlan): Promise<void> {
    const change = plan.steps;
    switch (change.kind) {
      case 'replace':
        await this.cache.replaceSteps(requestId, change.steps);
        await this.cache.updateRequest(requestId, plan.patch);
        break;
      case 'delete':
        await this.cache.updateRequest(requestId, plan.patch);
        await this.cache.deleteSteps(requestId);
        break;
      case 'approve':
        await this.cache.updateStep(requestId, change.stepOrder, {
          status: 'APPROVED',
          approvedAt: change.approvedAt,
          comments: change.comments,
        });
        await this.cache.updateRequest(requestId, plan.patch);
        break;
      case 'none':
        await this.cache.updateRequest(requestId, plan.patch);
        break;
    }
  }

  private async applyToRemote(requestId: number, plan: TransitionPlan): Promise<void> {
    const change = plan.steps;
    switch (change.kind) {
      case 'replace':
        await this.remote.updateRequest(requestId, plan.patch);
        await this.remote.replaceApprovalSteps(requestId, change.steps);
        break;
      case 'delete':
        await this.remote.deleteApprovalSteps(requestId);
        await this.remote.updateRequest(requestId, plan.patch);
        break;
      case 'approve':
        await this.remote.approveStep(requestId, change.stepOrder, change.approvedAt, change.comments);
        await this.remote.updateRequest(requestId, plan.patch);
        break;
      case 'none':
        await this.remote.updateRequest(requestId, plan.patch);
        break;
    }
  }

  private async chainFor(request: InvestmentRequestRecord): Promise<Approver[]> {
    const employeeId = request.onBehalfOfEmployeeId ?? request.createdByEmployeeId;
    if (employeeId === null || !request.theater) {
      return [];
    }
    return this.resolver.resolve(employeeId, request.theater);
  }

  private async load(requestId: number): Promise<InvestmentRequestRecord> {
    const request = await this.cache.getRequest(requestId);
    if (!request) {
      throw new NotFoundError('Request not found');
    }
    return request;
  }

  private async loadMutable(requestId: number): Promise<InvestmentRequestRecord> {
    const request = await this.load(requestId);
    if (requestId < 0) {
      throw new PendingSyncError(requestId);
    }
    return request;
  }
}
