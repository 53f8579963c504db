import { InvalidStateError } from '../../errors/governanceErrors.js';
import {
  LEGACY_TRANSITIONS,
  isInReviewStatus,
  legacySlotForStep,
  type Approver,
  type InReviewStatus,
  type RequestStatus,
} from '../../types/approval.js';
import {
  clearedLegacySlots,
  legacySlotPatch,
  type ApprovalStepRecord,
  type InvestmentRequestRecord,
  type NewApprovalStep,
  type RequestPatch,
} from '../../types/request.js';

export type Actor = {
  username: string | null;
  displayName: string | null;
  title: string | null;
};

export type StepChange =
  | { kind: 'none' }
  | { kind: 'replace'; steps: NewApprovalStep[] }
  | { kind: 'delete' }
  | { kind: 'approve'; stepOrder: number; approvedAt: string; comments: string | null };

/** Cache and remote writes that carry out one transition. */
export type TransitionPlan = {
  patch: RequestPatch;
  steps: StepChange;
};

export type ReviewAction = 'withdraw' | 'approve' | 'reject' | 'send back' | 'deny';

const CLEARED_NEXT_APPROVER: RequestPatch = {
  nextApproverId: null,
  nextApproverName: null,
  nextApproverTitle: null,
};

export const assertDraft = (request: InvestmentRequestRecord, action: string): void => {
  if (request.status !== 'DRAFT') {
    throw new InvalidStateError(`Only draft requests can be ${action}; request is ${request.status}`, {
      status: request.status,
    });
  }
};

export function assertInReview(
  request: InvestmentRequestRecord,
  action: ReviewAction,
): asserts request is InvestmentRequestRecord & { status: InReviewStatus } {
  if (!isInReviewStatus(request.status)) {
    throw new InvalidStateError(`Cannot ${action} a request in status ${request.status}`, {
      status: request.status,
    });
  }
}

export const assertRejected = (request: InvestmentRequestRecord): void => {
  if (request.status !== 'REJECTED') {
    throw new InvalidStateError(`Only rejected requests can be revised; request is ${request.status}`, {
      status: request.status,
    });
  }
};

export const buildApprovalSteps = (requestId: number, chain: Approver[], createdAt: string): NewApprovalStep[] =>
  chain.map((approver, index): NewApprovalStep => ({
    requestId,
    stepOrder: index + 1,
    approverEmployeeId: approver.employeeId,
    approverName: approver.name,
    approverTitle: approver.title,
    status: 'PENDING',
    approvedAt: null,
    comments: null,
    isFinalStep: approver.isFinal,
    createdAt,
  }));

/** DRAFT (or REJECTED on resubmission) to SUBMITTED at level 1 with a fresh chain. */
export const planSubmit = (
  request: InvestmentRequestRecord,
  chain: Approver[],
  actor: Actor,
  now: string,
  comment: string | null,
): TransitionPlan => {
  const first = chain[0];
  return {
    patch: {
      ...clearedLegacySlots(),
      status: 'SUBMITTED',
      currentApprovalLevel: 1,
      nextApproverId: first ? first.employeeId : null,
      nextApproverName: first ? first.name : null,
      nextApproverTitle: first ? first.title : null,
      submittedComment: comment,
      submittedByName: actor.displayName,
      submittedAt: now,
      updatedAt: now,
    },
    steps: { kind: 'replace', steps: buildApprovalSteps(request.requestId, chain, now) },
  };
};

const backToDraft = (now: string): RequestPatch => ({
  ...clearedLegacySlots(),
  ...CLEARED_NEXT_APPROVER,
  status: 'DRAFT',
  currentApprovalLevel: 0,
  updatedAt: now,
});

export const planWithdraw = (
  request: InvestmentRequestRecord,
  realActor: Actor,
  now: string,
  comment: string | null,
): TransitionPlan => {
  assertInReview(request, 'withdraw');
  return {
    patch: {
      ...backToDraft(now),
      withdrawnBy: realActor.username,
      withdrawnByName: realActor.displayName,
      withdrawnAt: now,
      withdrawnComment: comment,
    },
    steps: { kind: 'delete' },
  };
};

export const planSendBack = (
  request: InvestmentRequestRecord,
  actor: Actor,
  now: string,
  comment: string | null,
): TransitionPlan => {
  assertInReview(request, 'send back');
  return {
    patch: {
      ...backToDraft(now),
      draftComment: comment,
      draftByName: actor.displayName,
      draftAt: now,
    },
    steps: { kind: 'delete' },
  };
};

/** REJECTED back to DRAFT with the revised fields applied. */
export const planReviseToDraft = (
  request: InvestmentRequestRecord,
  fields: RequestPatch,
  actor: Actor,
  now: string,
  comment: string | null,
): TransitionPlan => {
  assertRejected(request);
  return {
    patch: {
      ...fields,
      ...backToDraft(now),
      draftComment: comment,
      draftByName: actor.displayName,
      draftAt: now,
    },
    steps: { kind: 'delete' },
  };
};

const planClosing = (
  request: InvestmentRequestRecord,
  action: 'reject' | 'deny',
  status: RequestStatus,
  now: string,
  comments: string | null,
): TransitionPlan => {
  assertInReview(request, action);
  return {
    patch: { status, currentApprovalLevel: request.currentApprovalLevel, gvpComments: comments, updatedAt: now },
    steps: { kind: 'none' },
  };
};

export const planReject = (request: InvestmentRequestRecord, now: string, comments: string | null): TransitionPlan =>
  planClosing(request, 'reject', 'REJECTED', now, comments);

export const planDeny = (request: InvestmentRequestRecord, now: string, comments: string | null): TransitionPlan =>
  planClosing(request, 'deny', 'DENIED', now, comments);

/**
 * Approves the current level. Requests with approval steps act on the lowest
 * pending step; requests without steps follow the fixed four-level table.
 */
export const planApprove = (
  request: InvestmentRequestRecord,
  steps: ApprovalStepRecord[],
  actor: Actor,
  now: string,
  comments: string | null,
): TransitionPlan => {
  assertInReview(request, 'approve');
  const fact = { approvedBy: actor.displayName, approvedByTitle: actor.title, approvedAt: now, comments };

  if (steps.length === 0) {
    const transition = LEGACY_TRANSITIONS[request.status];
    return {
      patch: {
        ...legacySlotPatch(transition.slot, fact),
        ...(transition.next === 'FINAL_APPROVED' ? CLEARED_NEXT_APPROVER : {}),
        status: transition.next,
        currentApprovalLevel: transition.level,
        updatedAt: now,
      },
      steps: { kind: 'none' },
    };
  }

  const ordered = [...steps].sort((a, b) => a.stepOrder - b.stepOrder);
  const current = ordered.find((step) => step.status === 'PENDING');
  if (!current) {
    throw new InvalidStateError('No pending approval step found', { requestId: request.requestId });
  }
  const next = ordered.find((step) => step.stepOrder === current.stepOrder + 1);
  const slot = legacySlotForStep(current.stepOrder);
  const mirrored = slot ? legacySlotPatch(slot, fact) : {};

  const patch: RequestPatch =
    current.isFinalStep || !next
      ? {
          ...mirrored,
          ...CLEARED_NEXT_APPROVER,
          status: 'FINAL_APPROVED',
          currentApprovalLevel: current.stepOrder,
          updatedAt: now,
        }
      : {
          ...mirrored,
          status: 'SUBMITTED',
          currentApprovalLevel: current.stepOrder + 1,
          nextApproverId: next.approverEmployeeId,
          nextApproverName: next.approverName,
          nextApproverTitle: next.approverTitle,
          updatedAt: now,
        };

  return {
    patch,
    steps: { kind: 'approve', stepOrder: current.stepOrder, approvedAt: now, comments },
  };
};
