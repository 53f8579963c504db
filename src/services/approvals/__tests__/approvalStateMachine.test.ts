import { InvalidStateError } from '../../../errors/governanceErrors';
import { draftRequest } from '../../../testing/governanceFixtures';
import type { ApprovalStepRecord } from '../../../types/request';
import { planApprove, planReject, planSendBack, planSubmit, planWithdraw, type Actor } from '../approvalStateMachine';

const NOW = '2026-03-02T10:00:00.000Z';

const approver: Actor = { username: 'SORTEGA', displayName: 'Sam Ortega', title: 'Regional Director' };

const step = (stepOrder: number, overrides: Partial<ApprovalStepRecord> = {}): ApprovalStepRecord => ({
  stepId: 5000 + stepOrder,
  requestId: 1,
  stepOrder,
  approverEmployeeId: 200 + stepOrder,
  approverName: `Approver ${stepOrder}`,
  approverTitle: 'Manager',
  status: 'PENDING',
  approvedAt: null,
  comments: null,
  isFinalStep: false,
  createdAt: NOW,
  ...overrides,
});

describe('planApprove on requests without approval steps', () => {
  it('advances one status and one level per approval', () => {
    const plan = planApprove(draftRequest(1, { status: 'SUBMITTED', currentApprovalLevel: 1 }), [], approver, NOW, 'ok');

    expect(plan.patch.status).toBe('DM_APPROVED');
    expect(plan.patch.currentApprovalLevel).toBe(2);
    expect(plan.patch.dmApprovedBy).toBe('Sam Ortega');
    expect(plan.patch.dmApprovedByTitle).toBe('Regional Director');
    expect(plan.patch.dmApprovedAt).toBe(NOW);
    expect(plan.patch.dmComments).toBe('ok');
    expect(plan.steps).toEqual({ kind: 'none' });
  });

  it('moves RD_APPROVED to AVP_APPROVED', () => {
    const plan = planApprove(draftRequest(1, { status: 'RD_APPROVED', currentApprovalLevel: 3 }), [], approver, NOW, null);

    expect(plan.patch.status).toBe('AVP_APPROVED');
    expect(plan.patch.currentApprovalLevel).toBe(4);
    expect(plan.patch.avpApprovedBy).toBe('Sam Ortega');
  });

  it('finishes at FINAL_APPROVED from AVP_APPROVED and clears the next approver', () => {
    const request = draftRequest(1, { status: 'AVP_APPROVED', currentApprovalLevel: 4, nextApproverName: 'Alex Kim' });
    const plan = planApprove(request, [], approver, NOW, 'final');

    expect(plan.patch.status).toBe('FINAL_APPROVED');
    expect(plan.patch.currentApprovalLevel).toBe(5);
    expect(plan.patch.gvpApprovedBy).toBe('Sam Ortega');
    expect(plan.patch.gvpComments).toBe('final');
    expect(plan.patch.nextApproverName).toBeNull();
    expect(plan.patch.nextApproverId).toBeNull();
  });

  it('rejects approval of a draft', () => {
    expect(() => planApprove(draftRequest(1), [], approver, NOW, null)).toThrow(
      new InvalidStateError('Cannot approve a request in status DRAFT'),
    );
  });
});

describe('planApprove on requests with approval steps', () => {
  it('acts on the lowest pending step and points at the next one', () => {
    const request = draftRequest(1, { status: 'SUBMITTED', currentApprovalLevel: 1 });
    const steps = [step(2, { isFinalStep: true }), step(1)];

    const plan = planApprove(request, steps, approver, NOW, 'looks good');

    expect(plan.steps).toEqual({ kind: 'approve', stepOrder: 1, approvedAt: NOW, comments: 'looks good' });
    expect(plan.patch.status).toBe('SUBMITTED');
    expect(plan.patch.currentApprovalLevel).toBe(2);
    expect(plan.patch.nextApproverId).toBe(202);
    expect(plan.patch.nextApproverName).toBe('Approver 2');
    expect(plan.patch.dmApprovedBy).toBe('Sam Ortega');
  });

  it('completes the request on the final step', () => {
    const request = draftRequest(1, { status: 'SUBMITTED', currentApprovalLevel: 2 });
    const steps = [step(1, { status: 'APPROVED', approvedAt: NOW }), step(2, { isFinalStep: true })];

    const plan = planApprove(request, steps, approver, NOW, null);

    expect(plan.steps).toEqual({ kind: 'approve', stepOrder: 2, approvedAt: NOW, comments: null });
    expect(plan.patch.status).toBe('FINAL_APPROVED');
    expect(plan.patch.currentApprovalLevel).toBe(2);
    expect(plan.patch.rdApprovedBy).toBe('Sam Ortega');
    expect(plan.patch.nextApproverName).toBeNull();
  });

  it('does not mirror steps beyond the fourth into the fixed slots', () => {
    const request = draftRequest(1, { status: 'SUBMITTED', currentApprovalLevel: 5 });
    const steps = [1, 2, 3, 4].map((order) => step(order, { status: 'APPROVED' }));
    steps.push(step(5), step(6, { isFinalStep: true }));

    const plan = planApprove(request, steps, approver, NOW, null);

    expect(plan.patch.currentApprovalLevel).toBe(6);
    expect(plan.patch.gvpApprovedBy).toBeUndefined();
    expect(plan.patch.nextApproverName).toBe('Approver 6');
  });

  it('fails when every step is already approved', () => {
    const request = draftRequest(1, { status: 'SUBMITTED' });
    const steps = [step(1, { status: 'APPROVED', isFinalStep: true })];

    expect(() => planApprove(request, steps, approver, NOW, null)).toThrow('No pending approval step found');
  });
});

describe('planSubmit', () => {
  it('starts review at level 1 with the first approver of the chain', () => {
    const chain = [
      { employeeId: 200, name: 'Riley Moss', title: 'District Manager', level: 2, isFinal: false },
      { employeeId: 300, name: 'Sam Ortega', title: 'Regional Director', level: 3, isFinal: true },
    ];
    const actor: Actor = { username: 'DFIELD', displayName: 'Dana Field', title: 'Account Executive' };

    const plan = planSubmit(draftRequest(-1), chain, actor, NOW, 'please review');

    expect(plan.patch).toMatchObject({
      status: 'SUBMITTED',
      currentApprovalLevel: 1,
      nextApproverId: 200,
      nextApproverName: 'Riley Moss',
      nextApproverTitle: 'District Manager',
      submittedComment: 'please review',
      submittedByName: 'Dana Field',
      submittedAt: NOW,
    });
    expect(plan.steps).toEqual({
      kind: 'replace',
      steps: [
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
          createdAt: NOW,
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
          createdAt: NOW,
        },
      ],
    });
  });
});

describe('returning a request to draft', () => {
  const inReview = draftRequest(1, {
    status: 'DM_APPROVED',
    currentApprovalLevel: 2,
    nextApproverName: 'Sam Ortega',
    dmApprovedBy: 'Riley Moss',
    dmApprovedAt: NOW,
    dmComments: 'fine',
  });
  const requester: Actor = { username: 'DFIELD', displayName: 'Dana Field', title: 'Account Executive' };

  it('withdraw clears the fixed slots and deletes the steps', () => {
    const plan = planWithdraw(inReview, requester, NOW, 'needs a new quote');

    expect(plan.steps).toEqual({ kind: 'delete' });
    expect(plan.patch).toMatchObject({
      status: 'DRAFT',
      currentApprovalLevel: 0,
      nextApproverName: null,
      dmApprovedBy: null,
      dmApprovedAt: null,
      dmComments: null,
      gvpApprovedBy: null,
      withdrawnBy: 'DFIELD',
      withdrawnByName: 'Dana Field',
      withdrawnAt: NOW,
      withdrawnComment: 'needs a new quote',
    });
  });

  it('send back stores the comment as the draft comment', () => {
    const plan = planSendBack(inReview, approver, NOW, 'add ROI detail');

    expect(plan.steps).toEqual({ kind: 'delete' });
    expect(plan.patch).toMatchObject({
      status: 'DRAFT',
      currentApprovalLevel: 0,
      rdApprovedBy: null,
      draftComment: 'add ROI detail',
      draftByName: 'Sam Ortega',
      draftAt: NOW,
    });
  });

  it('withdraw is refused once the request is closed', () => {
    expect(() => planWithdraw(draftRequest(1, { status: 'FINAL_APPROVED' }), requester, NOW, null)).toThrow(
      'Cannot withdraw a request in status FINAL_APPROVED',
    );
  });
});

describe('planReject', () => {
  it('keeps the level and records the comment in the final slot', () => {
    const plan = planReject(draftRequest(1, { status: 'RD_APPROVED', currentApprovalLevel: 3 }), NOW, 'out of budget');

    expect(plan.patch).toEqual({
      status: 'REJECTED',
      currentApprovalLevel: 3,
      gvpComments: 'out of budget',
      updatedAt: NOW,
    });
    expect(plan.steps).toEqual({ kind: 'none' });
  });
});
