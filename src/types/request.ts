import type { LegacySlot, RequestStatus, StepStatus } from './approval.js';

export interface InvestmentRequestRecord {
  requestId: number;
  requestTitle: string | null;
  accountId: string | null;
  accountName: string | null;
  investmentType: string | null;
  requestedAmount: number | null;
  investmentQuarter: string | null;
  businessJustification: string | null;
  expectedOutcome: string | null;
  riskAssessment: string | null;
  createdBy: string | null;
  createdByName: string | null;
  createdByEmployeeId: number | null;
  createdAt: string | null;
  theater: string | null;
  industrySegment: string | null;
  status: RequestStatus;
  currentApprovalLevel: number;
  nextApproverId: number | null;
  nextApproverName: string | null;
  nextApproverTitle: string | null;
  dmApprovedBy: string | null;
  dmApprovedByTitle: string | null;
  dmApprovedAt: string | null;
  dmComments: string | null;
  rdApprovedBy: string | null;
  rdApprovedByTitle: string | null;
  rdApprovedAt: string | null;
  rdComments: string | null;
  avpApprovedBy: string | null;
  avpApprovedByTitle: string | null;
  avpApprovedAt: string | null;
  avpComments: string | null;
  gvpApprovedBy: string | null;
  gvpApprovedByTitle: string | null;
  gvpApprovedAt: string | null;
  gvpComments: string | null;
  updatedAt: string | null;
  withdrawnBy: string | null;
  withdrawnByName: string | null;
  withdrawnAt: string | null;
  withdrawnComment: string | null;
  submittedComment: string | null;
  submittedByName: string | null;
  submittedAt: string | null;
  draftComment: string | null;
  draftByName: string | null;
  draftAt: string | null;
  onBehalfOfEmployeeId: number | null;
  onBehalfOfName: string | null;
  opportunityLink: string | null;
  expectedRoi: string | null;
}

export type RequestPatch = Partial<Omit<InvestmentRequestRecord, 'requestId'>>;

/** Fields a requester may set while the request is a draft. */
export const EDITABLE_REQUEST_FIELDS = [
  'requestTitle',
  'accountId',
  'accountName',
  'investmentType',
  'requestedAmount',
  'investmentQuarter',
  'businessJustification',
  'expectedOutcome',
  'riskAssessment',
  'theater',
  'industrySegment',
  'opportunityLink',
  'expectedRoi',
] as const;

export type EditableRequestField = (typeof EDITABLE_REQUEST_FIELDS)[number];

export type RequestFields = Partial<Pick<InvestmentRequestRecord, EditableRequestField>>;

export type RevisionFields = Partial<
  Pick<InvestmentRequestRecord, 'businessJustification' | 'expectedOutcome' | 'riskAssessment'>
>;

export type LegacySlotFact = {
  approvedBy: string | null;
  approvedByTitle: string | null;
  approvedAt: string | null;
  comments: string | null;
};

export const legacySlotPatch = (slot: LegacySlot, fact: LegacySlotFact): RequestPatch => {
  switch (slot) {
    case 'dm':
      return {
        dmApprovedBy: fact.approvedBy,
        dmApprovedByTitle: fact.approvedByTitle,
        dmApprovedAt: fact.approvedAt,
        dmComments: fact.comments,
      };
    case 'rd':
      return {
        rdApprovedBy: fact.approvedBy,
        rdApprovedByTitle: fact.approvedByTitle,
        rdApprovedAt: fact.approvedAt,
        rdComments: fact.comments,
      };
    case 'avp':
      return {
        avpApprovedBy: fact.approvedBy,
        avpApprovedByTitle: fact.approvedByTitle,
        avpApprovedAt: fact.approvedAt,
        avpComments: fact.comments,
      };
    case 'gvp':
      return {
        gvpApprovedBy: fact.approvedBy,
        gvpApprovedByTitle: fact.approvedByTitle,
        gvpApprovedAt: fact.approvedAt,
        gvpComments: fact.comments,
      };
  }
};

const EMPTY_FACT: LegacySlotFact = { approvedBy: null, approvedByTitle: null, approvedAt: null, comments: null };

export const clearedLegacySlots = (): RequestPatch => ({
  ...legacySlotPatch('dm', EMPTY_FACT),
  ...legacySlotPatch('rd', EMPTY_FACT),
  ...legacySlotPatch('avp', EMPTY_FACT),
  ...legacySlotPatch('gvp', EMPTY_FACT),
});

export interface ApprovalStepRecord {
  stepId: number;
  requestId: number;
  stepOrder: number;
  approverEmployeeId: number | null;
  approverName: string | null;
  approverTitle: string | null;
  status: StepStatus;
  approvedAt: string | null;
  comments: string | null;
  isFinalStep: boolean;
  createdAt: string | null;
}

export type NewApprovalStep = Omit<ApprovalStepRecord, 'stepId'>;

export type RequestFilters = {
  theater?: string;
  industrySegment?: string;
  quarter?: string;
  status?: RequestStatus;
};

export type RequestWithSteps = InvestmentRequestRecord & {
  approvalSteps: ApprovalStepRecord[];
};
