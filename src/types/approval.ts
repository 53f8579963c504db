export const REQUEST_STATUSES = [
  'DRAFT',
  'SUBMITTED',
  'DM_APPROVED',
  'RD_APPROVED',
  'AVP_APPROVED',
  'FINAL_APPROVED',
  'REJECTED',
  'DENIED',
] as const;

export type RequestStatus = (typeof REQUEST_STATUSES)[number];

export const IN_REVIEW_STATUSES = ['SUBMITTED', 'DM_APPROVED', 'RD_APPROVED', 'AVP_APPROVED'] as const;

export type InReviewStatus = (typeof IN_REVIEW_STATUSES)[number];

export const isRequestStatus = (value: unknown): value is RequestStatus =>
  typeof value === 'string' && (REQUEST_STATUSES as readonly string[]).includes(value);

export const isInReviewStatus = (status: RequestStatus): status is InReviewStatus =>
  (IN_REVIEW_STATUSES as readonly string[]).includes(status);

export type StepStatus = 'PENDING' | 'APPROVED';

/** Fixed approval slots kept on the request row for reporting. */
export type LegacySlot = 'dm' | 'rd' | 'avp' | 'gvp';

export const LEGACY_SLOTS: readonly LegacySlot[] = ['dm', 'rd', 'avp', 'gvp'];

export type LegacyTransition = {
  next: RequestStatus;
  slot: LegacySlot;
  level: number;
};

/**
 * One forward edge per approval in the fixed four-level model. Requests
 * without approval steps move along this table.
 */
export const LEGACY_TRANSITIONS = {
  SUBMITTED: { next: 'DM_APPROVED', slot: 'dm', level: 2 },
  DM_APPROVED: { next: 'RD_APPROVED', slot: 'rd', level: 3 },
  RD_APPROVED: { next: 'AVP_APPROVED', slot: 'avp', level: 4 },
  AVP_APPROVED: { next: 'FINAL_APPROVED', slot: 'gvp', level: 5 },
} as const satisfies Record<InReviewStatus, LegacyTransition>;

/** Dynamic step orders 1..4 are mirrored into the fixed slots. */
export const legacySlotForStep = (stepOrder: number): LegacySlot | null => LEGACY_SLOTS[stepOrder - 1] ?? null;

export type Approver = {
  employeeId: number;
  name: string;
  title: string | null;
  level: number;
  isFinal: boolean;
};

export type FinalApprover = {
  theater: string;
  approverEmployeeId: number;
  approverName: string;
  approverTitle: string | null;
};
