import type { FinalApprover } from './approval.js';
import type { UserProfile } from './identity.js';
import type {
  ApprovalStepRecord,
  InvestmentRequestRecord,
  NewApprovalStep,
  RequestPatch,
} from './request.js';

export const DATA_SOURCES = ['INVESTMENT_REQUESTS', 'APPROVAL_STEPS', 'FINAL_APPROVERS', 'ACCOUNTS'] as const;

export type DataSource = (typeof DATA_SOURCES)[number];

export type RemoteTimestamps = Partial<Record<DataSource, string | null>>;

export type RemoteRow = Record<string, unknown>;

/**
 * Narrow connection to the warehouse. Statements use positional `$n`
 * parameters.
 */
export interface RemoteAdapter {
  query(statement: string, params?: readonly unknown[]): Promise<RemoteRow[]>;
  execute(statement: string, params?: readonly unknown[]): Promise<number>;
  close(): Promise<void>;
}

export interface EmployeeRecord {
  employeeId: number;
  firstName: string | null;
  lastName: string | null;
  name: string;
  title: string | null;
  managerId: number | null;
  managerName: string | null;
  isManager: boolean;
  costCenterName: string | null;
  department: string | null;
  active: boolean;
}

export interface EmployeeSummary {
  employeeId: number;
  name: string;
  title: string | null;
  managerName: string | null;
  department: string | null;
}

export interface AccountRecord {
  accountId: string;
  accountName: string;
  theater: string | null;
  industrySegment: string | null;
}

export interface OpportunityRecord {
  opportunityId: string;
  opportunityName: string | null;
  accountId: string | null;
  accountName: string | null;
  stage: string | null;
  amount: number | null;
  closeDate: string | null;
  ownerName: string | null;
}

/** One row of the yearly budget table. */
export interface BudgetRecord {
  budgetId: number;
  fiscalYear: number | null;
  theater: string | null;
  industrySegment: string | null;
  portfolio: string | null;
  budgetAmount: number | null;
  allocatedAmount: number | null;
  q1Budget: number | null;
  q2Budget: number | null;
  q3Budget: number | null;
  q4Budget: number | null;
}

export type RemoteRequestInsert = Omit<InvestmentRequestRecord, 'requestId'>;

/**
 * Typed view of the system of record. Every warehouse statement lives behind
 * this interface.
 */
export interface RemoteStore {
  ping(): Promise<void>;
  fetchDataSourceTimestamps(): Promise<RemoteTimestamps>;
  fetchSessionUsername(): Promise<string | null>;
  fetchCurrentUser(): Promise<UserProfile | null>;
  fetchFinalApprovers(): Promise<FinalApprover[]>;
  fetchRequests(): Promise<InvestmentRequestRecord[]>;
  fetchApprovalSteps(): Promise<ApprovalStepRecord[]>;
  fetchAccounts(): Promise<AccountRecord[]>;
  fetchBudgets(): Promise<BudgetRecord[]>;

  findFinalApprover(theater: string): Promise<FinalApprover | null>;
  isFinalApprover(employeeId: number): Promise<boolean>;
  getEmployee(employeeId: number): Promise<EmployeeRecord | null>;
  searchEmployees(term: string, limit: number): Promise<EmployeeSummary[]>;

  listAccountOpportunities(accountId: string, limit: number): Promise<OpportunityRecord[]>;
  listRequestOpportunities(requestId: number): Promise<OpportunityRecord[]>;
  linkOpportunity(requestId: number, opportunityId: string, linkedBy: string): Promise<void>;
  unlinkOpportunity(requestId: number, opportunityId: string): Promise<void>;

  insertRequest(values: RemoteRequestInsert): Promise<number>;
  updateRequest(requestId: number, patch: RequestPatch): Promise<void>;
  deleteRequest(requestId: number): Promise<void>;
  replaceApprovalSteps(requestId: number, steps: NewApprovalStep[]): Promise<void>;
  approveStep(requestId: number, stepOrder: number, approvedAt: string, comments: string | null): Promise<void>;
  deleteApprovalSteps(requestId: number): Promise<void>;
}
