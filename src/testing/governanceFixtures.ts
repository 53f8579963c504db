import { createCacheDatabase } from '../config/database.js';
import { blankRequest } from '../services/approvals/requestService.js';
import { GovernanceContext, type GovernanceSettings } from '../services/governanceContext.js';
import type { UserProfile } from '../types/identity.js';
import type { EmployeeRecord } from '../types/remote.js';
import type { InvestmentRequestRecord } from '../types/request.js';
import type { Clock } from '../utils/time.js';
import { InMemoryRemoteStore } from './inMemoryRemoteStore.js';

export const FIXED_NOW = '2026-03-02T10:00:00.000Z';

export const fixedClock: Clock = () => new Date(FIXED_NOW);

export const TEST_SETTINGS: GovernanceSettings = {
  adminUsername: 'ADMIN.USER',
  timestampTtlSeconds: 60,
  refreshMaxRetries: 2,
  refreshRetryDelayMs: 0,
  syncConcurrency: 1,
  syncMaxPending: 100,
  employeeSearchTtlSeconds: 300,
};

export const employee = (
  employeeId: number,
  firstName: string,
  lastName: string,
  title: string,
  managerId: number | null,
  overrides: Partial<EmployeeRecord> = {},
): EmployeeRecord => ({
  employeeId,
  firstName,
  lastName,
  name: `${firstName} ${lastName}`,
  title,
  managerId,
  managerName: null,
  isManager: false,
  costCenterName: 'EMEA',
  department: 'Sales',
  active: true,
  ...overrides,
});

export const REQUESTER: UserProfile = {
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

export const ADMIN: UserProfile = {
  ...REQUESTER,
  username: 'ADMIN.USER',
  userId: 1,
  employeeId: 900,
  displayName: 'Admin User',
  title: 'Sales Operations',
};

/**
 * Dana Field (100) reports to Riley Moss (200), who reports to Sam Ortega
 * (300), the EMEA final approver, who reports to Alex Kim (400).
 */
export const seedOrganization = (remote: InMemoryRemoteStore, currentUser: UserProfile = REQUESTER): void => {
  remote.addEmployee(employee(100, 'Dana', 'Field', 'Account Executive', 200, { managerName: 'Riley Moss' }));
  remote.addEmployee(
    employee(200, 'Riley', 'Moss', 'District Manager', 300, { managerName: 'Sam Ortega', isManager: true }),
  );
  remote.addEmployee(
    employee(300, 'Sam', 'Ortega', 'Regional Director', 400, { managerName: 'Alex Kim', isManager: true }),
  );
  remote.addEmployee(employee(400, 'Alex', 'Kim', 'Area VP', null, { isManager: true }));
  remote.finalApprovers = [
    { theater: 'EMEA', approverEmployeeId: 300, approverName: 'Sam Ortega', approverTitle: 'Regional Director' },
  ];
  remote.accounts = [
    { accountId: 'A-1', accountName: 'Northwind Traders', theater: 'EMEA', industrySegment: 'Retail' },
    { accountId: 'A-2', accountName: 'Northbank Foods', theater: 'EMEA', industrySegment: 'Consumer Goods' },
    { accountId: 'A-3', accountName: 'Pacific Freight', theater: 'APAC', industrySegment: 'Logistics' },
  ];
  remote.currentUser = { ...currentUser };
  remote.sessionUsername = currentUser.username;
  remote.touch('FINAL_APPROVERS');
  remote.touch('ACCOUNTS');
};

export const draftRequest = (
  requestId: number,
  overrides: Partial<InvestmentRequestRecord> = {},
): InvestmentRequestRecord => ({
  ...blankRequest(requestId),
  requestTitle: 'Retail analytics pilot',
  accountId: 'A-1',
  accountName: 'Northwind Traders',
  investmentType: 'Services',
  requestedAmount: 25000,
  investmentQuarter: 'FY2027-Q1',
  createdBy: 'DFIELD',
  createdByName: 'Dana Field',
  createdByEmployeeId: 100,
  createdAt: '2026-02-01T09:00:00.000Z',
  theater: 'EMEA',
  industrySegment: 'Retail',
  nextApproverName: 'Riley Moss',
  ...overrides,
});

export type TestContext = {
  context: GovernanceContext;
  remote: InMemoryRemoteStore;
};

export const createTestContext = async (
  remote: InMemoryRemoteStore = new InMemoryRemoteStore(),
  settings: Partial<GovernanceSettings> = {},
  clock: Clock = fixedClock,
): Promise<TestContext> => {
  const database = await createCacheDatabase(':memory:');
  const context = new GovernanceContext({
    database,
    remote,
    settings: { ...TEST_SETTINGS, ...settings },
    clock,
  });
  return { context, remote };
};
