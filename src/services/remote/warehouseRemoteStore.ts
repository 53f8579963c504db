import { RemoteUnavailableError } from '../../errors/governanceErrors.js';
import { isRequestStatus, type FinalApprover } from '../../types/approval.js';
import type { UserProfile } from '../../types/identity.js';
import {
  DATA_SOURCES,
  type AccountRecord,
  type BudgetRecord,
  type DataSource,
  type EmployeeRecord,
  type EmployeeSummary,
  type OpportunityRecord,
  type RemoteAdapter,
  type RemoteRequestInsert,
  type RemoteRow,
  type RemoteStore,
  type RemoteTimestamps,
} from '../../types/remote.js';
import type {
  ApprovalStepRecord,
  InvestmentRequestRecord,
  NewApprovalStep,
  RequestPatch,
} from '../../types/request.js';
import {
  booleanValue,
  integerValue,
  numberValue,
  requiredText,
  textValue,
  timestampValue,
  toSnakeCase,
} from './rowValues.js';

export type WarehouseSchemas = {
  schema: string;
  hrSchema: string;
  crmSchema: string;
};

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const assertIdentifier = (name: string): string => {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid schema name "${name}"`);
  }
  return name;
};

/** Writable request columns, in insert order. */
const REQUEST_FIELDS = [
  'requestTitle',
  'accountId',
  'accountName',
  'investmentType',
  'requestedAmount',
  'investmentQuarter',
  'businessJustification',
  'expectedOutcome',
  'riskAssessment',
  'createdBy',
  'createdByName',
  'createdByEmployeeId',
  'createdAt',
  'theater',
  'industrySegment',
  'status',
  'currentApprovalLevel',
  'nextApproverId',
  'nextApproverName',
  'nextApproverTitle',
  'dmApprovedBy',
  'dmApprovedByTitle',
  'dmApprovedAt',
  'dmComments',
  'rdApprovedBy',
  'rdApprovedByTitle',
  'rdApprovedAt',
  'rdComments',
  'avpApprovedBy',
  'avpApprovedByTitle',
  'avpApprovedAt',
  'avpComments',
  'gvpApprovedBy',
  'gvpApprovedByTitle',
  'gvpApprovedAt',
  'gvpComments',
  'updatedAt',
  'withdrawnBy',
  'withdrawnByName',
  'withdrawnAt',
  'withdrawnComment',
  'submittedComment',
  'submittedByName',
  'submittedAt',
  'draftComment',
  'draftByName',
  'draftAt',
  'onBehalfOfEmployeeId',
  'onBehalfOfName',
  'opportunityLink',
  'expectedRoi',
] as const satisfies ReadonlyArray<keyof RemoteRequestInsert>;

const REQUEST_COLUMNS = ['request_id', ...REQUEST_FIELDS.map(toSnakeCase)].join(', ');

const toRequest = (row: RemoteRow): InvestmentRequestRecord => {
  const status = textValue(row, 'status');
  return {
    requestId: integerValue(row, 'request_id') ?? 0,
    requestTitle: textValue(row, 'request_title'),
    accountId: textValue(row, 'account_id'),
    accountName: textValue(row, 'account_name'),
    investmentType: textValue(row, 'investment_type'),
    requestedAmount: numberValue(row, 'requested_amount'),
    investmentQuarter: textValue(row, 'investment_quarter'),
    businessJustification: textValue(row, 'business_justification'),
    expectedOutcome: textValue(row, 'expected_outcome'),
    riskAssessment: textValue(row, 'risk_assessment'),
    createdBy: textValue(row, 'created_by'),
    createdByName: textValue(row, 'created_by_name'),
    createdByEmployeeId: integerValue(row, 'created_by_employee_id'),
    createdAt: timestampValue(row, 'created_at'),
    theater: textValue(row, 'theater'),
    industrySegment: textValue(row, 'industry_segment'),
    status: isRequestStatus(status) ? status : 'DRAFT',
    currentApprovalLevel: integerValue(row, 'current_approval_level') ?? 0,
    nextApproverId: integerValue(row, 'next_approver_id'),
    nextApproverName: textValue(row, 'next_approver_name'),
    nextApproverTitle: textValue(row, 'next_approver_title'),
    dmApprovedBy: textValue(row, 'dm_approved_by'),
    dmApprovedByTitle: textValue(row, 'dm_approved_by_title'),
    dmApprovedAt: timestampValue(row, 'dm_approved_at'),
    dmComments: textValue(row, 'dm_comments'),
    rdApprovedBy: textValue(row, 'rd_approved_by'),
    rdApprovedByTitle: textValue(row, 'rd_approved_by_title'),
    rdApprovedAt: timestampValue(row, 'rd_approved_at'),
    rdComments: textValue(row, 'rd_comments'),
    avpApprovedBy: textValue(row, 'avp_approved_by'),
    avpApprovedByTitle: textValue(row, 'avp_approved_by_title'),
    avpApprovedAt: timestampValue(row, 'avp_approved_at'),
    avpComments: textValue(row, 'avp_comments'),
    gvpApprovedBy: textValue(row, 'gvp_approved_by'),
    gvpApprovedByTitle: textValue(row, 'gvp_approved_by_title'),
    gvpApprovedAt: timestampValue(row, 'gvp_approved_at'),
    gvpComments: textValue(row, 'gvp_comments'),
    updatedAt: timestampValue(row, 'updated_at'),
    withdrawnBy: textValue(row, 'withdrawn_by'),
    withdrawnByName: textValue(row, 'withdrawn_by_name'),
    withdrawnAt: timestampValue(row, 'withdrawn_at'),
    withdrawnComment: textValue(row, 'withdrawn_comment'),
    submittedComment: textValue(row, 'submitted_comment'),
    submittedByName: textValue(row, 'submitted_by_name'),
    submittedAt: timestampValue(row, 'submitted_at'),
    draftComment: textValue(row, 'draft_comment'),
    draftByName: textValue(row, 'draft_by_name'),
    draftAt: timestampValue(row, 'draft_at'),
    onBehalfOfEmployeeId: integerValue(row, 'on_behalf_of_employee_id'),
    onBehalfOfName: textValue(row, 'on_behalf_of_name'),
    opportunityLink: textValue(row, 'opportunity_link'),
    expectedRoi: textValue(row, 'expected_roi'),
  };
};

const toStep = (row: RemoteRow): ApprovalStepRecord => ({
  stepId: integerValue(row, 'step_id') ?? 0,
  requestId: integerValue(row, 'request_id') ?? 0,
  stepOrder: integerValue(row, 'step_order') ?? 0,
  approverEmployeeId: integerValue(row, 'approver_employee_id'),
  approverName: textValue(row, 'approver_name'),
  approverTitle: textValue(row, 'approver_title'),
  status: textValue(row, 'status') === 'APPROVED' ? 'APPROVED' : 'PENDING',
  approvedAt: timestampValue(row, 'approved_at'),
  comments: textValue(row, 'comments'),
  isFinalStep: booleanValue(row, 'is_final_step'),
  createdAt: timestampValue(row, 'created_at'),
});

const toFinalApprover = (row: RemoteRow): FinalApprover => ({
  theater: requiredText(row, 'theater'),
  approverEmployeeId: integerValue(row, 'approver_employee_id') ?? 0,
  approverName: requiredText(row, 'approver_name'),
  approverTitle: textValue(row, 'approver_title'),
});

const toEmployee = (row: RemoteRow): EmployeeRecord => {
  const firstName = textValue(row, 'first_name');
  const lastName = textValue(row, 'last_name');
  return {
    employeeId: integerValue(row, 'employee_id') ?? 0,
    firstName,
    lastName,
    name: [firstName, lastName].filter(Boolean).join(' '),
    title: textValue(row, 'business_title'),
    managerId: integerValue(row, 'manager_id'),
    managerName: textValue(row, 'manager_name'),
    isManager: booleanValue(row, 'is_manager'),
    costCenterName: textValue(row, 'cost_center_name'),
    department: textValue(row, 'department'),
    active: booleanValue(row, 'active_status'),
  };
};

const toOpportunity = (row: RemoteRow): OpportunityRecord => ({
  opportunityId: requiredText(row, 'opportunity_id'),
  opportunityName: textValue(row, 'opportunity_name'),
  accountId: textValue(row, 'account_id'),
  accountName: textValue(row, 'account_name'),
  stage: textValue(row, 'stage_name'),
  amount: numberValue(row, 'amount'),
  closeDate: timestampValue(row, 'close_date'),
  ownerName: textValue(row, 'owner_name'),
});

const toBudget = (row: RemoteRow): BudgetRecord => ({
  budgetId: integerValue(row, 'budget_id') ?? 0,
  fiscalYear: integerValue(row, 'fiscal_year'),
  theater: textValue(row, 'theater'),
  industrySegment: textValue(row, 'industry_segment'),
  portfolio: textValue(row, 'portfolio'),
  budgetAmount: numberValue(row, 'budget_amount'),
  allocatedAmount: numberValue(row, 'allocated_amount'),
  q1Budget: numberValue(row, 'q1_budget'),
  q2Budget: numberValue(row, 'q2_budget'),
  q3Budget: numberValue(row, 'q3_budget'),
  q4Budget: numberValue(row, 'q4_budget'),
});

const isDataSource = (value: string | null): value is DataSource =>
  value !== null && (DATA_SOURCES as readonly string[]).includes(value);

/**
 * Warehouse-backed remote store. Every statement the service issues against
 * the system of record lives here.
 */
export class WarehouseRemoteStore implements RemoteStore {
  private readonly schema: string;
  private readonly hrSchema: string;
  private readonly crmSchema: string;

  constructor(
    private readonly adapter: RemoteAdapter,
    schemas: WarehouseSchemas,
  ) {
    this.schema = assertIdentifier(schemas.schema);
    this.hrSchema = assertIdentifier(schemas.hrSchema);
    this.crmSchema = assertIdentifier(schemas.crmSchema);
  }

  private async query(operation: string, statement: string, params: readonly unknown[] = []): Promise<RemoteRow[]> {
    try {
      return await this.adapter.query(statement, params);
    } catch (error) {
      throw new RemoteUnavailableError(operation, error);
    }
  }

  private async execute(operation: string, statement: string, params: readonly unknown[] = []): Promise<number> {
    try {
      return await this.adapter.execute(statement, params);
    } catch (error) {
      throw new RemoteUnavailableError(operation, error);
    }
  }

  async ping(): Promise<void> {
    await this.query('ping', 'SELECT 1 AS ok');
  }

  async fetchDataSourceTimestamps(): Promise<RemoteTimestamps> {
    const rows = await this.query(
      'fetch timestamps',
      `SELECT data_source, last_modified FROM ${this.schema}.vw_data_source_timestamps`,
    );
    const timestamps: RemoteTimestamps = {};
    for (const row of rows) {
      const source = textValue(row, 'data_source');
      if (isDataSource(source)) {
        timestamps[source] = timestampValue(row, 'last_modified');
      }
    }
    return timestamps;
  }

  async fetchSessionUsername(): Promise<string | null> {
    const rows = await this.query('fetch session user', 'SELECT current_user AS username');
    return rows[0] ? textValue(rows[0], 'username') : null;
  }

  async fetchCurrentUser(): Promise<UserProfile | null> {
    const rows = await this.query(
      'fetch current user',
      `SELECT username, user_id, employee_id, display_name, title, role, theater, industry_segment,
              manager_id, manager_name, approval_level, is_final_approver
       FROM ${this.schema}.vw_current_user_info
       LIMIT 1`,
    );
    const row = rows[0];
    if (!row) {
      return null;
    }
    return {
      username: requiredText(row, 'username'),
      userId: integerValue(row, 'user_id'),
      employeeId: integerValue(row, 'employee_id'),
      displayName: textValue(row, 'display_name'),
      title: textValue(row, 'title'),
      role: textValue(row, 'role'),
      theater: textValue(row, 'theater'),
      industrySegment: textValue(row, 'industry_segment'),
      managerId: integerValue(row, 'manager_id'),
      managerName: textValue(row, 'manager_name'),
      approvalLevel: integerValue(row, 'approval_level') ?? 0,
      isFinalApprover: booleanValue(row, 'is_final_approver'),
    };
  }

  async fetchFinalApprovers(): Promise<FinalApprover[]> {
    const rows = await this.query(
      'fetch final approvers',
      `SELECT theater, approver_employee_id, approver_name, approver_title FROM ${this.schema}.final_approvers`,
    );
    return rows.map(toFinalApprover);
  }

  async fetchRequests(): Promise<InvestmentRequestRecord[]> {
    const rows = await this.query(
      'fetch requests',
      `SELECT ${REQUEST_COLUMNS} FROM ${this.schema}.investment_requests ORDER BY created_at DESC`,
    );
    return rows.map(toRequest);
  }

  async fetchApprovalSteps(): Promise<ApprovalStepRecord[]> {
    const rows = await this.query(
      'fetch approval steps',
      `SELECT step_id, request_id, step_order, approver_employee_id, approver_name, approver_title,
              status, approved_at, comments, is_final_step, created_at
       FROM ${this.schema}.approval_steps
       ORDER BY request_id, step_order`,
    );
    return rows.map(toStep);
  }

  async fetchAccounts(): Promise<AccountRecord[]> {
    const rows = await this.query(
      'fetch accounts',
      `SELECT MIN(account_id) AS account_id, account_name, MIN(theater) AS theater, MIN(industry_segment) AS industry_segment
       FROM ${this.schema}.accounts
       WHERE account_name IS NOT NULL
       GROUP BY account_name
       ORDER BY account_name`,
    );
    return rows.map((row) => ({
      accountId: requiredText(row, 'account_id'),
      accountName: requiredText(row, 'account_name'),
      theater: textValue(row, 'theater'),
      industrySegment: textValue(row, 'industry_segment'),
    }));
  }

  async findFinalApprover(theater: string): Promise<FinalApprover | null> {
    const rows = await this.query(
      'find final approver',
      `SELECT theater, approver_employee_id, approver_name, approver_title
       FROM ${this.schema}.final_approvers WHERE theater = $1 LIMIT 1`,
      [theater],
    );
    return rows[0] ? toFinalApprover(rows[0]) : null;
  }

  async isFinalApprover(employeeId: number): Promise<boolean> {
    const rows = await this.query(
      'check final approver',
      `SELECT approver_employee_id FROM ${this.schema}.final_approvers WHERE approver_employee_id = $1 LIMIT 1`,
      [employeeId],
    );
    return rows.length > 0;
  }

  async getEmployee(employeeId: number): Promise<EmployeeRecord | null> {
    const rows = await this.query(
      'get employee',
      `SELECT employee_id, first_name, last_name, business_title, manager_id, manager_name,
              is_manager, cost_center_name, department, active_status
       FROM ${this.hrSchema}.employees WHERE employee_id = $1`,
      [employeeId],
    );
    return rows[0] ? toEmployee(rows[0]) : null;
  }

  async searchEmployees(term: string, limit: number): Promise<EmployeeSummary[]> {
    const pattern = `%${term}%`;
    const rows = await this.query(
      'search employees',
      `SELECT employee_id, first_name, last_name, business_title, manager_name, department
       FROM ${this.hrSchema}.employees
       WHERE active_status = '1'
         AND (first_name ILIKE $1 OR last_name ILIKE $1 OR (first_name || ' ' || last_name) ILIKE $1)
       ORDER BY last_name, first_name
       LIMIT $2`,
      [pattern, limit],
    );
    return rows.map((row) => ({
      employeeId: integerValue(row, 'employee_id') ?? 0,
      name: [textValue(row, 'first_name'), textValue(row, 'last_name')].filter(Boolean).join(' '),
      title: textValue(row, 'business_title'),
      managerName: textValue(row, 'manager_name'),
      department: textValue(row, 'department'),
    }));
  }

  async fetchBudgets(): Promise<BudgetRecord[]> {
    const rows = await this.query(
      'fetch budgets',
      `SELECT budget_id, fiscal_year, theater, industry_segment, portfolio, budget_amount, allocated_amount,
              q1_budget, q2_budget, q3_budget, q4_budget
       FROM ${this.schema}.annual_budgets
       ORDER BY fiscal_year DESC, theater, industry_segment`,
    );
    return rows.map(toBudget);
  }

  async listAccountOpportunities(accountId: string, limit: number): Promise<OpportunityRecord[]> {
    const rows = await this.query(
      'list account opportunities',
      `SELECT opportunity_id, opportunity_name, account_id, account_name, stage_name, amount, close_date, owner_name
       FROM ${this.crmSchema}.opportunities
       WHERE account_id = $1
       ORDER BY close_date DESC
       LIMIT $2`,
      [accountId, limit],
    );
    return rows.map(toOpportunity);
  }

  async listRequestOpportunities(requestId: number): Promise<OpportunityRecord[]> {
    const rows = await this.query(
      'list request opportunities',
      `SELECT o.opportunity_id, o.opportunity_name, o.account_id, o.account_name, o.stage_name,
              o.amount, o.close_date, o.owner_name
       FROM ${this.schema}.request_opportunities ro
       JOIN ${this.crmSchema}.opportunities o ON ro.opportunity_id = o.opportunity_id
       WHERE ro.request_id = $1`,
      [requestId],
    );
    return rows.map(toOpportunity);
  }

  async linkOpportunity(requestId: number, opportunityId: string, linkedBy: string): Promise<void> {
    await this.execute(
      'link opportunity',
      `INSERT INTO ${this.schema}.request_opportunities (request_id, opportunity_id, linked_by) VALUES ($1, $2, $3)`,
      [requestId, opportunityId, linkedBy],
    );
  }

  async unlinkOpportunity(requestId: number, opportunityId: string): Promise<void> {
    await this.execute(
      'unlink opportunity',
      `DELETE FROM ${this.schema}.request_opportunities WHERE request_id = $1 AND opportunity_id = $2`,
      [requestId, opportunityId],
    );
  }

  async insertRequest(values: RemoteRequestInsert): Promise<number> {
    const columns = REQUEST_FIELDS.map(toSnakeCase);
    const placeholders = REQUEST_FIELDS.map((_, index) => `$${index + 1}`);
    const rows = await this.query(
      'insert request',
      `INSERT INTO ${this.schema}.investment_requests (${columns.join(', ')})
       VALUES (${placeholders.join(', ')})
       RETURNING request_id`,
      REQUEST_FIELDS.map((field) => values[field]),
    );
    const requestId = rows[0] ? integerValue(rows[0], 'request_id') : null;
    if (requestId === null) {
      throw new RemoteUnavailableError('insert request', new Error('No request id returned'));
    }
    return requestId;
  }

  async updateRequest(requestId: number, patch: RequestPatch): Promise<void> {
    const assignments: string[] = [];
    const params: unknown[] = [];
    for (const field of REQUEST_FIELDS) {
      if (field in patch) {
        params.push(patch[field] ?? null);
        assignments.push(`${toSnakeCase(field)} = $${params.length}`);
      }
    }
    if (assignments.length === 0) {
      return;
    }
    params.push(requestId);
    await this.execute(
      'update request',
      `UPDATE ${this.schema}.investment_requests SET ${assignments.join(', ')} WHERE request_id = $${params.length}`,
      params,
    );
  }

  async deleteRequest(requestId: number): Promise<void> {
    await this.execute(
      'delete request links',
      `DELETE FROM ${this.schema}.request_opportunities WHERE request_id = $1`,
      [requestId],
    );
    await this.deleteApprovalSteps(requestId);
    await this.execute('delete request', `DELETE FROM ${this.schema}.investment_requests WHERE request_id = $1`, [
      requestId,
    ]);
  }

  async replaceApprovalSteps(requestId: number, steps: NewApprovalStep[]): Promise<void> {
    await this.deleteApprovalSteps(requestId);
    for (const step of steps) {
      await this.execute(
        'insert approval step',
        `INSERT INTO ${this.schema}.approval_steps
           (request_id, step_order, approver_employee_id, approver_name, approver_title, status, is_final_step, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)`,
        [
          requestId,
          step.stepOrder,
          step.approverEmployeeId,
          step.approverName,
          step.approverTitle,
          step.status,
          step.isFinalStep,
          step.createdAt,
        ],
      );
    }
  }

  async approveStep(requestId: number, stepOrder: number, approvedAt: string, comments: string | null): Promise<void> {
    await this.execute(
      'approve step',
      `UPDATE ${this.schema}.approval_steps
       SET status = 'APPROVED', approved_at = $3, comments = $4
       WHERE request_id = $1 AND step_order = $2`,
      [requestId, stepOrder, approvedAt, comments],
    );
  }

  async deleteApprovalSteps(requestId: number): Promise<void> {
    await this.execute(
      'delete approval steps',
      `DELETE FROM ${this.schema}.approval_steps WHERE request_id = $1`,
      [requestId],
    );
  }
}
