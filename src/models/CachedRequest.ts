import { AllowNull, Column, DataType, Default, Model, PrimaryKey, Table } from 'sequelize-typescript';
import type { RequestStatus } from '../types/approval.js';
import type { InvestmentRequestRecord } from '../types/request.js';

@Table({
  tableName: 'cached_investment_requests',
  modelName: 'CachedRequest',
  timestamps: false,
  underscored: true,
  indexes: [
    { name: 'cached_investment_requests_created_by_employee_id', fields: ['created_by_employee_id'] },
    { name: 'cached_investment_requests_created_at', fields: ['created_at'] },
    { name: 'cached_investment_requests_theater', fields: ['theater'] },
    { name: 'cached_investment_requests_status', fields: ['status'] },
  ],
})
export default class CachedRequest extends Model<InvestmentRequestRecord, InvestmentRequestRecord> {
  @PrimaryKey
  @Column(DataType.INTEGER)
  declare requestId: number;

  @Column(DataType.STRING)
  declare requestTitle: string | null;

  @Column(DataType.STRING)
  declare accountId: string | null;

  @Column(DataType.STRING)
  declare accountName: string | null;

  @Column(DataType.STRING)
  declare investmentType: string | null;

  @Column(DataType.DOUBLE)
  declare requestedAmount: number | null;

  @Column(DataType.STRING)
  declare investmentQuarter: string | null;

  @Column(DataType.TEXT)
  declare businessJustification: string | null;

  @Column(DataType.TEXT)
  declare expectedOutcome: string | null;

  @Column(DataType.TEXT)
  declare riskAssessment: string | null;

  @Column(DataType.STRING)
  declare createdBy: string | null;

  @Column(DataType.STRING)
  declare createdByName: string | null;

  @Column(DataType.INTEGER)
  declare createdByEmployeeId: number | null;

  @Column(DataType.STRING)
  declare createdAt: string | null;

  @Column(DataType.STRING)
  declare theater: string | null;

  @Column(DataType.STRING)
  declare industrySegment: string | null;

  @AllowNull(false)
  @Default('DRAFT')
  @Column(DataType.STRING)
  declare status: RequestStatus;

  @AllowNull(false)
  @Default(0)
  @Column(DataType.INTEGER)
  declare currentApprovalLevel: number;

  @Column(DataType.INTEGER)
  declare nextApproverId: number | null;

  @Column(DataType.STRING)
  declare nextApproverName: string | null;

  @Column(DataType.STRING)
  declare nextApproverTitle: string | null;

  @Column(DataType.STRING)
  declare dmApprovedBy: string | null;

  @Column(DataType.STRING)
  declare dmApprovedByTitle: string | null;

  @Column(DataType.STRING)
  declare dmApprovedAt: string | null;

  @Column(DataType.TEXT)
  declare dmComments: string | null;

  @Column(DataType.STRING)
  declare rdApprovedBy: string | null;

  @Column(DataType.STRING)
  declare rdApprovedByTitle: string | null;

  @Column(DataType.STRING)
  declare rdApprovedAt: string | null;

  @Column(DataType.TEXT)
  declare rdComments: string | null;

  @Column(DataType.STRING)
  declare avpApprovedBy: string | null;

  @Column(DataType.STRING)
  declare avpApprovedByTitle: string | null;

  @Column(DataType.STRING)
  declare avpApprovedAt: string | null;

  @Column(DataType.TEXT)
  declare avpComments: string | null;

  @Column(DataType.STRING)
  declare gvpApprovedBy: string | null;

  @Column(DataType.STRING)
  declare gvpApprovedByTitle: string | null;

  @Column(DataType.STRING)
  declare gvpApprovedAt: string | null;

  @Column(DataType.TEXT)
  declare gvpComments: string | null;

  @Column(DataType.STRING)
  declare updatedAt: string | null;

  @Column(DataType.STRING)
  declare withdrawnBy: string | null;

  @Column(DataType.STRING)
  declare withdrawnByName: string | null;

  @Column(DataType.STRING)
  declare withdrawnAt: string | null;

  @Column(DataType.TEXT)
  declare withdrawnComment: string | null;

  @Column(DataType.TEXT)
  declare submittedComment: string | null;

  @Column(DataType.STRING)
  declare submittedByName: string | null;

  @Column(DataType.STRING)
  declare submittedAt: string | null;

  @Column(DataType.TEXT)
  declare draftComment: string | null;

  @Column(DataType.STRING)
  declare draftByName: string | null;

  @Column(DataType.STRING)
  declare draftAt: string | null;

  @Column(DataType.INTEGER)
  declare onBehalfOfEmployeeId: number | null;

  @Column(DataType.STRING)
  declare onBehalfOfName: string | null;

  @Column(DataType.STRING)
  declare opportunityLink: string | null;

  @Column(DataType.STRING)
  declare expectedRoi: string | null;
}
