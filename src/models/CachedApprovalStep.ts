import { AllowNull, Column, DataType, Default, Model, PrimaryKey, Table } from 'sequelize-typescript';
import type { StepStatus } from '../types/approval.js';
import type { ApprovalStepRecord } from '../types/request.js';

@Table({
  tableName: 'cached_approval_steps',
  modelName: 'CachedApprovalStep',
  timestamps: false,
  underscored: true,
  indexes: [
    { name: 'cached_approval_steps_request_id', fields: ['request_id'] },
  ],
})
export default class CachedApprovalStep extends Model<ApprovalStepRecord, ApprovalStepRecord> {
  @PrimaryKey
  @Column(DataType.INTEGER)
  declare stepId: number;

  @AllowNull(false)
  @Column(DataType.INTEGER)
  declare requestId: number;

  @AllowNull(false)
  @Column(DataType.INTEGER)
  declare stepOrder: number;

  @Column(DataType.INTEGER)
  declare approverEmployeeId: number | null;

  @Column(DataType.STRING)
  declare approverName: string | null;

  @Column(DataType.STRING)
  declare approverTitle: string | null;

  @AllowNull(false)
  @Default('PENDING')
  @Column(DataType.STRING)
  declare status: StepStatus;

  @Column(DataType.STRING)
  declare approvedAt: string | null;

  @Column(DataType.TEXT)
  declare comments: string | null;

  @AllowNull(false)
  @Default(false)
  @Column(DataType.BOOLEAN)
  declare isFinalStep: boolean;

  @Column(DataType.STRING)
  declare createdAt: string | null;
}
