import { AllowNull, Column, DataType, Model, PrimaryKey, Table } from 'sequelize-typescript';
import type { FinalApprover } from '../types/approval.js';

@Table({
  tableName: 'cached_final_approvers',
  modelName: 'CachedFinalApprover',
  timestamps: false,
  underscored: true,
})
export default class CachedFinalApprover extends Model<FinalApprover, FinalApprover> {
  @PrimaryKey
  @Column(DataType.STRING)
  declare theater: string;

  @AllowNull(false)
  @Column(DataType.INTEGER)
  declare approverEmployeeId: number;

  @AllowNull(false)
  @Column(DataType.STRING)
  declare approverName: string;

  @Column(DataType.STRING)
  declare approverTitle: string | null;
}
