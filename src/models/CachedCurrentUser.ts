import { AllowNull, Column, DataType, Default, Model, PrimaryKey, Table } from 'sequelize-typescript';
import type { UserProfile } from '../types/identity.js';

export type CachedCurrentUserAttributes = UserProfile & { cachedAt: string };

@Table({
  tableName: 'cached_current_user',
  modelName: 'CachedCurrentUser',
  timestamps: false,
  underscored: true,
})
export default class CachedCurrentUser extends Model<CachedCurrentUserAttributes, CachedCurrentUserAttributes> {
  @PrimaryKey
  @Column(DataType.STRING)
  declare username: string;

  @Column(DataType.INTEGER)
  declare userId: number | null;

  @Column(DataType.INTEGER)
  declare employeeId: number | null;

  @Column(DataType.STRING)
  declare displayName: string | null;

  @Column(DataType.STRING)
  declare title: string | null;

  @Column(DataType.STRING)
  declare role: string | null;

  @Column(DataType.STRING)
  declare theater: string | null;

  @Column(DataType.STRING)
  declare industrySegment: string | null;

  @Column(DataType.INTEGER)
  declare managerId: number | null;

  @Column(DataType.STRING)
  declare managerName: string | null;

  @AllowNull(false)
  @Default(0)
  @Column(DataType.INTEGER)
  declare approvalLevel: number;

  @AllowNull(false)
  @Default(false)
  @Column(DataType.BOOLEAN)
  declare isFinalApprover: boolean;

  @Column(DataType.STRING)
  declare cachedAt: string;
}
