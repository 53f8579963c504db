import { Column, DataType, Model, PrimaryKey, Table } from 'sequelize-typescript';
import type { AccountRecord } from '../types/remote.js';

@Table({
  tableName: 'cached_accounts',
  modelName: 'CachedAccount',
  timestamps: false,
  underscored: true,
  indexes: [
    { name: 'cached_accounts_theater', fields: ['theater'] },
  ],
})
export default class CachedAccount extends Model<AccountRecord, AccountRecord> {
  @Column(DataType.STRING)
  declare accountId: string;

  @PrimaryKey
  @Column(DataType.STRING)
  declare accountName: string;

  @Column(DataType.STRING)
  declare theater: string | null;

  @Column(DataType.STRING)
  declare industrySegment: string | null;
}
