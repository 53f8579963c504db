import { Column, DataType, Model, PrimaryKey, Table } from 'sequelize-typescript';

export type CacheMetadataAttributes = {
  dataSource: string;
  remoteModified: string | null;
  localRefreshed: string;
};

/** Remote modification timestamp recorded at the last refresh of each source. */
@Table({
  tableName: 'cache_metadata',
  modelName: 'CacheMetadata',
  timestamps: false,
  underscored: true,
})
export default class CacheMetadata extends Model<CacheMetadataAttributes, CacheMetadataAttributes> {
  @PrimaryKey
  @Column(DataType.STRING)
  declare dataSource: string;

  @Column(DataType.STRING)
  declare remoteModified: string | null;

  @Column(DataType.STRING)
  declare localRefreshed: string;
}
