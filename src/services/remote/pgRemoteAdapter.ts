import pg from 'pg';
import type { WarehouseConfig } from '../../config/env.js';
import type { RemoteAdapter, RemoteRow } from '../../types/remote.js';
import logger from '../../utils/logger.js';

const { Pool } = pg;

export class PgRemoteAdapter implements RemoteAdapter {
  private readonly pool: pg.Pool;

  constructor(config: WarehouseConfig) {
    this.pool = new Pool({
      host: config.host ?? undefined,
      port: config.port,
      database: config.database ?? undefined,
      user: config.user ?? undefined,
      password: config.password ?? undefined,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: 4,
    });
    this.pool.on('error', (error) => {
      logger.error(`[warehouse] Idle client error: ${error.message}`);
    });
  }

  async query(statement: string, params: readonly unknown[] = []): Promise<RemoteRow[]> {
    const result = await this.pool.query<RemoteRow>(statement, [...params]);
    return result.rows;
  }

  async execute(statement: string, params: readonly unknown[] = []): Promise<number> {
    const result = await this.pool.query(statement, [...params]);
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
