import { loadConfig } from '../env';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      apiHost: '127.0.0.1',
      apiPort: 8767,
      cacheDbPath: 'cache.db',
      adminUsername: null,
      warehouse: {
        host: null,
        port: 5432,
        database: null,
        user: null,
        password: null,
        ssl: false,
        schema: 'investment_governance',
        hrSchema: 'hr',
        crmSchema: 'crm',
      },
      timestampTtlSeconds: 60,
      refreshMaxRetries: 2,
      refreshRetryDelayMs: 2000,
      cacheCheckCron: '*/5 * * * *',
      cacheCheckTimezone: 'UTC',
      syncConcurrency: 1,
      syncMaxPending: 100,
      employeeSearchTtlSeconds: 300,
    });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.warehouse)).toBe(true);
  });

  it('reads and trims the environment', () => {
    const config = loadConfig({
      API_PORT: ' 9000 ',
      ADMIN_USERNAME: ' ops.admin ',
      WAREHOUSE_HOST: 'warehouse.internal',
      WAREHOUSE_NAME: 'governance',
      WAREHOUSE_USER: 'svc_governance',
      WAREHOUSE_PASSWORD: 'test-secret',
      WAREHOUSE_SSL: 'yes',
      SYNC_MAX_PENDING: '25',
    });

    expect(config.apiPort).toBe(9000);
    expect(config.adminUsername).toBe('ops.admin');
    expect(config.warehouse).toMatchObject({
      host: 'warehouse.internal',
      database: 'governance',
      user: 'svc_governance',
      password: 'test-secret',
      ssl: true,
    });
    expect(config.syncMaxPending).toBe(25);
  });

  it('falls back on invalid numbers', () => {
    const config = loadConfig({ API_PORT: 'eighty', SYNC_CONCURRENCY: '0', REFRESH_MAX_RETRIES: '-1' });

    expect(config.apiPort).toBe(8767);
    expect(config.syncConcurrency).toBe(1);
    expect(config.refreshMaxRetries).toBe(2);
  });
});
