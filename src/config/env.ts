import dotenv from 'dotenv';
import logger from '../utils/logger.js';

export type WarehouseConfig = {
  host: string | null;
  port: number;
  database: string | null;
  user: string | null;
  password: string | null;
  ssl: boolean;
  schema: string;
  hrSchema: string;
  crmSchema: string;
};

export type AppConfig = {
  apiHost: string;
  apiPort: number;
  cacheDbPath: string;
  adminUsername: string | null;
  warehouse: WarehouseConfig;
  timestampTtlSeconds: number;
  refreshMaxRetries: number;
  refreshRetryDelayMs: number;
  cacheCheckCron: string;
  cacheCheckTimezone: string;
  syncConcurrency: number;
  syncMaxPending: number;
  employeeSearchTtlSeconds: number;
};

type Env = Record<string, string | undefined>;

const normalizeEnvValue = (value: string | undefined): string | null => {
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const readInteger = (env: Env, key: string, fallback: number, min = 0): number => {
  const raw = normalizeEnvValue(env[key]);
  if (raw === null) {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < min) {
    logger.warn(`[config] Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return parsed;
};

const readBoolean = (env: Env, key: string, fallback: boolean): boolean => {
  const raw = normalizeEnvValue(env[key]);
  if (raw === null) {
    return fallback;
  }
  const normalized = raw.toLowerCase();
  if (['true', '1', 'yes', 'y'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'n'].includes(normalized)) {
    return false;
  }
  return fallback;
};

export const loadEnvFile = (nodeEnv = process.env.NODE_ENV): void => {
  const environment = (nodeEnv || 'development').trim();
  const envFile = environment === 'production' ? '.env.prod' : '.env.dev';
  const result = dotenv.config({ path: envFile });
  if (result.error) {
    logger.warn(`[config] dotenv: failed to load ${envFile}. Falling back to existing process.env values.`);
  } else {
    logger.info(`[config] dotenv: loaded ${envFile} for NODE_ENV=${environment}`);
  }
};

export const loadConfig = (env: Env = process.env): AppConfig => {
  const warehouse: WarehouseConfig = {
    host: normalizeEnvValue(env.WAREHOUSE_HOST),
    port: readInteger(env, 'WAREHOUSE_PORT', 5432, 1),
    database: normalizeEnvValue(env.WAREHOUSE_NAME),
    user: normalizeEnvValue(env.WAREHOUSE_USER),
    password: normalizeEnvValue(env.WAREHOUSE_PASSWORD),
    ssl: readBoolean(env, 'WAREHOUSE_SSL', false),
    schema: normalizeEnvValue(env.WAREHOUSE_SCHEMA) ?? 'investment_governance',
    hrSchema: normalizeEnvValue(env.HR_SCHEMA) ?? 'hr',
    crmSchema: normalizeEnvValue(env.CRM_SCHEMA) ?? 'crm',
  };

  if (!warehouse.host || !warehouse.database || !warehouse.user) {
    logger.warn('[config] Warehouse configuration is incomplete. Check WAREHOUSE_HOST, WAREHOUSE_NAME, WAREHOUSE_USER.');
  }

  return Object.freeze({
    apiHost: normalizeEnvValue(env.API_HOST) ?? '127.0.0.1',
    apiPort: readInteger(env, 'API_PORT', 8767, 1),
    cacheDbPath: normalizeEnvValue(env.CACHE_DB_PATH) ?? 'cache.db',
    adminUsername: normalizeEnvValue(env.ADMIN_USERNAME),
    warehouse: Object.freeze(warehouse),
    timestampTtlSeconds: readInteger(env, 'TIMESTAMP_TTL_SECONDS', 60),
    refreshMaxRetries: readInteger(env, 'REFRESH_MAX_RETRIES', 2),
    refreshRetryDelayMs: readInteger(env, 'REFRESH_RETRY_DELAY_MS', 2000),
    cacheCheckCron: normalizeEnvValue(env.CACHE_CHECK_CRON) ?? '*/5 * * * *',
    cacheCheckTimezone: normalizeEnvValue(env.CACHE_CHECK_TZ) ?? 'UTC',
    syncConcurrency: readInteger(env, 'SYNC_CONCURRENCY', 1, 1),
    syncMaxPending: readInteger(env, 'SYNC_MAX_PENDING', 100, 1),
    employeeSearchTtlSeconds: readInteger(env, 'EMPLOYEE_SEARCH_TTL_SECONDS', 300),
  });
};
