import { Registry, Counter, Histogram } from 'prom-client';

const register = new Registry();

export const requestCounter = new Counter({
  name: 'http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'path', 'status'],
  registers: [register],
});

export const responseTimeHistogram = new Histogram({
  name: 'http_response_time_seconds',
  help: 'HTTP response time in seconds',
  labelNames: ['method', 'path', 'status'],
  buckets: [0.01, 0.05, 0.1, 0.5, 1],
  registers: [register],
});

export const cacheRefreshCounter = new Counter({
  name: 'cache_refresh_total',
  help: 'Cache refresh runs by scope and outcome',
  labelNames: ['scope', 'outcome'],
  registers: [register],
});

export const cacheRefreshDuration = new Histogram({
  name: 'cache_refresh_duration_seconds',
  help: 'Duration of cache refresh runs in seconds',
  labelNames: ['scope'],
  buckets: [0.5, 1, 5, 15, 60],
  registers: [register],
});

export const remoteSyncCounter = new Counter({
  name: 'remote_sync_total',
  help: 'Background remote syncs by operation and outcome',
  labelNames: ['operation', 'outcome'],
  registers: [register],
});

export const stalenessCheckCounter = new Counter({
  name: 'cache_staleness_checks_total',
  help: 'Staleness checks by result',
  labelNames: ['result'],
  registers: [register],
});

export default register;
