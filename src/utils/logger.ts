import winston from 'winston';

const logLevels: winston.config.AbstractConfigSetLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const LOG_LEVEL_VALUES = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = (typeof LOG_LEVEL_VALUES)[number];

const isLogLevel = (value: string): value is LogLevel => (LOG_LEVEL_VALUES as readonly string[]).includes(value);

const envLevel = (process.env.LOG_LEVEL ?? '').toLowerCase();
const consoleLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

const isTestRun = process.env.NODE_ENV === 'test';
const writeFiles = !isTestRun && (process.env.LOG_TO_FILE ?? 'true').toLowerCase() !== 'false';

const transports: winston.transport[] = [new winston.transports.Console({ level: consoleLevel })];
if (writeFiles) {
  transports.push(
    new winston.transports.File({ filename: 'error.log', level: 'error' }),
    new winston.transports.File({ filename: 'combined.log' }),
  );
}

const logger = winston.createLogger({
  levels: logLevels,
  silent: isTestRun,
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} ${level}: ${message}${extra}`;
    }),
  ),
  transports,
});

export default logger;
