import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import util from 'util';
import { errorMessage } from './errors';

const isTestEnv = process.env.NODE_ENV === 'test';

const rawLogLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
const levelMap: Record<string, string> = {
  trace: 'silly',
  silly: 'silly',
  debug: 'debug',
  verbose: 'verbose',
  info: 'info',
  warn: 'warn',
  warning: 'warn',
  error: 'error',
  fatal: 'error',
};
const mappedLogLevel = levelMap[rawLogLevel];
const logLevel = mappedLogLevel || 'info';

if (!mappedLogLevel) {
  console.warn(`Unknown LOG_LEVEL="${rawLogLevel}", defaulting to "${logLevel}".`);
}

const logsDir = process.env.LOGS_DIR || path.join(process.cwd(), 'logs');

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaKeys = Object.keys(meta);
    const metaSuffix =
      metaKeys.length > 0
        ? ` ${util.inspect(meta, { depth: 6, colors: false, breakLength: 120 })}`
        : '';
    return `${timestamp} [${level}]: ${message}${metaSuffix}`;
  })
);

function rotatingFile(name: string, maxFiles: string, level?: string): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(logsDir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    maxFiles,
    level,
    format: jsonFormat,
  });
}

function ensureLogsDir(): boolean {
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    return true;
  } catch (error) {
    console.warn('Failed to ensure logs directory exists:', errorMessage(error));
    return false;
  }
}

// Tests log to the console only, and only when LOG_LEVEL asks for it
const writeFiles = !isTestEnv && ensureLogsDir();

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

if (writeFiles) {
  transports.push(rotatingFile('app', '30d'));
  transports.push(rotatingFile('error', '90d', 'error'));
}

const logger = winston.createLogger({
  level: logLevel,
  transports,
  silent: isTestEnv && !process.env.LOG_LEVEL,
  exitOnError: false,
  exceptionHandlers: writeFiles
    ? [new winston.transports.Console({ format: consoleFormat }), rotatingFile('exceptions', '90d')]
    : undefined,
  rejectionHandlers: writeFiles
    ? [new winston.transports.Console({ format: consoleFormat }), rotatingFile('rejections', '90d')]
    : undefined,
});

export default logger;

export type LogMeta = Record<string, unknown>;

export interface LogContext extends LogMeta {
  step?: string;
  job_id?: string;
  url_key?: string;
  source_type?: string;
  duration_ms?: number;
}

export interface ContextLogger {
  trace(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  fatal(message: string, meta?: LogMeta): void;
  log(level: string, message: string, meta?: LogMeta): void;
}

export function createContextLogger(context: LogContext): ContextLogger {
  return {
    trace: (message, meta) => logger.log('silly', message, { ...context, ...meta }),
    debug: (message, meta) => logger.debug(message, { ...context, ...meta }),
    info: (message, meta) => logger.info(message, { ...context, ...meta }),
    warn: (message, meta) => logger.warn(message, { ...context, ...meta }),
    error: (message, meta) => logger.error(message, { ...context, ...meta }),
    fatal: (message, meta) => logger.log('error', message, { ...context, ...meta, fatal: true }),
    log: (level, message, meta) => logger.log(level, message, { ...context, ...meta }),
  };
}
