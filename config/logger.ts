/**
 * Structured logging built on Winston.
 *
 * - Colourised human console output outside production, JSON in production
 * - Silent under NODE_ENV=test
 * - Optional daily-rotated log files (combined + error) when a log directory is configured
 * - Module-scoped child loggers
 *
 * Errors and warnings go to stderr so that stdout only carries progress output.
 */
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import fs from 'node:fs';
import path from 'node:path';

const { combine, timestamp, printf, errors, json, metadata } = winston.format;

// ─── Constants ───────────────────────────────────────────────────────────────
const SERVICE_NAME = 'exam-codes';
const SERVICE_VERSION = process.env.npm_package_version || '0.1.0';
// Reassigned by configureLogger once the environment has been validated.
let nodeEnv = process.env.NODE_ENV || 'development';
const isTest = nodeEnv === 'test';
const isProd = nodeEnv === 'production';

// ─── Dev Console Format ──────────────────────────────────────────────────────
const levelColors: Record<string, string> = {
  error: '\x1b[31m',
  warn: '\x1b[33m',
  info: '\x1b[36m',
  http: '\x1b[35m',
  debug: '\x1b[90m',
};
const reset = '\x1b[0m';
const bold = '\x1b[1m';
const dim = '\x1b[2m';

const devFormat = printf((info) => {
  const level = String(info.level);
  const color = levelColors[level] || '';
  const tag = typeof info.module === 'string' ? `${dim}[${info.module}]${reset} ` : '';
  const ts = typeof info.timestamp === 'string' ? info.timestamp : '';

  const rawMeta: unknown = info.metadata;
  const meta: Record<string, unknown> = rawMeta && typeof rawMeta === 'object' ? { ...rawMeta } : {};
  for (const k of ['module', 'service']) {
    delete meta[k];
  }
  const extra = Object.keys(meta).length
    ? `\n  ${dim}${JSON.stringify(meta, null, 2).replace(/\n/g, '\n  ')}${reset}`
    : '';

  return `${dim}${ts}${reset} ${color}${bold}${level.toUpperCase().padEnd(5)}${reset} ${tag}${String(info.message)}${extra}`;
});

// ─── Structured Schema Enrichment ────────────────────────────────────────────
const structuredEnrich = winston.format((info) => {
  info.serviceName = SERVICE_NAME;
  info.environment = nodeEnv;
  info.version = SERVICE_VERSION;
  info.pid = process.pid;
  return info;
});

// ─── Production JSON Format ──────────────────────────────────────────────────
const prodJsonFormat = combine(
  timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'serviceName', 'environment', 'version', 'pid'] }),
  structuredEnrich(),
  json()
);

const devConsoleFormat = combine(
  timestamp({ format: 'HH:mm:ss.SSS' }),
  errors({ stack: true }),
  metadata({ fillExcept: ['message', 'level', 'timestamp', 'module'] }),
  devFormat
);

// ─── Logger Instance ─────────────────────────────────────────────────────────
export const consoleTransport = new winston.transports.Console({
  format: isProd ? prodJsonFormat : devConsoleFormat,
  stderrLevels: ['error', 'warn'],
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProd ? 'info' : 'debug'),
  silent: isTest,
  defaultMeta: { service: SERVICE_NAME },
  transports: [consoleTransport],
  exitOnError: false,
});

export default logger;

export interface LoggerSettings {
  nodeEnv: 'development' | 'test' | 'production';
  level: string;
  logDir?: string;
}

let fileTransportsDir: string | null = null;

/**
 * Applies validated configuration to the shared logger. File transports are
 * attached at most once per process.
 */
export function configureLogger(settings: LoggerSettings): void {
  nodeEnv = settings.nodeEnv;
  logger.level = settings.level;
  logger.silent = settings.nodeEnv === 'test';
  consoleTransport.format = settings.nodeEnv === 'production' ? prodJsonFormat : devConsoleFormat;

  if (!settings.logDir || fileTransportsDir) return;

  const dirname = path.resolve(settings.logDir);
  fs.mkdirSync(dirname, { recursive: true });
  logger.add(
    new DailyRotateFile({
      dirname,
      filename: 'combined-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxSize: '20m',
      maxFiles: '30d',
      format: prodJsonFormat,
    })
  );
  logger.add(
    new DailyRotateFile({
      dirname,
      filename: 'error-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      maxSize: '20m',
      maxFiles: '90d',
      format: prodJsonFormat,
    })
  );
  fileTransportsDir = dirname;
}

// ─── Module-scoped Child Loggers ─────────────────────────────────────────────

export const cliLog = logger.child({ module: 'cli' });
export const generatorLog = logger.child({ module: 'generator' });
export const filesLog = logger.child({ module: 'files' });
