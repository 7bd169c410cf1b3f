/**
 * Cloudreve CLI - Logging
 *
 * Winston-based logging with a console transport and daily-rotated log files.
 * Request bodies are logged at debug level, so every line passes through
 * {@link redactSecrets} before any transport sees it.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { join } from 'path';
import { getLogDir } from './paths.js';

// ============================================================================
// Configuration
// ============================================================================

const LOG_DIR = getLogDir();
const LOG_FILE_PREFIX = 'cloudreve-cli';
const DEFAULT_CONSOLE_LEVEL = 'warn';

/**
 * Console level named by `CLOUDREVE_LOG_LEVEL`; unknown names fall back to
 * `warn`.
 */
export function resolveConsoleLevel(raw: string | undefined): string {
  const level = raw?.trim().toLowerCase();
  return level && Object.hasOwn(winston.config.npm.levels, level) ? level : DEFAULT_CONSOLE_LEVEL;
}

// ============================================================================
// Redaction
// ============================================================================

const REDACTED = '[redacted]';

const SECRET_PATTERNS: [RegExp, string][] = [
  // JSON fields of login, 2FA and token refresh bodies
  [/"(password|Password|access_token|refresh_token)":"(?:[^"\\]|\\.)*"/g, `"$1":"${REDACTED}"`],
  [/\bBearer\s+[^\s"]+/g, `Bearer ${REDACTED}`],
  [/\b(cloudreve-session=)[^;\s"]+/g, `$1${REDACTED}`],
  // Share passwords travel in the query string
  [/([?&]password=)[^&\s"]+/g, `$1${REDACTED}`],
];

/**
 * Mask credentials in a log line.
 *
 * @example
 * redactSecrets('POST /session/token body={"email":"a@b.c","password":"hunter2"}');
 * // 'POST /session/token body={"email":"a@b.c","password":"[redacted]"}'
 */
export function redactSecrets(text: string): string {
  return SECRET_PATTERNS.reduce((line, [pattern, replacement]) => line.replace(pattern, replacement), text);
}

const redact = winston.format((info) => {
  if (typeof info.message === 'string') {
    info.message = redactSecrets(info.message);
  }
  return info;
});

// ============================================================================
// Log Format
// ============================================================================

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}] ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}] ${message}`;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp }) => `${timestamp} ${level}: ${message}`)
);

// ============================================================================
// Transports
// ============================================================================

// CLI output goes to stdout; log lines go to stderr so `--json` stays parseable
const consoleTransport = new winston.transports.Console({
  format: consoleFormat,
  level: resolveConsoleLevel(process.env.CLOUDREVE_LOG_LEVEL),
  stderrLevels: Object.keys(winston.config.npm.levels),
});

// Rotation runs on local dates; see getLogFilePath
const fileTransport = new DailyRotateFile({
  dirname: LOG_DIR,
  filename: `${LOG_FILE_PREFIX}-%DATE%.log`,
  datePattern: 'YYYY-MM-DD',
  maxSize: '20m',
  maxFiles: '14d',
  format: logFormat,
  level: 'debug',
});

const errorFileTransport = new DailyRotateFile({
  dirname: LOG_DIR,
  filename: `${LOG_FILE_PREFIX}-error-%DATE%.log`,
  datePattern: 'YYYY-MM-DD',
  maxSize: '20m',
  maxFiles: '30d',
  format: logFormat,
  level: 'error',
});

// ============================================================================
// Logger Instance
// ============================================================================

export const logger = winston.createLogger({
  level: 'debug',
  format: redact(),
  transports: [consoleTransport, fileTransport, errorFileTransport],
});

// ============================================================================
// Log Level Control
// ============================================================================

let debugEnabled = false;

/**
 * Enable or disable debug logging to console. Turning it off restores the
 * level from `CLOUDREVE_LOG_LEVEL`.
 */
export function setDebugMode(enabled: boolean): void {
  debugEnabled = enabled;
  consoleTransport.level = enabled ? 'debug' : resolveConsoleLevel(process.env.CLOUDREVE_LOG_LEVEL);
  logger.debug(`Debug mode ${enabled ? 'enabled' : 'disabled'}`);
}

export function isDebugMode(): boolean {
  return debugEnabled;
}

export function getConsoleLevel(): string {
  return consoleTransport.level ?? DEFAULT_CONSOLE_LEVEL;
}

/**
 * Path of the debug log for the given day (today by default), named with the
 * local date the rotation uses.
 */
export function getLogFilePath(date: Date = new Date()): string {
  const day = [
    date.getFullYear(),
    String(date.getMonth() + 1).padStart(2, '0'),
    String(date.getDate()).padStart(2, '0'),
  ].join('-');
  return join(LOG_DIR, `${LOG_FILE_PREFIX}-${day}.log`);
}

export default logger;
