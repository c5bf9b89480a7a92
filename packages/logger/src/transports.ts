/**
 * @opsdeck/logger - Winston Transports
 * Console + optional rotating file transport
 */

import { format, transports } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { maskSensitiveFields } from './sanitizer.js';

// ============================================================================
// Configuration
// ============================================================================

const NODE_ENV = process.env.NODE_ENV || 'development';

// ============================================================================
// Custom Formats
// ============================================================================

// Mutates in place: the level and message symbols must survive.
const maskFormat = format((info) => {
  for (const [key, value] of Object.entries(maskSensitiveFields(info))) {
    if (key !== 'level') info[key] = value;
  }
  return info;
});

const contextFormat = format((info) => {
  return {
    ...info,
    service: 'opsdeck',
    env: NODE_ENV,
  };
});

export const jsonFormat: ReturnType<typeof format.combine> = format.combine(
  format.timestamp(),
  contextFormat(),
  maskFormat(),
  format.json(),
);

export const consoleFormat: ReturnType<typeof format.combine> = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  maskFormat(),
  format.colorize(),
  format.printf(({ timestamp, level, message, correlationId, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0
      ? ` ${JSON.stringify(meta)}`
      : '';
    const corrId = correlationId ? ` [${String(correlationId)}]` : '';
    return `${String(timestamp)} ${level}${corrId}: ${String(message)}${metaStr}`;
  }),
);

// ============================================================================
// Transport Factories
// ============================================================================

/** Console transport on stderr. Pretty format in development, JSON otherwise. */
export function createConsoleTransport() {
  return new transports.Console({
    format: NODE_ENV === 'development' ? consoleFormat : jsonFormat,
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  });
}

/** Combined file transport with daily rotation (14-day retention) */
export function createCombinedFileTransport(logDir: string) {
  return new DailyRotateFile({
    filename: `${logDir}/opsdeck-%DATE%.log`,
    datePattern: 'YYYY-MM-DD',
    maxFiles: '14d',
    maxSize: '100m',
    format: jsonFormat,
  });
}
