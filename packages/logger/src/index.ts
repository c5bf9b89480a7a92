/**
 * @opsdeck/logger - Structured Logging
 *
 * Features:
 * - Structured JSON logging with Winston
 * - Console output with colors (dev) or JSON
 * - Optional daily-rotated file output (LOG_DIR)
 * - Correlation IDs per command invocation
 * - Sensitive data masking
 */

import { createLogger, type Logger } from 'winston';
import { randomBytes } from 'node:crypto';
import {
  createConsoleTransport,
  createCombinedFileTransport,
  jsonFormat,
} from './transports.js';

export { SENSITIVE_KEYS, maskSensitiveData, maskSensitiveFields, maskSensitiveText } from './sanitizer.js';

// ============================================================================
// Configuration
// ============================================================================

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_DIR = process.env.LOG_DIR;

// ============================================================================
// Logger Instance (singleton)
// ============================================================================

const logger: Logger = createLogger({
  level: LOG_LEVEL,
  format: jsonFormat,
  defaultMeta: { service: 'opsdeck' },
  transports: [createConsoleTransport()],
});

if (LOG_DIR) {
  logger.add(createCombinedFileTransport(LOG_DIR));
}

// ============================================================================
// Logger Contract
// ============================================================================

/** Minimal logger surface accepted by services; winston loggers satisfy it. */
export interface LoggerLike {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// ============================================================================
// Correlation ID
// ============================================================================

export function generateCorrelationId(): string {
  return randomBytes(8).toString('hex');
}

// ============================================================================
// Contextual Logger
// ============================================================================

export interface CommandContext {
  correlationId: string;
  command?: string;
  appName?: string;
  platform?: string;
}

type Level = 'info' | 'error' | 'warn' | 'debug';

export class ContextualLogger implements LoggerLike {
  private context: CommandContext;

  constructor(context: CommandContext) {
    this.context = context;
  }

  private log(level: Level, message: string, meta?: Record<string, unknown>) {
    logger.log(level, message, { ...this.context, ...meta });
  }

  info(message: string, meta?: Record<string, unknown>) {
    this.log('info', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>) {
    this.log('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>) {
    this.log('warn', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>) {
    this.log('debug', message, meta);
  }

  child(extra: Partial<CommandContext>): ContextualLogger {
    return new ContextualLogger({ ...this.context, ...extra });
  }
}

export function createContextualLogger(context: CommandContext): ContextualLogger {
  return new ContextualLogger(context);
}

// ============================================================================
// Export
// ============================================================================

export default logger;
export { logger };
