import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config';
import { isJestRuntime } from '../../shared/utils/envFlags';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

/**
 * Command context stored in AsyncLocalStorage while a command moves through
 * the pipeline, so every log line it produces carries the same correlation
 * fields.
 */
export interface CommandLogContext {
  sessionId: string;
  connectionId?: string;
  clientId?: string;
  pieceId?: string;
  kind?: string;
  timestamp?: number;
}

// ============================================================================
// Command Context (AsyncLocalStorage)
// ============================================================================

export const commandContextStorage = new AsyncLocalStorage<CommandLogContext>();

export const getCommandContext = (): CommandLogContext | undefined => {
  return commandContextStorage.getStore();
};

/**
 * Run a function within a command context. All logs and async operations
 * within the callback see the context.
 */
export const runWithCommandContext = <T>(context: CommandLogContext, fn: () => T): T => {
  return commandContextStorage.run(context, fn);
};

// ============================================================================
// Sensitive Data Masking
// ============================================================================

/**
 * Patterns for detecting sensitive keys in objects (case-insensitive).
 */
const SENSITIVE_KEY_PATTERNS = [
  /password/i,
  /secret/i,
  /token/i,
  /api[_-]?key/i,
  /authorization/i,
  /credential/i,
  /private[_-]?key/i,
  /cookie/i,
];

const isSensitiveKey = (key: string): boolean => {
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(key));
};

/**
 * Shows the first 4 characters of longer values, nothing of short ones.
 */
const redactSensitiveString = (value: string): string => {
  if (value.length <= 8) {
    return '[REDACTED]';
  }
  return `${value.slice(0, 4)}...[REDACTED]`;
};

const maskValue = (key: string, value: unknown, depth: number): unknown => {
  if (!isSensitiveKey(key)) {
    return maskSensitiveData(value, depth);
  }
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return redactSensitiveString(value);
  }
  if (typeof value === 'object') {
    return maskSensitiveData(value, depth);
  }
  return '[REDACTED]';
};

/**
 * Recursively mask sensitive values in an object.
 * Returns a new object with sensitive values redacted.
 *
 * @param maxDepth - recursion limit (default: 5)
 */
export const maskSensitiveData = (obj: unknown, maxDepth: number = 5): unknown => {
  if (maxDepth <= 0) {
    return '[MAX_DEPTH_EXCEEDED]';
  }

  if (obj === null || obj === undefined || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => maskSensitiveData(item, maxDepth - 1));
  }

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    result[key] = maskValue(key, value, maxDepth - 1);
  }
  return result;
};

// ============================================================================
// Winston Logger Configuration
// ============================================================================

const SERVICE_NAME = 'board-command-sync';

/**
 * Adds the current command context from AsyncLocalStorage to log entries.
 * Explicit metadata on the log call wins over the context.
 */
const addCommandContext = winston.format((info) => {
  const context = getCommandContext();
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value !== undefined && info[key] === undefined) {
        info[key] = value;
      }
    }
  }
  return info;
});

/**
 * Structures log metadata consistently and masks sensitive keys.
 */
const structuredFormat = winston.format((info) => {
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  for (const [key, value] of Object.entries(info)) {
    if (key !== 'level' && key !== 'message' && key !== 'timestamp') {
      info[key] = maskValue(key, value, 5);
    }
  }
  return info;
});

/**
 * Format for structured JSON logging (production and file transports).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  addCommandContext(),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output (development).
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  addCommandContext(),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, sessionId, service, environment, ...meta }) => {
    const sessionStr = typeof sessionId === 'string' ? ` [${sessionId}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${sessionStr}: ${String(message)}${metaStr}`;
  })
);

const logger = winston.createLogger({
  level: config.logging.level,
  defaultMeta: {
    service: SERVICE_NAME,
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      silent: isJestRuntime(),
    }),
  ],
});

const configuredLogFile = config.logging.file;
if (configuredLogFile) {
  const logPath = path.resolve(configuredLogFile);
  const logDir = path.dirname(logPath);
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  logger.add(
    new winston.transports.File({
      filename: logPath,
      format: jsonFormat,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

// ============================================================================
// Exports
// ============================================================================

export { logger };
