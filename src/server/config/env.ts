/**
 * Environment Variable Schema and Validation
 *
 * Zod schema for every environment variable the server reads. `unified.ts`
 * turns the parsed result into the frozen `config` object.
 */

import { z } from 'zod';
import { isJestRuntime } from '../../shared/utils/envFlags';

/**
 * Node environment schema - supports development, staging, production, and test.
 */
export const NodeEnvSchema = z.enum(['development', 'staging', 'production', 'test']);
export type NodeEnv = z.infer<typeof NodeEnvSchema>;

/**
 * Log level schema (winston npm levels).
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Initial piece layout for newly created sessions.
 */
export const BoardLayoutSchema = z.enum(['empty', 'chess', 'checkers']);
export type BoardLayoutName = z.infer<typeof BoardLayoutSchema>;

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined ? defaultValue : val !== 'false' && val !== '0'));

/**
 * Complete environment variable schema with validation rules and defaults.
 *
 * Variables are organized by category:
 * - Environment & Server
 * - Logging
 * - CORS
 * - Board & Sessions
 * - Feature Flags
 */
export const EnvSchema = z.object({
  // ===================================================================
  // ENVIRONMENT & SERVER
  // ===================================================================

  /** Application environment mode */
  NODE_ENV: NodeEnvSchema.default('development'),

  /** HTTP and Socket.IO server port */
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),

  /** Server bind address */
  HOST: z.string().default('0.0.0.0'),

  /** Application version (injected by npm) */
  npm_package_version: z.string().optional(),

  // ===================================================================
  // LOGGING
  // ===================================================================

  /** Application log level */
  LOG_LEVEL: LogLevelSchema.default('info'),

  /** Log output format */
  LOG_FORMAT: LogFormatSchema.default('json'),

  /** Log file path (optional; no file transport when unset) */
  LOG_FILE: z.string().optional(),

  // ===================================================================
  // CORS
  // ===================================================================

  /** Allowed origin for Socket.IO connections */
  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // ===================================================================
  // BOARD & SESSIONS
  // ===================================================================

  /** Board width for new sessions */
  BOARD_WIDTH: z.coerce.number().int().min(1).max(64).default(8),

  /** Board height for new sessions */
  BOARD_HEIGHT: z.coerce.number().int().min(1).max(64).default(8),

  /** Initial layout for new sessions */
  BOARD_LAYOUT: BoardLayoutSchema.default('chess'),

  /** Internal retries after an execution failure before the command is rejected (0 or 1) */
  EXECUTION_RETRY_LIMIT: z.coerce.number().int().min(0).max(1).default(1),

  /** Committed commands retained per session for the commit log endpoint */
  COMMIT_LOG_MAX_ENTRIES: z.coerce.number().int().positive().default(500),

  // ===================================================================
  // FEATURE FLAGS
  // ===================================================================

  /** Enable Prometheus metrics endpoint */
  ENABLE_METRICS: booleanFlag(true),

  /** Enable health check endpoint */
  ENABLE_HEALTH_CHECKS: booleanFlag(true),
});

/**
 * Inferred type for raw environment variables.
 */
export type RawEnv = z.infer<typeof EnvSchema>;

/**
 * Result of environment validation.
 */
export interface EnvValidationResult {
  success: boolean;
  data?: RawEnv;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Parse and validate environment variables.
 *
 * @param env - Environment object to parse (defaults to process.env)
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): EnvValidationResult {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const errors =
      result.error.issues.length > 0
        ? result.error.issues.map((issue) => ({
            path: issue.path.join('.'),
            message: issue.message,
          }))
        : [{ path: '', message: result.error.message }];

    return {
      success: false,
      errors,
    };
  }

  return {
    success: true,
    data: result.data,
  };
}

/**
 * Load and validate environment variables, exiting on failure.
 *
 * This function should be called once at startup. If validation fails,
 * it prints the errors and exits the process.
 */
export function loadEnvOrExit(env: Record<string, string | undefined> = process.env): RawEnv {
  const result = parseEnv(env);

  if (!result.success || !result.data) {
    console.error('Invalid environment configuration:');
    for (const error of result.errors ?? []) {
      console.error(`  - ${error.path || 'root'}: ${error.message}`);
    }
    process.exit(1);
  }

  return result.data;
}

/**
 * Determine effective node environment.
 *
 * When running under Jest, always treats the environment as 'test'
 * regardless of NODE_ENV.
 */
export function getEffectiveNodeEnv(rawEnv: RawEnv): NodeEnv {
  return isJestRuntime() ? 'test' : rawEnv.NODE_ENV;
}

export function isProduction(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production';
}

export function isDevelopment(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'development';
}

export function isTest(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'test';
}

/**
 * Check if running in a production-like environment (production or staging).
 */
export function isProductionLike(nodeEnv: NodeEnv): boolean {
  return nodeEnv === 'production' || nodeEnv === 'staging';
}
