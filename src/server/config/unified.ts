/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all server code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { BoardLayoutSchema, LogFormatSchema, LogLevelSchema, NodeEnvSchema, getEffectiveNodeEnv, loadEnvOrExit } from './env';

// Load .env into process.env before we read anything from it.
// Skipped in test mode so .env cannot override test-specific env vars.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);

// Under Jest the effective nodeEnv is "test" even if a .env file said otherwise.
const nodeEnv = getEffectiveNodeEnv(env);

/**
 * Application configuration schema.
 */
const ConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  isProduction: z.boolean(),
  isDevelopment: z.boolean(),
  isTest: z.boolean(),
  app: z.object({
    name: z.string().min(1),
    version: z.string().min(1),
  }),
  server: z.object({
    port: z.number().int().positive(),
    host: z.string().min(1),
    websocketOrigin: z.string().min(1),
  }),
  logging: z.object({
    level: LogLevelSchema,
    format: LogFormatSchema,
    file: z.string().optional(),
  }),
  board: z.object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    layout: BoardLayoutSchema,
  }),
  execution: z.object({
    /** Internal retries after ExecutionError before the command is rejected */
    retryLimit: z.number().int().min(0).max(1),
  }),
  sessions: z.object({
    commitLogMaxEntries: z.number().int().positive(),
  }),
  metrics: z.object({
    enabled: z.boolean(),
  }),
  healthChecks: z.object({
    enabled: z.boolean(),
  }),
});

/**
 * Application configuration type inferred from the schema.
 */
export type AppConfig = z.infer<typeof ConfigSchema>;

const preliminaryConfig: AppConfig = {
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
  app: {
    name: 'board-command-sync',
    version: env.npm_package_version?.trim() || '0.1.0',
  },
  server: {
    port: env.PORT,
    host: env.HOST,
    websocketOrigin: env.CORS_ORIGIN.trim() || 'http://localhost:5173',
  },
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  board: {
    width: env.BOARD_WIDTH,
    height: env.BOARD_HEIGHT,
    layout: env.BOARD_LAYOUT,
  },
  execution: {
    retryLimit: env.EXECUTION_RETRY_LIMIT,
  },
  sessions: {
    commitLogMaxEntries: env.COMMIT_LOG_MAX_ENTRIES,
  },
  metrics: {
    enabled: env.ENABLE_METRICS,
  },
  healthChecks: {
    enabled: env.ENABLE_HEALTH_CHECKS,
  },
};

// Parse and freeze the final config so downstream code gets a fully
// validated, immutable view.
export const config: AppConfig = Object.freeze(ConfigSchema.parse(preliminaryConfig));
