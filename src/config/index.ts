/**
 * Stratum Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults.
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

const booleanFromEnv = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Configuration schema with validation
 */
export const configSchema = z.object({
  // Retry budgets
  maxAttemptsPerItem: z.coerce.number().int().min(1).max(20).default(3),
  /** Iteration cap across the whole run (0 = unlimited) */
  maxTotalAttempts: z.coerce.number().int().min(0).max(10000).default(0),
  backendMaxRetries: z.coerce.number().int().min(0).max(10).default(2),
  backendBackoffMs: z.coerce.number().int().min(0).max(60000).default(1000),

  // Deadlines
  backendTimeoutMs: z.coerce.number().int().min(1).max(3600000).default(120000),
  itemTimeoutMs: z.coerce.number().int().min(1).max(86400000).default(600000),
  resolutionTimeoutMs: z.coerce.number().int().min(1).max(3600000).default(300000),
  checkTimeoutMs: z.coerce.number().int().min(1).max(3600000).default(300000),

  // Evaluation thresholds
  satisfactionThreshold: z.coerce.number().min(0).max(1).default(0.8),
  driftTriggerThreshold: z.coerce.number().min(0).max(1).default(0.3),
  uncertaintyTriggerThreshold: z.coerce.number().min(0).max(1).default(0.3),
  coverageThreshold: z.coerce.number().min(0).max(1).default(0.7),
  maxAmbiguityScore: z.coerce.number().min(0).max(1).default(0.2),

  // Execution
  enableDecomposition: booleanFromEnv.default(true),
  maxTurns: z.coerce.number().int().min(1).max(500).default(50),
  workspaceDir: z.string().min(1).default(process.cwd()),
  model: z.string().min(1).optional(),
});

export type StratumConfig = z.infer<typeof configSchema>;
export type StratumConfigInput = z.input<typeof configSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StratumConfig {
  const raw = {
    maxAttemptsPerItem: env['STRATUM_MAX_ATTEMPTS_PER_ITEM'],
    maxTotalAttempts: env['STRATUM_MAX_TOTAL_ATTEMPTS'],
    backendMaxRetries: env['STRATUM_BACKEND_MAX_RETRIES'],
    backendBackoffMs: env['STRATUM_BACKEND_BACKOFF_MS'],
    backendTimeoutMs: env['STRATUM_BACKEND_TIMEOUT_MS'],
    itemTimeoutMs: env['STRATUM_ITEM_TIMEOUT_MS'],
    resolutionTimeoutMs: env['STRATUM_RESOLUTION_TIMEOUT_MS'],
    checkTimeoutMs: env['STRATUM_CHECK_TIMEOUT_MS'],
    satisfactionThreshold: env['STRATUM_SATISFACTION_THRESHOLD'],
    driftTriggerThreshold: env['STRATUM_DRIFT_TRIGGER_THRESHOLD'],
    uncertaintyTriggerThreshold: env['STRATUM_UNCERTAINTY_TRIGGER_THRESHOLD'],
    coverageThreshold: env['STRATUM_COVERAGE_THRESHOLD'],
    maxAmbiguityScore: env['STRATUM_MAX_AMBIGUITY_SCORE'],
    enableDecomposition: env['STRATUM_ENABLE_DECOMPOSITION'],
    maxTurns: env['STRATUM_MAX_TURNS'],
    workspaceDir: env['STRATUM_WORKSPACE_DIR'],
    model: env['STRATUM_MODEL'],
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new ConfigError(formatIssues(result.error));
  }

  log.debug(
    {
      maxAttemptsPerItem: result.data.maxAttemptsPerItem,
      backendMaxRetries: result.data.backendMaxRetries,
      enableDecomposition: result.data.enableDecomposition,
      workspaceDir: result.data.workspaceDir,
    },
    'Configuration loaded'
  );

  return result.data;
}

/**
 * Merge explicit overrides on top of a base configuration.
 */
export function resolveConfig(
  overrides: Partial<StratumConfigInput> = {},
  base: StratumConfig = getConfig()
): StratumConfig {
  const result = configSchema.safeParse({ ...base, ...overrides });
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

let envFileLoaded = false;

/**
 * Load a .env file into process.env once. Variables already set win.
 */
export function loadEnvFile(path?: string): void {
  if (envFileLoaded && path === undefined) {
    return;
  }
  dotenv.config(path === undefined ? {} : { path });
  envFileLoaded = true;
}

/**
 * Singleton configuration instance
 */
let configInstance: StratumConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): StratumConfig {
  if (!configInstance) {
    loadEnvFile();
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
