/**
 * Stratum Library API
 *
 * Parallel execution and verification engine for agent-driven work items.
 */

// Types
export * from './types/index.js';

// Orchestrator (main entry point)
export {
  Orchestrator,
  createOrchestrator,
  type OrchestratorOptions,
  type RunOptions,
  type ItemResult,
  type RunCounts,
  type RunResult,
} from './orchestrator/index.js';

// Configuration
export {
  configSchema,
  loadConfig,
  loadEnvFile,
  resolveConfig,
  getConfig,
  resetConfig,
  type StratumConfig,
  type StratumConfigInput,
} from './config/index.js';

// Specification
export { createSpecification, parseSpecification, loadSpecification } from './specification/index.js';

// Components
export * from './agent/index.js';
export * from './dependency/index.js';
export * from './execution/index.js';
export * from './coordination/index.js';
export * from './evaluation/index.js';
export * from './consensus/index.js';
export * from './events/index.js';

// Utilities
export { createLogger, logger, type Logger } from './utils/index.js';
