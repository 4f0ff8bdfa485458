export {
  Orchestrator,
  createOrchestrator,
  type OrchestratorOptions,
  type RunOptions,
} from './orchestrator.js';
export type { ItemResult, RunCounts, RunResult } from './types.js';
