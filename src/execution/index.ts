export {
  WorkItemExecutor,
  createWorkItemExecutor,
  mergeSubTraces,
  type WorkItemExecutorOptions,
  type ExecuteOptions,
  type ExecutionOutcome,
} from './work-item-executor.js';
export {
  Decomposer,
  buildDecompositionPrompt,
  extractDecomposition,
  MIN_SUB_ITEMS,
  MAX_SUB_ITEMS,
  type DecompositionDecision,
  type DecomposerOptions,
} from './decomposer.js';
export { LateralPersona, selectLateralPersona, renderLateralStrategy } from './lateral.js';
