export {
  EvaluationPipeline,
  createEvaluationPipeline,
  mechanicalFailureReasons,
  consensusReasons,
  SEMANTIC_UNAVAILABLE,
  type Evaluator,
  type EvaluationCallbacks,
  type EvaluationPipelineOptions,
} from './pipeline.js';
export { renderEvaluationContext, renderArtifact, type EvaluationRequest } from './context.js';
export {
  MechanicalEvaluator,
  ShellCheck,
  parseCoverage,
  parseCheckProfile,
  loadCheckProfile,
  type MechanicalCheck,
  type CheckRunContext,
  type ShellCheckDefinition,
  type MechanicalEvaluatorOptions,
} from './mechanical.js';
export {
  SemanticEvaluator,
  buildSemanticPrompt,
  computeDrift,
  toSemanticResult,
  semanticFailureReasons,
  DRIFT_WEIGHTS,
  DEFAULT_SATISFACTION_THRESHOLD,
  type SemanticEvaluatorOptions,
  type SemanticOutcome,
  type SemanticResponse,
} from './semantic.js';
export { evaluateTriggers, DEFAULT_TRIGGER_THRESHOLDS, type TriggerThresholds } from './trigger.js';
