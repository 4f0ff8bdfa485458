/**
 * Evaluation Pipeline Types
 *
 * Results of the three escalating stages and the verdict they produce.
 */

export const EvaluationStage = {
  MECHANICAL: 1,
  SEMANTIC: 2,
  CONSENSUS: 3,
} as const;

export type EvaluationStage = (typeof EvaluationStage)[keyof typeof EvaluationStage];

export const CheckKind = {
  LINT: 'lint',
  BUILD: 'build',
  TEST: 'test',
  STATIC: 'static',
  COVERAGE: 'coverage',
  CUSTOM: 'custom',
} as const;

export type CheckKind = (typeof CheckKind)[keyof typeof CheckKind];

export interface CheckResult {
  readonly name: string;
  readonly kind: CheckKind;
  readonly passed: boolean;
  readonly message: string;
  readonly durationMs: number;
}

export interface MechanicalResult {
  readonly passed: boolean;
  readonly checks: readonly CheckResult[];
}

export interface DriftBreakdown {
  readonly goal: number;
  readonly constraints: number;
  readonly schema: number;
  /** 0.5 * goal + 0.3 * constraints + 0.2 * schema */
  readonly combined: number;
}

export interface SemanticResult {
  readonly satisfaction: number;
  readonly compliance: boolean;
  readonly uncertainty: number;
  readonly drift: DriftBreakdown;
  readonly schemaAltered: boolean;
  readonly reasoning: string;
  readonly passed: boolean;
}

export const TriggerCondition = {
  FINAL_DELIVERABLE: 'final_deliverable',
  SCHEMA_ALTERED: 'schema_altered',
  HIGH_DRIFT: 'high_drift',
  HIGH_UNCERTAINTY: 'high_uncertainty',
  LATERAL_STRATEGY: 'lateral_strategy',
  ONTOLOGY_AFFECTING: 'ontology_affecting',
} as const;

export type TriggerCondition = (typeof TriggerCondition)[keyof typeof TriggerCondition];

export interface TriggerContext {
  readonly finalDeliverable: boolean;
  readonly schemaAltered: boolean;
  readonly drift: number;
  readonly uncertainty: number;
  readonly lateralStrategyAdopted: boolean;
  readonly affectsOntology: boolean;
}

export interface TriggerResult {
  readonly fired: boolean;
  /** Conditions that fired, in priority order */
  readonly conditions: readonly TriggerCondition[];
  readonly reasons: readonly string[];
}

export const VoterRole = {
  ADVOCATE: 'advocate',
  CRITIC: 'critic',
  JUDGE: 'judge',
} as const;

export type VoterRole = (typeof VoterRole)[keyof typeof VoterRole];

export const VoteDecision = {
  APPROVED: 'approved',
  REJECTED: 'rejected',
  CONDITIONAL: 'conditional',
} as const;

export type VoteDecision = (typeof VoteDecision)[keyof typeof VoteDecision];

export interface Vote {
  readonly role: VoterRole;
  readonly decision: VoteDecision;
  readonly confidence: number;
  readonly rationale: string;
  readonly requiredChanges: readonly string[];
  /** Critic's view on whether the artifact addresses the root requirement */
  readonly isRootSolution: boolean | null;
}

export interface ConsensusResult {
  readonly approved: boolean;
  readonly decision: VoteDecision;
  readonly votes: readonly Vote[];
  readonly reducedConfidence: boolean;
  readonly missingRoles: readonly VoterRole[];
  readonly rationale: string;
  readonly requiredChanges: readonly string[];
}

export const VerdictOutcome = {
  APPROVED: 'approved',
  /** Mechanical checks failed; attempt again with the failures as feedback */
  RETRY: 'retry',
  /** Semantic or consensus rejection */
  REJECTED: 'rejected',
  /** Mechanical failure with the retry budget spent */
  FAILED: 'failed',
} as const;

export type VerdictOutcome = (typeof VerdictOutcome)[keyof typeof VerdictOutcome];

export interface EvaluationVerdict {
  readonly itemIndex: number;
  readonly attempt: number;
  readonly highestStage: EvaluationStage;
  readonly approved: boolean;
  readonly outcome: VerdictOutcome;
  readonly reasons: readonly string[];
  readonly mechanical: MechanicalResult;
  readonly semantic: SemanticResult | null;
  readonly triggers: TriggerResult | null;
  readonly consensus: ConsensusResult | null;
  readonly reducedConfidence: boolean;
}
