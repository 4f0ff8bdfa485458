/**
 * Evaluation Pipeline
 *
 * Three escalating stages per attempt:
 * 1. Mechanical checks. A failure sends the item back for another attempt.
 * 2. Semantic evaluation. Always runs once stage 1 passes.
 * 3. Consensus. Only when the trigger matrix fires and stage 2 found the
 *    acceptance criterion met; its decision replaces the stage 2 result.
 */

import { CONSENSUS_UNAVAILABLE } from '../consensus/consensus-engine.js';
import type { ConsensusEngine } from '../consensus/consensus-engine.js';
import {
  EvaluationStage,
  VerdictOutcome,
  VoteDecision,
  type ConsensusResult,
  type EvaluationVerdict,
  type MechanicalResult,
  type SemanticResult,
  type TriggerResult,
  type Vote,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import type { EvaluationRequest } from './context.js';
import type { MechanicalEvaluator } from './mechanical.js';
import { semanticFailureReasons, type SemanticEvaluator } from './semantic.js';
import { DEFAULT_TRIGGER_THRESHOLDS, evaluateTriggers, type TriggerThresholds } from './trigger.js';

const log = createLogger('evaluation-pipeline');

export const SEMANTIC_UNAVAILABLE = 'semantic evaluation unavailable';

export interface EvaluationCallbacks {
  onStageComplete?: (stage: EvaluationStage, passed: boolean, reasons: readonly string[]) => void;
  onVote?: (vote: Vote) => void;
}

/**
 * Anything that can score an artifact and return a verdict.
 */
export interface Evaluator {
  evaluate(request: EvaluationRequest, callbacks?: EvaluationCallbacks): Promise<EvaluationVerdict>;
}

export interface EvaluationPipelineOptions {
  mechanical: MechanicalEvaluator;
  semantic: SemanticEvaluator;
  consensus: ConsensusEngine;
  triggerThresholds?: TriggerThresholds;
}

export function mechanicalFailureReasons(result: MechanicalResult): string[] {
  return result.checks.filter((c) => !c.passed).map((c) => `${c.name}: ${c.message}`);
}

export function consensusReasons(result: ConsensusResult): string[] {
  if (result.approved) {
    return [];
  }
  if (result.rationale === CONSENSUS_UNAVAILABLE) {
    return [CONSENSUS_UNAVAILABLE];
  }
  const label = result.decision === VoteDecision.CONDITIONAL ? 'consensus conditional' : 'consensus rejected';
  return [
    result.rationale ? `${label}: ${result.rationale}` : label,
    ...result.requiredChanges.map((change) => `required change: ${change}`),
  ];
}

export class EvaluationPipeline implements Evaluator {
  private readonly options: EvaluationPipelineOptions;
  private readonly thresholds: TriggerThresholds;

  constructor(options: EvaluationPipelineOptions) {
    this.options = options;
    this.thresholds = options.triggerThresholds ?? DEFAULT_TRIGGER_THRESHOLDS;
  }

  async evaluate(request: EvaluationRequest, callbacks: EvaluationCallbacks = {}): Promise<EvaluationVerdict> {
    const base = { itemIndex: request.item.index, attempt: request.attempt };

    // Stage 1
    const mechanical = await this.options.mechanical.evaluate(request.signal);
    const mechanicalReasons = mechanicalFailureReasons(mechanical);
    callbacks.onStageComplete?.(EvaluationStage.MECHANICAL, mechanical.passed, mechanicalReasons);

    if (!mechanical.passed) {
      const outcome = request.attempt >= request.maxAttempts ? VerdictOutcome.FAILED : VerdictOutcome.RETRY;
      log.info({ ...base, outcome, failedChecks: mechanicalReasons.length }, 'Mechanical checks failed');
      return {
        ...base,
        highestStage: EvaluationStage.MECHANICAL,
        approved: false,
        outcome,
        reasons: mechanicalReasons,
        mechanical,
        semantic: null,
        triggers: null,
        consensus: null,
        reducedConfidence: false,
      };
    }

    // Stage 2
    const semanticOutcome = await this.options.semantic.evaluate(request);
    if (!semanticOutcome.success) {
      callbacks.onStageComplete?.(EvaluationStage.SEMANTIC, false, [SEMANTIC_UNAVAILABLE]);
      return {
        ...base,
        highestStage: EvaluationStage.SEMANTIC,
        approved: false,
        outcome: VerdictOutcome.REJECTED,
        reasons: [SEMANTIC_UNAVAILABLE],
        mechanical,
        semantic: null,
        triggers: null,
        consensus: null,
        reducedConfidence: false,
      };
    }

    const semantic = semanticOutcome.result;
    const semanticReasons = semantic.passed
      ? []
      : semanticFailureReasons(semantic, this.options.semantic.satisfactionThreshold);
    callbacks.onStageComplete?.(EvaluationStage.SEMANTIC, semantic.passed, semanticReasons);

    // A missed acceptance criterion is final; consensus cannot overturn it.
    if (!semantic.compliance) {
      log.info({ ...base, satisfaction: semantic.satisfaction }, 'Acceptance criterion not met');
      return {
        ...base,
        highestStage: EvaluationStage.SEMANTIC,
        approved: false,
        outcome: VerdictOutcome.REJECTED,
        reasons: semanticReasons,
        mechanical,
        semantic,
        triggers: null,
        consensus: null,
        reducedConfidence: false,
      };
    }

    const triggers = this.checkTriggers(request, semantic);
    if (!triggers.fired) {
      return {
        ...base,
        highestStage: EvaluationStage.SEMANTIC,
        approved: semantic.passed,
        outcome: semantic.passed ? VerdictOutcome.APPROVED : VerdictOutcome.REJECTED,
        reasons: semanticReasons,
        mechanical,
        semantic,
        triggers,
        consensus: null,
        reducedConfidence: false,
      };
    }

    // Stage 3
    log.info({ ...base, conditions: triggers.conditions }, 'Escalating to consensus');
    const consensus = await this.options.consensus.deliberate(request, triggers, callbacks.onVote);
    const stageReasons = consensusReasons(consensus);
    callbacks.onStageComplete?.(EvaluationStage.CONSENSUS, consensus.approved, stageReasons);

    return {
      ...base,
      highestStage: EvaluationStage.CONSENSUS,
      approved: consensus.approved,
      outcome: consensus.approved ? VerdictOutcome.APPROVED : VerdictOutcome.REJECTED,
      reasons: consensus.approved ? [] : [...semanticReasons, ...stageReasons],
      mechanical,
      semantic,
      triggers,
      consensus,
      reducedConfidence: consensus.reducedConfidence,
    };
  }

  private checkTriggers(request: EvaluationRequest, semantic: SemanticResult): TriggerResult {
    return evaluateTriggers(
      {
        finalDeliverable: request.item.finalDeliverable,
        schemaAltered: semantic.schemaAltered,
        drift: semantic.drift.combined,
        uncertainty: semantic.uncertainty,
        lateralStrategyAdopted: request.lateralStrategyAdopted,
        affectsOntology: request.item.affectsOntology,
      },
      this.thresholds
    );
  }
}

export function createEvaluationPipeline(options: EvaluationPipelineOptions): EvaluationPipeline {
  return new EvaluationPipeline(options);
}
