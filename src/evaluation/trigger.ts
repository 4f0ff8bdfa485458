/**
 * Consensus trigger matrix.
 *
 * Decides whether an attempt escalates to stage 3. Pure and synchronous.
 */

import {
  TriggerCondition,
  type TriggerContext,
  type TriggerResult,
} from '../types/evaluation.js';

export interface TriggerThresholds {
  /** Combined drift must exceed this to fire */
  drift: number;
  /** Stage 2 uncertainty must exceed this to fire */
  uncertainty: number;
}

export const DEFAULT_TRIGGER_THRESHOLDS: TriggerThresholds = {
  drift: 0.3,
  uncertainty: 0.3,
};

/**
 * Check every condition in priority order and return all that fired.
 */
export function evaluateTriggers(
  context: TriggerContext,
  thresholds: TriggerThresholds = DEFAULT_TRIGGER_THRESHOLDS
): TriggerResult {
  const conditions: TriggerCondition[] = [];
  const reasons: string[] = [];

  if (context.finalDeliverable) {
    conditions.push(TriggerCondition.FINAL_DELIVERABLE);
    reasons.push('final deliverable');
  }
  if (context.schemaAltered) {
    conditions.push(TriggerCondition.SCHEMA_ALTERED);
    reasons.push('output schema altered');
  }
  if (context.drift > thresholds.drift) {
    conditions.push(TriggerCondition.HIGH_DRIFT);
    reasons.push(`drift ${context.drift.toFixed(2)} exceeds ${thresholds.drift}`);
  }
  if (context.uncertainty > thresholds.uncertainty) {
    conditions.push(TriggerCondition.HIGH_UNCERTAINTY);
    reasons.push(`uncertainty ${context.uncertainty.toFixed(2)} exceeds ${thresholds.uncertainty}`);
  }
  if (context.lateralStrategyAdopted) {
    conditions.push(TriggerCondition.LATERAL_STRATEGY);
    reasons.push('lateral strategy adopted');
  }
  if (context.affectsOntology) {
    conditions.push(TriggerCondition.ONTOLOGY_AFFECTING);
    reasons.push('item affects the ontology');
  }

  return { fired: conditions.length > 0, conditions, reasons };
}
