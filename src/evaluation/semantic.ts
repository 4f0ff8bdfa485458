/**
 * Stage 2: Semantic evaluation.
 *
 * One backend call scores the artifact against the item, the goal and the
 * constraints: satisfaction, criterion compliance, uncertainty and a
 * three-way drift breakdown.
 */

import { z } from 'zod';
import { callStructured } from '../agent/structured-call.js';
import type { RetryPolicyEngine } from '../agent/retry-policy.js';
import type { AgentError } from '../types/errors.js';
import type {
  AgentInvoker,
  DriftBreakdown,
  InvocationContext,
  SemanticResult,
  Specification,
} from '../types/index.js';
import { clamp01 } from '../utils/json.js';
import { createLogger } from '../utils/logger.js';
import { renderEvaluationContext, type EvaluationRequest } from './context.js';

const log = createLogger('semantic');

export const DRIFT_WEIGHTS = {
  goal: 0.5,
  constraints: 0.3,
  schema: 0.2,
} as const;

export const DEFAULT_SATISFACTION_THRESHOLD = 0.8;

const SEMANTIC_SYSTEM_PROMPT = `You are a rigorous evaluator. You judge whether an artifact satisfies a work item within the goal and constraints it belongs to.
Respond only with the JSON object requested. Do not use tools.`;

const semanticResponseSchema = z.object({
  score: z.number(),
  ac_compliance: z.boolean(),
  uncertainty: z.number(),
  goal_drift: z.number(),
  constraint_drift: z.number(),
  schema_drift: z.number(),
  schema_altered: z.boolean().default(false),
  reasoning: z.string().default(''),
});

export type SemanticResponse = z.infer<typeof semanticResponseSchema>;

export function computeDrift(goal: number, constraints: number, schema: number): DriftBreakdown {
  const g = clamp01(goal);
  const c = clamp01(constraints);
  const s = clamp01(schema);
  return {
    goal: g,
    constraints: c,
    schema: s,
    combined: DRIFT_WEIGHTS.goal * g + DRIFT_WEIGHTS.constraints * c + DRIFT_WEIGHTS.schema * s,
  };
}

/**
 * Turn a validated response into a result. Scores are clamped to [0, 1].
 */
export function toSemanticResult(
  response: SemanticResponse,
  satisfactionThreshold: number = DEFAULT_SATISFACTION_THRESHOLD
): SemanticResult {
  const satisfaction = clamp01(response.score);
  return {
    satisfaction,
    compliance: response.ac_compliance,
    uncertainty: clamp01(response.uncertainty),
    drift: computeDrift(response.goal_drift, response.constraint_drift, response.schema_drift),
    schemaAltered: response.schema_altered,
    reasoning: response.reasoning,
    passed: satisfaction >= satisfactionThreshold && response.ac_compliance,
  };
}

/**
 * Reasons a failed semantic result gives the next attempt.
 */
export function semanticFailureReasons(result: SemanticResult, satisfactionThreshold: number): string[] {
  const reasons: string[] = [];
  if (result.satisfaction < satisfactionThreshold) {
    reasons.push(
      `satisfaction ${result.satisfaction.toFixed(2)} below threshold ${satisfactionThreshold.toFixed(2)}`
    );
  }
  if (!result.compliance) {
    reasons.push('acceptance criterion not met');
  }
  if (result.reasoning) {
    reasons.push(result.reasoning);
  }
  return reasons;
}

export function buildSemanticPrompt(specification: Specification, request: EvaluationRequest): string {
  return `Evaluate the following artifact.

${renderEvaluationContext(specification, request)}

## Response Format
Reply with a JSON object only:
{
  "score": <0.0-1.0, how fully the work item is satisfied>,
  "ac_compliance": <true if the work item's acceptance criterion is met>,
  "uncertainty": <0.0-1.0, how unsure you are of this evaluation>,
  "goal_drift": <0.0-1.0, deviation from the original goal>,
  "constraint_drift": <0.0-1.0, deviation from the constraints>,
  "schema_drift": <0.0-1.0, deviation from the output schema>,
  "schema_altered": <true if the artifact changes the output schema>,
  "reasoning": "<short explanation>"
}`;
}

export interface SemanticEvaluatorOptions {
  invoker: AgentInvoker;
  retry: RetryPolicyEngine;
  specification: Specification;
  timeoutMs: number;
  satisfactionThreshold?: number;
}

export type SemanticOutcome =
  | { success: true; result: SemanticResult }
  | { success: false; error: AgentError };

export class SemanticEvaluator {
  private readonly options: SemanticEvaluatorOptions;
  readonly satisfactionThreshold: number;

  constructor(options: SemanticEvaluatorOptions) {
    this.options = options;
    this.satisfactionThreshold = options.satisfactionThreshold ?? DEFAULT_SATISFACTION_THRESHOLD;
  }

  async evaluate(request: EvaluationRequest): Promise<SemanticOutcome> {
    const context: InvocationContext = {
      systemPrompt: SEMANTIC_SYSTEM_PROMPT,
      timeoutMs: this.options.timeoutMs,
      maxTurns: 1,
    };
    if (request.signal) {
      context.signal = request.signal;
    }

    const response = await callStructured({
      label: 'semantic-evaluation',
      invoker: this.options.invoker,
      retry: this.options.retry,
      prompt: buildSemanticPrompt(this.options.specification, request),
      schema: semanticResponseSchema,
      context,
    });

    if (!response.success) {
      log.warn(
        { itemIndex: request.item.index, attempt: request.attempt, kind: response.error.kind },
        'Semantic evaluation unavailable'
      );
      return { success: false, error: response.error };
    }

    const result = toSemanticResult(response.value, this.satisfactionThreshold);
    log.info(
      {
        itemIndex: request.item.index,
        attempt: request.attempt,
        satisfaction: result.satisfaction,
        compliance: result.compliance,
        drift: result.drift.combined,
        uncertainty: result.uncertainty,
        passed: result.passed,
      },
      'Semantic evaluation complete'
    );
    return { success: true, result };
  }
}
