/**
 * Consensus Engine
 *
 * Stage 3 deliberation. An advocate and a critic review the artifact
 * concurrently; a judge then reads both positions and decides. A missing
 * advocate or critic position lowers confidence but does not stop the
 * judge.
 */

import { z } from 'zod';
import { callStructured } from '../agent/structured-call.js';
import type { RetryPolicyEngine } from '../agent/retry-policy.js';
import { renderEvaluationContext, type EvaluationRequest } from '../evaluation/context.js';
import type { AgentError } from '../types/errors.js';
import {
  VoteDecision,
  VoterRole,
  type AgentInvoker,
  type ConsensusResult,
  type InvocationContext,
  type Specification,
  type TriggerResult,
  type Vote,
} from '../types/index.js';
import { clamp01 } from '../utils/json.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('consensus');

export const CONSENSUS_UNAVAILABLE = 'consensus unavailable';

const voteResponseSchema = z.object({
  decision: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z.nativeEnum(VoteDecision)
  ),
  confidence: z.number().default(0.5),
  rationale: z.string().default(''),
  required_changes: z.array(z.string()).default([]),
  is_root_solution: z.boolean().optional(),
});

type VoteResponse = z.infer<typeof voteResponseSchema>;

const ROLE_SYSTEM_PROMPTS: Record<VoterRole, string> = {
  [VoterRole.ADVOCATE]: `You are the advocate in a review panel. Make the strongest honest case for the artifact: what it gets right and why it meets the work item. Do not invent strengths it lacks.`,
  [VoterRole.CRITIC]: `You are the critic in a review panel. Ask what this artifact really is, and whether it addresses the root requirement or only treats a symptom. Name concrete gaps.`,
  [VoterRole.JUDGE]: `You are the judge of a review panel. Weigh the positions you are given against the work item and decide. Approve only what meets the requirement.`,
};

const VOTE_FORMAT = `Reply with a JSON object only:
{
  "decision": "approved" | "rejected" | "conditional",
  "confidence": <0.0-1.0>,
  "rationale": "<your reasoning>",
  "required_changes": ["<change needed before approval>"],
  "is_root_solution": <true if it addresses the root requirement rather than a symptom>
}`;

export function toVote(role: VoterRole, response: VoteResponse): Vote {
  return {
    role,
    decision: response.decision,
    confidence: clamp01(response.confidence),
    rationale: response.rationale,
    requiredChanges: response.required_changes,
    isRootSolution: response.is_root_solution ?? null,
  };
}

function renderPosition(role: VoterRole, vote: Vote | null): string {
  const title = role === VoterRole.ADVOCATE ? 'Advocate' : 'Critic';
  if (vote === null) {
    return `### ${title} Position
MISSING: the ${role} could not be reached. Weigh this gap when deciding.`;
  }
  const changes = vote.requiredChanges.length > 0
    ? `\nRequired changes:\n${vote.requiredChanges.map((c) => `- ${c}`).join('\n')}`
    : '';
  const root = vote.isRootSolution === null ? '' : `\nAddresses root requirement: ${vote.isRootSolution ? 'yes' : 'no'}`;
  return `### ${title} Position
Decision: ${vote.decision} (confidence ${vote.confidence.toFixed(2)})
${vote.rationale}${root}${changes}`;
}

export function buildRolePrompt(
  role: VoterRole,
  specification: Specification,
  request: EvaluationRequest,
  trigger: TriggerResult
): string {
  const triggerLine = `This review was escalated because: ${trigger.reasons.join('; ') || 'manual request'}.`;
  return `You are reviewing as the ${role}. ${triggerLine}

${renderEvaluationContext(specification, request)}

${VOTE_FORMAT}`;
}

export function buildJudgePrompt(
  specification: Specification,
  request: EvaluationRequest,
  trigger: TriggerResult,
  advocate: Vote | null,
  critic: Vote | null
): string {
  return `${buildRolePrompt(VoterRole.JUDGE, specification, request, trigger)}

## Panel Positions
${renderPosition(VoterRole.ADVOCATE, advocate)}

${renderPosition(VoterRole.CRITIC, critic)}`;
}

export interface ConsensusEngineOptions {
  invoker: AgentInvoker;
  retry: RetryPolicyEngine;
  specification: Specification;
  timeoutMs: number;
}

type RoleOutcome = { success: true; vote: Vote } | { success: false; error: AgentError };

export class ConsensusEngine {
  private readonly options: ConsensusEngineOptions;

  constructor(options: ConsensusEngineOptions) {
    this.options = options;
  }

  async deliberate(
    request: EvaluationRequest,
    trigger: TriggerResult,
    onVote?: (vote: Vote) => void
  ): Promise<ConsensusResult> {
    const { specification } = this.options;

    const [advocateOutcome, criticOutcome] = await Promise.all([
      this.castVote(VoterRole.ADVOCATE, buildRolePrompt(VoterRole.ADVOCATE, specification, request, trigger), request),
      this.castVote(VoterRole.CRITIC, buildRolePrompt(VoterRole.CRITIC, specification, request, trigger), request),
    ]);

    const votes: Vote[] = [];
    const missingRoles: VoterRole[] = [];
    const survivor = (outcome: RoleOutcome, role: VoterRole): Vote | null => {
      if (outcome.success) {
        votes.push(outcome.vote);
        onVote?.(outcome.vote);
        return outcome.vote;
      }
      missingRoles.push(role);
      return null;
    };
    const advocate = survivor(advocateOutcome, VoterRole.ADVOCATE);
    const critic = survivor(criticOutcome, VoterRole.CRITIC);

    if (advocate === null && critic === null) {
      log.warn({ itemIndex: request.item.index, attempt: request.attempt }, 'Advocate and critic both unavailable');
      return unavailable(votes, [...missingRoles, VoterRole.JUDGE]);
    }

    if (missingRoles.length > 0) {
      log.warn(
        { itemIndex: request.item.index, attempt: request.attempt, missingRoles },
        'Deliberating with reduced confidence'
      );
    }

    const judgeOutcome = await this.castVote(
      VoterRole.JUDGE,
      buildJudgePrompt(specification, request, trigger, advocate, critic),
      request
    );
    if (!judgeOutcome.success) {
      log.warn({ itemIndex: request.item.index, attempt: request.attempt }, 'Judge unavailable');
      return unavailable(votes, [...missingRoles, VoterRole.JUDGE]);
    }

    const judge = judgeOutcome.vote;
    votes.push(judge);
    onVote?.(judge);

    const result: ConsensusResult = {
      approved: judge.decision === VoteDecision.APPROVED,
      decision: judge.decision,
      votes,
      reducedConfidence: missingRoles.length > 0,
      missingRoles,
      rationale: judge.rationale,
      requiredChanges: judge.requiredChanges,
    };

    log.info(
      {
        itemIndex: request.item.index,
        attempt: request.attempt,
        decision: result.decision,
        reducedConfidence: result.reducedConfidence,
      },
      'Consensus reached'
    );
    return result;
  }

  private async castVote(role: VoterRole, prompt: string, request: EvaluationRequest): Promise<RoleOutcome> {
    const context: InvocationContext = {
      systemPrompt: ROLE_SYSTEM_PROMPTS[role],
      timeoutMs: this.options.timeoutMs,
      maxTurns: 1,
    };
    if (request.signal) {
      context.signal = request.signal;
    }

    const response = await callStructured({
      label: `consensus-${role}`,
      invoker: this.options.invoker,
      retry: this.options.retry,
      prompt,
      schema: voteResponseSchema,
      context,
    });

    if (!response.success) {
      log.warn({ role, kind: response.error.kind, error: response.error.message }, 'Consensus vote failed');
      return { success: false, error: response.error };
    }
    return { success: true, vote: toVote(role, response.value) };
  }
}

function unavailable(votes: readonly Vote[], missingRoles: readonly VoterRole[]): ConsensusResult {
  return {
    approved: false,
    decision: VoteDecision.REJECTED,
    votes,
    reducedConfidence: true,
    missingRoles,
    rationale: CONSENSUS_UNAVAILABLE,
    requiredChanges: [],
  };
}

export function createConsensusEngine(options: ConsensusEngineOptions): ConsensusEngine {
  return new ConsensusEngine(options);
}
