/**
 * Lateral strategies for items that keep failing the same way.
 */

import type { AttemptRecord } from '../events/run-state.js';

export const LateralPersona = {
  HACKER: 'hacker',
  RESEARCHER: 'researcher',
  SIMPLIFIER: 'simplifier',
  ARCHITECT: 'architect',
  CONTRARIAN: 'contrarian',
} as const;

export type LateralPersona = (typeof LateralPersona)[keyof typeof LateralPersona];

interface PersonaStrategy {
  readonly description: string;
  readonly instructions: readonly string[];
}

const PERSONA_ORDER: readonly LateralPersona[] = [
  LateralPersona.HACKER,
  LateralPersona.RESEARCHER,
  LateralPersona.SIMPLIFIER,
  LateralPersona.ARCHITECT,
  LateralPersona.CONTRARIAN,
];

const PERSONA_STRATEGIES: Record<LateralPersona, PersonaStrategy> = {
  [LateralPersona.HACKER]: {
    description: 'Find an unconventional workaround',
    instructions: [
      'List the constraints the previous attempts followed and question each one.',
      'Look for edge cases and boundary conditions the previous attempts missed.',
      'Consider solving a simpler adjacent problem that still meets the requirement.',
    ],
  },
  [LateralPersona.RESEARCHER]: {
    description: 'Gather the missing information first',
    instructions: [
      'Identify what information the previous attempts assumed without checking.',
      'Read the relevant code, documentation and configuration before changing anything.',
      'Base the new approach on what you verified.',
    ],
  },
  [LateralPersona.SIMPLIFIER]: {
    description: 'Reduce the solution to its essentials',
    instructions: [
      'Remove every part of the previous approach that the requirement does not need.',
      'Solve the problem concretely before adding any abstraction.',
      'Prefer the simplest change that could work.',
    ],
  },
  [LateralPersona.ARCHITECT]: {
    description: 'Restructure the approach',
    instructions: [
      'Map the structure the previous attempts worked within.',
      'Look for a structural mismatch that makes the requirement hard to meet.',
      'Choose a structure in which the requirement is straightforward.',
    ],
  },
  [LateralPersona.CONTRARIAN]: {
    description: 'Invert the assumptions',
    instructions: [
      'State the assumptions behind the previous attempts.',
      'Ask what happens if each one is false.',
      'Take the approach the previous attempts ruled out, if it meets the requirement.',
    ],
  },
};

const ATTEMPT_PREFIX = /^attempt \d+ /;

function firstReason(record: AttemptRecord): string | null {
  const reason = record.reasons[0];
  return reason === undefined ? null : reason.replace(ATTEMPT_PREFIX, '');
}

/**
 * Pick a persona for the next attempt. From the third attempt on, when the
 * two previous attempts failed for the same first reason, the personas are
 * used in a fixed rotation.
 */
export function selectLateralPersona(
  history: readonly AttemptRecord[],
  nextAttempt: number
): LateralPersona | null {
  if (nextAttempt < 3 || history.length < 2) {
    return null;
  }
  const previous = history[history.length - 1];
  const beforePrevious = history[history.length - 2];
  if (!previous || !beforePrevious) {
    return null;
  }
  const reason = firstReason(previous);
  if (reason === null || reason !== firstReason(beforePrevious)) {
    return null;
  }
  return PERSONA_ORDER[(nextAttempt - 3) % PERSONA_ORDER.length] ?? null;
}

export function renderLateralStrategy(persona: LateralPersona): string {
  const strategy = PERSONA_STRATEGIES[persona];
  const steps = strategy.instructions.map((step, i) => `${i + 1}. ${step}`).join('\n');
  return `## Change Of Approach: ${strategy.description}
The previous attempts failed the same way. Do not repeat them.
${steps}`;
}
