/**
 * Work item decomposition.
 *
 * Asks the backend whether an item is atomic or should be split into
 * 2-5 independent sub-items. Sub-items are never decomposed further.
 */

import { z } from 'zod';
import { callStructured } from '../agent/structured-call.js';
import type { RetryPolicyEngine } from '../agent/retry-policy.js';
import type { AgentInvoker, InvocationContext, WorkItemNode } from '../types/index.js';
import { extractJsonArray } from '../utils/json.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('decomposer');

export const MIN_SUB_ITEMS = 2;
export const MAX_SUB_ITEMS = 5;

export type DecompositionDecision =
  | { atomic: true }
  | { atomic: false; subItems: string[] };

const decompositionResponseSchema = z.union([
  z.object({ atomic: z.literal(true) }),
  z.object({ subItems: z.array(z.string().min(1)) }),
]);

/**
 * "ATOMIC" anywhere wins; otherwise the first JSON array of strings.
 */
export function extractDecomposition(text: string): unknown {
  if (text.toUpperCase().includes('ATOMIC')) {
    return { atomic: true };
  }
  const subItems = extractJsonArray(text);
  return subItems === undefined ? undefined : { subItems };
}

export function buildDecompositionPrompt(goal: string, item: WorkItemNode): string {
  return `Decide whether this work item should be decomposed.

## Goal Context
${goal}

## Work Item (#${item.index + 1})
${item.text}

## Instructions
If the item needs several distinct steps that could run independently, split it into ${MIN_SUB_ITEMS}-${MAX_SUB_ITEMS} sub-items.
If it can be done as one focused task, respond with: ATOMIC

Each sub-item must be independently executable, specific, part of achieving the parent item, and target distinct files or distinct sections of shared files.

Respond with either "ATOMIC" or a JSON array of sub-item descriptions only:
["first sub-item", "second sub-item"]`;
}

export interface DecomposerOptions {
  invoker: AgentInvoker;
  retry: RetryPolicyEngine;
  timeoutMs: number;
}

export class Decomposer {
  private readonly options: DecomposerOptions;

  constructor(options: DecomposerOptions) {
    this.options = options;
  }

  /**
   * Failures of the decomposition call fall back to atomic execution.
   */
  async decide(goal: string, item: WorkItemNode, signal?: AbortSignal): Promise<DecompositionDecision> {
    const context: InvocationContext = {
      timeoutMs: this.options.timeoutMs,
      maxTurns: 1,
      systemPrompt: 'You are a task decomposition expert. Analyze tasks and break them down if needed.',
    };
    if (signal) {
      context.signal = signal;
    }

    const response = await callStructured({
      label: 'decomposition',
      invoker: this.options.invoker,
      retry: this.options.retry,
      prompt: buildDecompositionPrompt(goal, item),
      schema: decompositionResponseSchema,
      extract: extractDecomposition,
      context,
    });

    if (!response.success) {
      log.warn({ itemIndex: item.index, kind: response.error.kind }, 'Decomposition check failed, executing atomically');
      return { atomic: true };
    }

    const value = response.value;
    if ('atomic' in value) {
      log.debug({ itemIndex: item.index }, 'Item is atomic');
      return { atomic: true };
    }

    if (value.subItems.length < MIN_SUB_ITEMS || value.subItems.length > MAX_SUB_ITEMS) {
      log.warn(
        { itemIndex: item.index, count: value.subItems.length },
        'Decomposition outside the allowed sub-item range, executing atomically'
      );
      return { atomic: true };
    }

    log.info({ itemIndex: item.index, subItemCount: value.subItems.length }, 'Item decomposed');
    return { atomic: false, subItems: value.subItems };
  }
}
