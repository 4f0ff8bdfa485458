/**
 * Dependency Analyzer
 *
 * Infers prerequisites between work items with one backend call and layers
 * them into execution levels. Any failure of that call degrades to a single
 * level holding every item.
 */

import { z } from 'zod';
import { callStructured } from '../agent/structured-call.js';
import type { RetryPolicyEngine } from '../agent/retry-policy.js';
import { AgentErrorKind } from '../types/errors.js';
import type {
  AgentInvoker,
  DependencyGraph,
  InvocationContext,
  WorkItemNode,
  WorkItemSpec,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { buildLevels, sanitizeDependencies } from './layering.js';

const log = createLogger('dependency-analyzer');

const dependencyResponseSchema = z.object({
  dependencies: z.array(
    z.object({
      item_index: z.number().int(),
      depends_on: z.array(z.number().int()).default([]),
    })
  ),
});

export interface DependencyAnalyzerOptions {
  invoker: AgentInvoker;
  retry: RetryPolicyEngine;
  timeoutMs: number;
  cwd?: string;
}

function normalizeItem(item: string | WorkItemSpec): WorkItemSpec {
  return typeof item === 'string' ? { text: item, finalDeliverable: false, affectsOntology: false } : item;
}

export function buildDependencyPrompt(items: readonly WorkItemSpec[]): string {
  const listing = items.map((item, index) => `[${index}] ${item.text}`).join('\n');
  return `Determine the execution dependencies between these work items.

Work items:
${listing}

An item depends on another when it needs that item's output, modifies what that item creates, or cannot be verified until that item is done. Only list real dependencies; independent items should run in parallel.

Respond with JSON only:
{"dependencies": [{"item_index": 0, "depends_on": []}, {"item_index": 1, "depends_on": [0]}]}`;
}

function toGraph(
  items: readonly WorkItemSpec[],
  dependencies: readonly (readonly number[])[],
  levels: readonly (readonly number[])[],
  degradedReason: string | null
): DependencyGraph {
  const nodes: WorkItemNode[] = items.map((item, index) => ({
    index,
    text: item.text,
    dependsOn: [...(dependencies[index] ?? [])],
    finalDeliverable: item.finalDeliverable,
    affectsOntology: item.affectsOntology,
  }));
  return { nodes, levels, degraded: degradedReason !== null, degradedReason };
}

/**
 * Single-level graph: every item independent.
 */
export function singleLevelGraph(
  input: readonly (string | WorkItemSpec)[],
  degradedReason: string | null
): DependencyGraph {
  const items = input.map(normalizeItem);
  const levels = items.length > 0 ? [items.map((_, index) => index)] : [];
  return toGraph(items, items.map(() => []), levels, degradedReason);
}

export class DependencyAnalyzer {
  private readonly options: DependencyAnalyzerOptions;

  constructor(options: DependencyAnalyzerOptions) {
    this.options = options;
  }

  async analyze(
    workItems: readonly (string | WorkItemSpec)[],
    signal?: AbortSignal
  ): Promise<DependencyGraph> {
    const items = workItems.map(normalizeItem);

    if (items.length <= 1) {
      return singleLevelGraph(items, null);
    }

    const context: InvocationContext = {
      timeoutMs: this.options.timeoutMs,
      maxTurns: 1,
    };
    if (this.options.cwd) {
      context.cwd = this.options.cwd;
    }
    if (signal) {
      context.signal = signal;
    }

    const response = await callStructured({
      label: 'dependency-analysis',
      invoker: this.options.invoker,
      retry: this.options.retry,
      prompt: buildDependencyPrompt(items),
      schema: dependencyResponseSchema,
      context,
    });

    if (!response.success && (response.error.kind === AgentErrorKind.CANCELLED || signal?.aborted === true)) {
      log.info({ itemCount: items.length }, 'Dependency analysis cancelled');
      return singleLevelGraph(items, null);
    }

    if (!response.success) {
      const reason = `Dependency analysis failed (${response.error.kind}): ${response.error.message}`;
      log.warn({ itemCount: items.length, kind: response.error.kind }, 'Falling back to a single execution level');
      return singleLevelGraph(items, reason);
    }

    const raw = new Map<number, number[]>();
    for (const entry of response.value.dependencies) {
      raw.set(entry.item_index, [...(raw.get(entry.item_index) ?? []), ...entry.depends_on]);
    }

    const layering = buildLevels(sanitizeDependencies(items.length, raw));
    if (layering.brokenEdges.length > 0) {
      log.warn({ brokenEdges: layering.brokenEdges }, 'Dropped dependencies that formed a cycle');
    }

    log.info(
      { itemCount: items.length, levelCount: layering.levels.length },
      'Dependency analysis complete'
    );

    return toGraph(items, layering.dependencies, layering.levels, null);
  }
}

export function createDependencyAnalyzer(options: DependencyAnalyzerOptions): DependencyAnalyzer {
  return new DependencyAnalyzer(options);
}
