/**
 * Work Item Executor
 *
 * Runs one work item through the agent, either as a single session or,
 * when the backend splits it, as concurrent sessions per sub-item whose
 * traces are merged with per-sub-item attribution. This component never
 * touches the workspace itself; it records what the sessions did.
 */

import { invokeWithDeadline } from '../agent/deadline.js';
import type { RetryPolicyEngine } from '../agent/retry-policy.js';
import type { TaskProfile } from '../agent/task-profiles.js';
import { renderLevelContexts } from '../coordination/level-context.js';
import { AgentError, AgentErrorKind } from '../types/errors.js';
import type {
  AgentInvoker,
  ExecutionTrace,
  InvocationContext,
  LevelContext,
  SubItemTrace,
  WorkItemNode,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { Decomposer, type DecompositionDecision } from './decomposer.js';
import { renderLateralStrategy, type LateralPersona } from './lateral.js';

const log = createLogger('work-item-executor');

export interface WorkItemExecutorOptions {
  invoker: AgentInvoker;
  retry: RetryPolicyEngine;
  profile: TaskProfile;
  goal: string;
  itemTimeoutMs: number;
  backendTimeoutMs: number;
  maxTurns: number;
  enableDecomposition: boolean;
  workspaceDir: string;
}

export interface ExecuteOptions {
  attempt?: number;
  /** Reasons from earlier attempts */
  feedback?: readonly string[];
  /** Other items running in the same level */
  siblings?: readonly WorkItemNode[];
  lateralPersona?: LateralPersona | null;
  signal?: AbortSignal;
  onDecomposed?: (subItems: readonly string[]) => void;
}

export type ExecutionOutcome =
  | { success: true; trace: ExecutionTrace }
  | { success: false; error: AgentError; partialTrace: ExecutionTrace | null };

function renderSiblingNotice(siblings: readonly { label: string; text: string }[]): string {
  if (siblings.length === 0) {
    return '';
  }
  const lines = siblings.map((s) => `- ${s.label}: ${s.text}`);
  return `## Parallel Execution Notice
These tasks are running at the same time as yours:
${lines.join('\n')}
Stay within your own task and avoid editing files the other tasks are likely to own.`;
}

function renderFeedback(feedback: readonly string[]): string {
  return feedback.map((reason) => `- ${reason}`).join('\n');
}

export class WorkItemExecutor {
  private readonly options: WorkItemExecutorOptions;
  private readonly decomposer: Decomposer;
  private readonly decisions = new Map<number, DecompositionDecision>();

  constructor(options: WorkItemExecutorOptions) {
    this.options = options;
    this.decomposer = new Decomposer({
      invoker: options.invoker,
      retry: options.retry,
      timeoutMs: options.backendTimeoutMs,
    });
  }

  async execute(
    item: WorkItemNode,
    contexts: readonly LevelContext[],
    options: ExecuteOptions = {}
  ): Promise<ExecutionOutcome> {
    const startTime = Date.now();
    const decision = await this.decide(item, options.signal);

    if (options.signal?.aborted) {
      return {
        success: false,
        error: new AgentError(AgentErrorKind.CANCELLED, 'Execution cancelled'),
        partialTrace: null,
      };
    }

    if (decision.atomic) {
      return this.executeAtomic(item, contexts, options, startTime);
    }

    options.onDecomposed?.(decision.subItems);
    return this.executeDecomposed(item, decision.subItems, contexts, options, startTime);
  }

  /**
   * The decision is made once per item and reused on later attempts.
   */
  private async decide(item: WorkItemNode, signal: AbortSignal | undefined): Promise<DecompositionDecision> {
    if (!this.options.enableDecomposition) {
      return { atomic: true };
    }
    const cached = this.decisions.get(item.index);
    if (cached) {
      return cached;
    }
    const decision = await this.decomposer.decide(this.options.goal, item, signal);
    this.decisions.set(item.index, decision);
    return decision;
  }

  private buildContext(signal: AbortSignal | undefined): InvocationContext {
    const context: InvocationContext = {
      systemPrompt: this.options.profile.systemPrompt,
      cwd: this.options.workspaceDir,
      maxTurns: this.options.maxTurns,
      timeoutMs: this.options.itemTimeoutMs,
    };
    if (signal) {
      context.signal = signal;
    }
    return context;
  }

  private buildPrompt(
    itemLabel: string,
    itemText: string,
    contexts: readonly LevelContext[],
    siblings: readonly { label: string; text: string }[],
    options: ExecuteOptions
  ): string {
    return this.options.profile.buildTaskPrompt({
      goal: this.options.goal,
      itemLabel,
      itemText,
      contextBlock: renderLevelContexts(contexts),
      siblingNotice: renderSiblingNotice(siblings),
      feedback: renderFeedback(options.feedback ?? []),
      strategy: options.lateralPersona ? renderLateralStrategy(options.lateralPersona) : '',
    });
  }

  private async executeAtomic(
    item: WorkItemNode,
    contexts: readonly LevelContext[],
    options: ExecuteOptions,
    startTime: number
  ): Promise<ExecutionOutcome> {
    const siblings = (options.siblings ?? [])
      .filter((s) => s.index !== item.index)
      .map((s) => ({ label: `Item ${s.index + 1}`, text: s.text }));

    const outcome = await invokeWithDeadline(this.options.invoker, {
      prompt: this.buildPrompt(`Work Item ${item.index + 1}`, item.text, contexts, siblings, options),
      capabilities: this.options.profile.capabilities,
      context: this.buildContext(options.signal),
    });

    if (!outcome.success) {
      log.warn(
        { itemIndex: item.index, attempt: options.attempt, kind: outcome.error.kind },
        'Work item execution failed'
      );
      return { success: false, error: outcome.error, partialTrace: null };
    }

    return {
      success: true,
      trace: {
        ...outcome.trace,
        itemIndex: item.index,
        subTraces: [],
        durationMs: Date.now() - startTime,
      },
    };
  }

  private async executeDecomposed(
    item: WorkItemNode,
    subItems: readonly string[],
    contexts: readonly LevelContext[],
    options: ExecuteOptions,
    startTime: number
  ): Promise<ExecutionOutcome> {
    const labels = subItems.map((text, k) => ({ label: `Sub-item ${k + 1}`, text }));

    const outcomes = await Promise.all(
      subItems.map((text, k) =>
        invokeWithDeadline(this.options.invoker, {
          prompt: this.buildPrompt(
            `Sub-item ${k + 1} of Work Item ${item.index + 1}`,
            `${text}\n\nThis is part of: ${item.text}`,
            contexts,
            labels.filter((_, j) => j !== k),
            options
          ),
          capabilities: this.options.profile.capabilities,
          context: this.buildContext(options.signal),
        })
      )
    );

    const subTraces: SubItemTrace[] = [];
    const failures: { subIndex: number; error: AgentError }[] = [];
    outcomes.forEach((outcome, subIndex) => {
      const text = subItems[subIndex] ?? '';
      if (outcome.success) {
        subTraces.push({ ...outcome.trace, subIndex, text });
      } else {
        failures.push({ subIndex, error: outcome.error });
      }
    });

    const merged = mergeSubTraces(item.index, subTraces, Date.now() - startTime);

    if (failures.length === 0) {
      return { success: true, trace: merged };
    }

    const cancelled = failures.some((f) => f.error.kind === AgentErrorKind.CANCELLED);
    const message = failures
      .map((f) => `sub-item ${f.subIndex + 1} (${f.error.kind}): ${f.error.message}`)
      .join('; ');
    log.warn(
      { itemIndex: item.index, failed: failures.length, total: subItems.length },
      'Sub-item execution failed'
    );

    return {
      success: false,
      error: new AgentError(cancelled ? AgentErrorKind.CANCELLED : AgentErrorKind.SUBITEM_FAILED, message),
      partialTrace: subTraces.length > 0 ? merged : null,
    };
  }
}

/**
 * Merge sub-item traces into one item trace. The item's own invocation
 * list stays empty; each sub-trace keeps its invocations.
 */
export function mergeSubTraces(
  itemIndex: number,
  subTraces: readonly SubItemTrace[],
  durationMs: number
): ExecutionTrace {
  const ordered = [...subTraces].sort((a, b) => a.subIndex - b.subIndex);
  const output = ordered
    .map((sub) => `### Sub-item ${sub.subIndex + 1}: ${sub.text}\n${sub.output}`)
    .join('\n\n');
  return {
    itemIndex,
    invocations: [],
    output,
    sessionId: null,
    durationMs,
    subTraces: ordered,
  };
}

export function createWorkItemExecutor(options: WorkItemExecutorOptions): WorkItemExecutor {
  return new WorkItemExecutor(options);
}
