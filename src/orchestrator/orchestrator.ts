/**
 * Orchestrator
 *
 * Runs one specification end to end:
 * analyze dependencies, then for each level execute its items
 * concurrently, coordinate once every trace is back, evaluate each
 * attempt, and retry rejected items until they are approved or their
 * budget is spent. Levels run strictly in order.
 *
 * All run state changes go through the event reducer, so the stored
 * event stream replays to the same state.
 */

import { nanoid } from 'nanoid';
import { createClaudeAgentInvoker } from '../agent/claude-agent-invoker.js';
import { createRetryPolicyEngine, type RetryPolicy, type RetryPolicyEngine } from '../agent/retry-policy.js';
import { getTaskProfile } from '../agent/task-profiles.js';
import { resolveConfig, type StratumConfig, type StratumConfigInput } from '../config/index.js';
import { conflictKey } from '../coordination/conflict-detector.js';
import { createLevelContext, mergeReviews, summarizeTrace } from '../coordination/level-context.js';
import { LevelCoordinator } from '../coordination/level-coordinator.js';
import { ConsensusEngine } from '../consensus/consensus-engine.js';
import { DependencyAnalyzer } from '../dependency/analyzer.js';
import type { EvaluationRequest } from '../evaluation/context.js';
import { MechanicalEvaluator, type MechanicalCheck } from '../evaluation/mechanical.js';
import { EvaluationPipeline, type Evaluator } from '../evaluation/pipeline.js';
import { SemanticEvaluator } from '../evaluation/semantic.js';
import { createEventLog } from '../events/event-log.js';
import {
  INITIAL_RUN_STATE,
  accumulatedReasons,
  reduceRunState,
  type ItemState,
  type RunState,
} from '../events/run-state.js';
import { selectLateralPersona, type LateralPersona } from '../execution/lateral.js';
import { WorkItemExecutor, type ExecutionOutcome } from '../execution/work-item-executor.js';
import type {
  AgentInvoker,
  CoordinatorReview,
  DependencyGraph,
  EvaluationVerdict,
  EventInput,
  EventSink,
  ExecutionTrace,
  LevelContext,
  RunStatus,
  Specification,
  WorkItemNode,
} from '../types/index.js';
import { writtenPaths } from '../types/trace.js';
import { createLogger } from '../utils/logger.js';
import type { ItemResult, RunResult } from './types.js';

const log = createLogger('orchestrator');

const TERMINAL_STATUSES: ReadonlySet<string> = new Set(['approved', 'failed', 'skipped', 'cancelled']);

export interface OrchestratorOptions {
  /** Agent backend; defaults to the Claude Agent SDK invoker */
  invoker?: AgentInvoker;
  /** Event sink; defaults to an in-memory log */
  eventSink?: EventSink;
  /** Stage 1 checks; none means stage 1 passes */
  checks?: readonly MechanicalCheck[];
  /** Explicit configuration on top of the environment */
  config?: Partial<StratumConfigInput>;
  /** Overrides for backend call retries */
  retryPolicy?: Partial<RetryPolicy>;
  /** Replaces the default three-stage pipeline */
  createEvaluator?: (specification: Specification, config: StratumConfig) => Evaluator;
}

export interface RunOptions {
  signal?: AbortSignal;
  executionId?: string;
}

export class Orchestrator {
  readonly config: StratumConfig;
  private readonly invoker: AgentInvoker;
  private readonly sink: EventSink;
  private readonly retry: RetryPolicyEngine;
  private readonly options: OrchestratorOptions;

  constructor(options: OrchestratorOptions = {}) {
    this.options = options;
    this.config = resolveConfig(options.config ?? {});
    this.invoker =
      options.invoker ??
      createClaudeAgentInvoker({
        defaultMaxTurns: this.config.maxTurns,
        ...(this.config.model ? { model: this.config.model } : {}),
      });
    this.sink = options.eventSink ?? createEventLog();
    this.retry = createRetryPolicyEngine({
      maxRetries: this.config.backendMaxRetries,
      backoffMs: this.config.backendBackoffMs,
      ...options.retryPolicy,
    });
  }

  async run(specification: Specification, options: RunOptions = {}): Promise<RunResult> {
    const session = new RunSession(specification, {
      config: this.config,
      invoker: this.invoker,
      sink: this.sink,
      retry: this.retry,
      evaluator: this.buildEvaluator(specification),
      executionId: options.executionId ?? `exec_${nanoid(12)}`,
      ...(options.signal ? { signal: options.signal } : {}),
    });
    return session.execute();
  }

  private buildEvaluator(specification: Specification): Evaluator {
    if (this.options.createEvaluator) {
      return this.options.createEvaluator(specification, this.config);
    }
    const config = this.config;
    return new EvaluationPipeline({
      mechanical: new MechanicalEvaluator({
        checks: this.options.checks ?? [],
        workspaceDir: config.workspaceDir,
        timeoutMs: config.checkTimeoutMs,
        coverageThreshold: config.coverageThreshold,
      }),
      semantic: new SemanticEvaluator({
        invoker: this.invoker,
        retry: this.retry,
        specification,
        timeoutMs: config.backendTimeoutMs,
        satisfactionThreshold: config.satisfactionThreshold,
      }),
      consensus: new ConsensusEngine({
        invoker: this.invoker,
        retry: this.retry,
        specification,
        timeoutMs: config.backendTimeoutMs,
      }),
      triggerThresholds: {
        drift: config.driftTriggerThreshold,
        uncertainty: config.uncertaintyTriggerThreshold,
      },
    });
  }
}

export function createOrchestrator(options?: OrchestratorOptions): Orchestrator {
  return new Orchestrator(options);
}

// ═══════════════════════════════════════════════════════════════════════════
// Run session
// ═══════════════════════════════════════════════════════════════════════════

interface RunSessionOptions {
  config: StratumConfig;
  invoker: AgentInvoker;
  sink: EventSink;
  retry: RetryPolicyEngine;
  evaluator: Evaluator;
  executionId: string;
  signal?: AbortSignal;
}

interface PlannedAttempt {
  node: WorkItemNode;
  attempt: number;
  lateralPersona: LateralPersona | null;
  feedback: string[];
}

class RunSession {
  private state: RunState = INITIAL_RUN_STATE;
  private halted = false;
  private readonly verdicts = new Map<number, EvaluationVerdict>();
  private readonly executor: WorkItemExecutor;
  private readonly coordinator: LevelCoordinator;
  private readonly analyzer: DependencyAnalyzer;

  private readonly specification: Specification;
  private readonly options: RunSessionOptions;

  constructor(specification: Specification, options: RunSessionOptions) {
    this.specification = specification;
    this.options = options;
    const { config, invoker, retry } = options;
    this.analyzer = new DependencyAnalyzer({
      invoker,
      retry,
      timeoutMs: config.backendTimeoutMs,
      cwd: config.workspaceDir,
    });
    this.executor = new WorkItemExecutor({
      invoker,
      retry,
      profile: getTaskProfile(specification.taskType),
      goal: specification.goal,
      itemTimeoutMs: config.itemTimeoutMs,
      backendTimeoutMs: config.backendTimeoutMs,
      maxTurns: config.maxTurns,
      enableDecomposition: config.enableDecomposition,
      workspaceDir: config.workspaceDir,
    });
    this.coordinator = new LevelCoordinator({
      invoker,
      timeoutMs: config.resolutionTimeoutMs,
      workspaceDir: config.workspaceDir,
      maxTurns: config.maxTurns,
    });
  }

  private get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  private get cancelled(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private emit(event: EventInput): void {
    const stored = this.options.sink.append(this.options.executionId, event);
    this.state = reduceRunState(this.state, stored);
  }

  private item(index: number): ItemState | undefined {
    return this.state.items[index];
  }

  async execute(): Promise<RunResult> {
    const startTime = Date.now();
    const { specification, options } = this;
    const { config } = options;

    if (specification.metadata.ambiguityScore > config.maxAmbiguityScore) {
      log.warn(
        { ambiguityScore: specification.metadata.ambiguityScore, maxAmbiguityScore: config.maxAmbiguityScore },
        'Specification ambiguity exceeds the configured threshold'
      );
    }

    this.emit({
      type: 'execution.started',
      payload: {
        specId: specification.metadata.specId,
        goal: specification.goal,
        itemCount: specification.workItems.length,
        maxAttemptsPerItem: config.maxAttemptsPerItem,
        ambiguityScore: specification.metadata.ambiguityScore,
      },
    });
    log.info(
      { executionId: options.executionId, specId: specification.metadata.specId, items: specification.workItems.length },
      'Starting execution'
    );

    const graph = await this.analyzer.analyze(specification.workItems, this.signal);
    // A run cancelled during analysis records no graph.
    if (!this.cancelled) {
      if (graph.degradedReason !== null) {
        this.emit({
          type: 'graph.degraded',
          payload: { reason: graph.degradedReason, itemCount: graph.nodes.length },
        });
      }
      this.emit({
        type: 'graph.analyzed',
        payload: {
          levels: graph.levels.map((level) => [...level]),
          dependencies: graph.nodes.map((node) => ({ index: node.index, dependsOn: [...node.dependsOn] })),
          degraded: graph.degraded,
        },
      });
    }

    const contexts: LevelContext[] = [];
    for (const [levelNumber, members] of graph.levels.entries()) {
      if (this.cancelled || this.halted) {
        break;
      }
      const context = await this.runLevel(levelNumber, members, graph, contexts);
      if (context) {
        contexts.push(context);
      }
    }

    const status = this.finish(startTime);
    return this.buildResult(graph, contexts, status, Date.now() - startTime);
  }

  /**
   * Returns the context for later levels, or null when the run was
   * cancelled during the level.
   */
  private async runLevel(
    levelNumber: number,
    members: readonly number[],
    graph: DependencyGraph,
    contexts: readonly LevelContext[]
  ): Promise<LevelContext | null> {
    this.emit({ type: 'level.started', payload: { level: levelNumber, itemIndices: [...members] } });
    log.info({ level: levelNumber, items: members.length }, 'Starting level');

    const nodes: WorkItemNode[] = [];
    for (const index of members) {
      const node = graph.nodes[index];
      if (!node) {
        continue;
      }
      const blocker = node.dependsOn.find((dep) => {
        const status = this.item(dep)?.status;
        return status !== undefined && status !== 'approved';
      });
      if (blocker !== undefined) {
        this.emit({
          type: 'item.skipped',
          payload: { itemIndex: index, level: levelNumber, reason: `dependency ${blocker} did not complete` },
        });
        continue;
      }
      nodes.push(node);
    }

    const itemTexts = new Map<number, string>(nodes.map((node) => [node.index, node.text]));
    const latestTraces = new Map<number, ExecutionTrace>();
    const reviews: CoordinatorReview[] = [];
    const reportedConflicts = new Set<string>();
    let resolutionUsed = false;
    let conflictCount = 0;
    let rounds = 0;
    let pending = nodes;

    while (pending.length > 0) {
      if (this.cancelled) {
        return this.cancel(levelNumber);
      }

      const planned = this.planRound(levelNumber, pending);
      if (planned.length === 0) {
        break;
      }
      rounds += 1;

      // Barrier: coordination starts only after every attempt returned.
      const siblings = planned.map((p) => p.node);
      const outcomes = await Promise.all(
        planned.map((p) =>
          this.executor.execute(p.node, contexts, {
            attempt: p.attempt,
            feedback: p.feedback,
            siblings,
            lateralPersona: p.lateralPersona,
            ...(this.signal ? { signal: this.signal } : {}),
            onDecomposed: (subItems) =>
              this.emit({
                type: 'item.decomposed',
                payload: { itemIndex: p.node.index, attempt: p.attempt, subItems: [...subItems] },
              }),
          })
        )
      );

      if (this.cancelled) {
        return this.cancel(levelNumber);
      }

      const succeeded: { planned: PlannedAttempt; trace: ExecutionTrace }[] = [];
      const next: WorkItemNode[] = [];
      planned.forEach((p, i) => {
        const outcome = outcomes[i];
        if (!outcome) {
          return;
        }
        this.recordCompletion(levelNumber, p, outcome);
        if (outcome.success) {
          succeeded.push({ planned: p, trace: outcome.trace });
          latestTraces.set(p.node.index, outcome.trace);
        } else if (this.retryOrFail(levelNumber, p)) {
          next.push(p.node);
        }
      });

      // Detection covers the latest trace of every item in the level, so a
      // retry that writes a file a sibling wrote earlier still conflicts.
      const allowResolution = !resolutionUsed;
      const levelContext = await this.coordinator.coordinate(
        levelNumber,
        [...latestTraces.values()],
        {
          itemTexts,
          allowResolution,
          reportedConflicts,
          ...(this.signal ? { signal: this.signal } : {}),
          onConflictsDetected: (conflicts) => {
            for (const conflict of conflicts) {
              reportedConflicts.add(conflictKey(conflict));
              this.emit({
                type: 'conflict.detected',
                payload: { level: levelNumber, path: conflict.path, itemIndices: [...conflict.itemIndices] },
              });
            }
          },
        }
      );

      const review = levelContext.review;
      if (review) {
        if (allowResolution) {
          resolutionUsed = true;
        }
        conflictCount += review.conflicts.length;
        reviews.push(review);
        for (const conflict of review.conflicts) {
          if (conflict.resolved) {
            this.emit({
              type: 'conflict.resolved',
              payload: {
                level: levelNumber,
                path: conflict.path,
                itemIndices: [...conflict.itemIndices],
                description: conflict.resolutionDescription ?? 'Resolved by coordinator',
              },
            });
          }
        }
      }

      const verdicts = await Promise.all(
        succeeded.map((s) => this.evaluate(s.planned, s.trace))
      );

      if (this.cancelled) {
        return this.cancel(levelNumber);
      }

      succeeded.forEach((s, i) => {
        const verdict = verdicts[i];
        if (!verdict) {
          return;
        }
        this.verdicts.set(s.planned.node.index, verdict);
        if (verdict.approved) {
          this.emit({
            type: 'item.approved',
            payload: {
              itemIndex: s.planned.node.index,
              level: levelNumber,
              attempt: s.planned.attempt,
              highestStage: verdict.highestStage,
              reducedConfidence: verdict.reducedConfidence,
            },
          });
        } else if (this.retryOrFail(levelNumber, s.planned)) {
          next.push(s.planned.node);
        }
      });

      pending = next.sort((a, b) => a.index - b.index);
    }

    const approved = members.filter((i) => this.item(i)?.status === 'approved');
    this.emit({
      type: 'level.completed',
      payload: {
        level: levelNumber,
        approved,
        failed: members.filter((i) => this.item(i)?.status === 'failed'),
        skipped: members.filter((i) => this.item(i)?.status === 'skipped'),
        conflictCount,
        rounds,
      },
    });
    log.info({ level: levelNumber, approved: approved.length, total: members.length, rounds }, 'Level complete');

    const summaries = approved.flatMap((index) => {
      const trace = latestTraces.get(index);
      return trace ? [summarizeTrace(trace, itemTexts.get(index) ?? '', true)] : [];
    });
    return createLevelContext(levelNumber, summaries, mergeReviews(levelNumber, reviews));
  }

  /**
   * Emit item.started for every item the attempt cap still allows.
   */
  private planRound(levelNumber: number, pending: readonly WorkItemNode[]): PlannedAttempt[] {
    const cap = this.options.config.maxTotalAttempts;
    const planned: PlannedAttempt[] = [];
    for (const node of pending) {
      if (cap > 0 && this.state.totalAttempts >= cap) {
        this.halted = true;
        log.warn({ cap, itemIndex: node.index }, 'Total attempt budget exhausted');
        break;
      }
      const history = this.item(node.index)?.attempts ?? [];
      const attempt = history.length + 1;
      const lateralPersona = selectLateralPersona(history, attempt);
      const feedback = history.flatMap((record) => [...record.reasons]);
      this.emit({
        type: 'item.started',
        payload: { itemIndex: node.index, level: levelNumber, attempt, lateralPersona },
      });
      planned.push({ node, attempt, lateralPersona, feedback });
    }
    return planned;
  }

  private recordCompletion(levelNumber: number, planned: PlannedAttempt, outcome: ExecutionOutcome): void {
    const trace = outcome.success ? outcome.trace : outcome.partialTrace;
    this.emit({
      type: 'item.completed',
      payload: {
        itemIndex: planned.node.index,
        level: levelNumber,
        attempt: planned.attempt,
        success: outcome.success,
        durationMs: trace?.durationMs ?? 0,
        filesWritten: trace ? writtenPaths(trace) : [],
        error: outcome.success ? null : `${outcome.error.kind}: ${outcome.error.message}`,
      },
    });
  }

  /**
   * True when the item gets another attempt; otherwise records it failed.
   */
  private retryOrFail(levelNumber: number, planned: PlannedAttempt): boolean {
    if (planned.attempt < this.options.config.maxAttemptsPerItem) {
      return true;
    }
    const item = this.item(planned.node.index);
    const reasons = item ? accumulatedReasons(item) : [];
    this.emit({
      type: 'item.failed',
      payload: {
        itemIndex: planned.node.index,
        level: levelNumber,
        attempts: planned.attempt,
        reasons: [...reasons, `retry budget of ${this.options.config.maxAttemptsPerItem} attempts exhausted`],
      },
    });
    log.warn({ itemIndex: planned.node.index, attempts: planned.attempt }, 'Work item failed');
    return false;
  }

  private async evaluate(planned: PlannedAttempt, trace: ExecutionTrace): Promise<EvaluationVerdict> {
    const { node, attempt } = planned;
    const request: EvaluationRequest = {
      item: node,
      trace,
      attempt,
      maxAttempts: this.options.config.maxAttemptsPerItem,
      history: planned.feedback,
      lateralStrategyAdopted: planned.lateralPersona !== null,
    };
    if (this.signal) {
      request.signal = this.signal;
    }

    return this.options.evaluator.evaluate(request, {
      onStageComplete: (stage, passed, reasons) =>
        this.emit({
          type: 'evaluation.stage_completed',
          payload: { itemIndex: node.index, attempt, stage, passed, reasons: [...reasons] },
        }),
      onVote: (vote) =>
        this.emit({
          type: 'consensus.vote_cast',
          payload: {
            itemIndex: node.index,
            attempt,
            role: vote.role,
            decision: vote.decision,
            confidence: vote.confidence,
          },
        }),
    });
  }

  private cancel(levelNumber: number | null): null {
    const pendingItems = this.state.items
      .filter((item) => !TERMINAL_STATUSES.has(item.status))
      .map((item) => item.index);
    this.emit({ type: 'execution.cancelled', payload: { level: levelNumber, pendingItems } });
    log.warn({ level: levelNumber, pendingItems: pendingItems.length }, 'Execution cancelled');
    return null;
  }

  private finish(startTime: number): RunStatus {
    let status: RunStatus = 'completed';

    if (this.cancelled) {
      status = 'cancelled';
      if (this.state.status !== 'cancelled') {
        this.cancel(this.state.currentLevel);
      }
    } else if (this.halted) {
      status = 'halted';
      const cap = this.options.config.maxTotalAttempts;
      for (const item of this.state.items) {
        if (TERMINAL_STATUSES.has(item.status)) {
          continue;
        }
        this.emit({
          type: 'item.failed',
          payload: {
            itemIndex: item.index,
            level: item.level ?? 0,
            attempts: item.attempts.length,
            reasons: [...accumulatedReasons(item), `total attempt budget of ${cap} exhausted`],
          },
        });
      }
    }

    const count = (s: string): number => this.state.items.filter((item) => item.status === s).length;
    const durationMs = Date.now() - startTime;
    this.emit({
      type: 'execution.completed',
      payload: {
        status,
        approved: count('approved'),
        failed: count('failed'),
        skipped: count('skipped'),
        cancelled: count('cancelled'),
        durationMs,
      },
    });
    log.info(
      { executionId: this.options.executionId, status, approved: count('approved'), failed: count('failed'), durationMs },
      'Execution finished'
    );
    return status;
  }

  private buildResult(
    graph: DependencyGraph,
    levelContexts: readonly LevelContext[],
    status: RunStatus,
    durationMs: number
  ): RunResult {
    const items: ItemResult[] = this.state.items.map((item) => ({
      index: item.index,
      text: graph.nodes[item.index]?.text ?? '',
      status: item.status,
      level: item.level,
      attempts: item.attempts.length,
      reasons: accumulatedReasons(item),
      highestStage: item.highestStage,
      reducedConfidence: item.reducedConfidence,
      verdict: this.verdicts.get(item.index) ?? null,
    }));

    return {
      executionId: this.options.executionId,
      specId: this.specification.metadata.specId,
      status,
      graph,
      items,
      levelContexts,
      counts: {
        approved: items.filter((i) => i.status === 'approved').length,
        failed: items.filter((i) => i.status === 'failed').length,
        skipped: items.filter((i) => i.status === 'skipped').length,
        cancelled: items.filter((i) => i.status === 'cancelled').length,
      },
      durationMs,
      state: this.state,
    };
  }
}
