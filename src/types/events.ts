/**
 * Execution Event Types
 *
 * Events the engine appends for every observable transition. Payloads are
 * plain JSON values so any sink can persist them unchanged.
 */

export const EventType = {
  EXECUTION_STARTED: 'execution.started',
  EXECUTION_COMPLETED: 'execution.completed',
  EXECUTION_CANCELLED: 'execution.cancelled',
  GRAPH_ANALYZED: 'graph.analyzed',
  GRAPH_DEGRADED: 'graph.degraded',
  LEVEL_STARTED: 'level.started',
  LEVEL_COMPLETED: 'level.completed',
  ITEM_STARTED: 'item.started',
  ITEM_DECOMPOSED: 'item.decomposed',
  ITEM_COMPLETED: 'item.completed',
  ITEM_APPROVED: 'item.approved',
  ITEM_FAILED: 'item.failed',
  ITEM_SKIPPED: 'item.skipped',
  CONFLICT_DETECTED: 'conflict.detected',
  CONFLICT_RESOLVED: 'conflict.resolved',
  EVALUATION_STAGE_COMPLETED: 'evaluation.stage_completed',
  CONSENSUS_VOTE_CAST: 'consensus.vote_cast',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export type RunStatus = 'completed' | 'cancelled' | 'halted';

export interface EventPayloads {
  'execution.started': {
    specId: string;
    goal: string;
    itemCount: number;
    maxAttemptsPerItem: number;
    ambiguityScore: number;
  };
  'execution.completed': {
    status: RunStatus;
    approved: number;
    failed: number;
    skipped: number;
    cancelled: number;
    durationMs: number;
  };
  'execution.cancelled': {
    level: number | null;
    pendingItems: number[];
  };
  'graph.analyzed': {
    levels: number[][];
    dependencies: { index: number; dependsOn: number[] }[];
    degraded: boolean;
  };
  'graph.degraded': {
    reason: string;
    itemCount: number;
  };
  'level.started': {
    level: number;
    itemIndices: number[];
  };
  'level.completed': {
    level: number;
    approved: number[];
    failed: number[];
    skipped: number[];
    conflictCount: number;
    rounds: number;
  };
  'item.started': {
    itemIndex: number;
    level: number;
    attempt: number;
    lateralPersona: string | null;
  };
  'item.decomposed': {
    itemIndex: number;
    attempt: number;
    subItems: string[];
  };
  'item.completed': {
    itemIndex: number;
    level: number;
    attempt: number;
    success: boolean;
    durationMs: number;
    filesWritten: string[];
    error: string | null;
  };
  'item.approved': {
    itemIndex: number;
    level: number;
    attempt: number;
    highestStage: number;
    reducedConfidence: boolean;
  };
  'item.failed': {
    itemIndex: number;
    level: number;
    attempts: number;
    reasons: string[];
  };
  'item.skipped': {
    itemIndex: number;
    level: number;
    reason: string;
  };
  'conflict.detected': {
    level: number;
    path: string;
    itemIndices: number[];
  };
  'conflict.resolved': {
    level: number;
    path: string;
    itemIndices: number[];
    description: string;
  };
  'evaluation.stage_completed': {
    itemIndex: number;
    attempt: number;
    stage: number;
    passed: boolean;
    reasons: string[];
  };
  'consensus.vote_cast': {
    itemIndex: number;
    attempt: number;
    role: string;
    decision: string;
    confidence: number;
  };
}

/**
 * An event before the sink assigns its envelope.
 */
export type EventInput = {
  [K in EventType]: { type: K; payload: EventPayloads[K] };
}[EventType];

export interface EventEnvelope {
  readonly id: string;
  /** Monotonically increasing per sink, starting at 1 */
  readonly sequence: number;
  /** Execution id the event belongs to */
  readonly aggregateId: string;
  readonly timestamp: string;
}

export type ExecutionEvent = EventInput & EventEnvelope;

/**
 * Write interface the engine depends on. Implementations decide storage;
 * the engine never reads events back through it.
 */
export interface EventSink {
  append(aggregateId: string, event: EventInput): ExecutionEvent;
}
