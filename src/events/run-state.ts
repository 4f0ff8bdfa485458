/**
 * Run State Projection
 *
 * Pure fold of execution events into run state. The orchestrator updates
 * its own state only through this reducer, so replaying a stored event
 * stream reproduces the live state exactly.
 */

import type { ExecutionEvent, RunStatus } from '../types/events.js';

export type ItemStatus = 'pending' | 'running' | 'approved' | 'failed' | 'skipped' | 'cancelled';

export interface AttemptRecord {
  readonly attempt: number;
  readonly lateralPersona: string | null;
  readonly reasons: readonly string[];
  readonly filesWritten: readonly string[];
}

export interface ItemState {
  readonly index: number;
  readonly status: ItemStatus;
  readonly level: number | null;
  readonly attempts: readonly AttemptRecord[];
  /** Reasons recorded with the terminal state */
  readonly finalReasons: readonly string[];
  readonly highestStage: number;
  readonly reducedConfidence: boolean;
}

export interface ConflictRecord {
  readonly level: number;
  readonly path: string;
  readonly itemIndices: readonly number[];
  readonly resolved: boolean;
  readonly description: string | null;
}

export interface RunState {
  readonly executionId: string | null;
  readonly specId: string | null;
  readonly status: 'idle' | 'running' | RunStatus;
  readonly items: readonly ItemState[];
  readonly levels: readonly (readonly number[])[];
  readonly degraded: boolean;
  readonly currentLevel: number | null;
  readonly completedLevels: readonly number[];
  readonly conflicts: readonly ConflictRecord[];
  readonly votesCast: number;
  readonly totalAttempts: number;
  readonly lastSequence: number;
}

export const INITIAL_RUN_STATE: RunState = {
  executionId: null,
  specId: null,
  status: 'idle',
  items: [],
  levels: [],
  degraded: false,
  currentLevel: null,
  completedLevels: [],
  conflicts: [],
  votesCast: 0,
  totalAttempts: 0,
  lastSequence: 0,
};

function pendingItem(index: number): ItemState {
  return {
    index,
    status: 'pending',
    level: null,
    attempts: [],
    finalReasons: [],
    highestStage: 0,
    reducedConfidence: false,
  };
}

function updateItem(state: RunState, index: number, update: (item: ItemState) => ItemState): RunState {
  const current = state.items[index];
  if (!current) {
    return state;
  }
  const items = [...state.items];
  items[index] = update(current);
  return { ...state, items };
}

function updateAttempt(
  item: ItemState,
  attempt: number,
  update: (record: AttemptRecord) => AttemptRecord
): ItemState {
  const position = item.attempts.findIndex((a) => a.attempt === attempt);
  const existing = item.attempts[position];
  if (!existing) {
    return item;
  }
  const attempts = [...item.attempts];
  attempts[position] = update(existing);
  return { ...item, attempts };
}

/**
 * Every reason recorded for an item across all its attempts, oldest first,
 * followed by terminal reasons that were not already recorded.
 */
export function accumulatedReasons(item: ItemState): string[] {
  const reasons = item.attempts.flatMap((a) => [...a.reasons]);
  for (const reason of item.finalReasons) {
    if (!reasons.includes(reason)) {
      reasons.push(reason);
    }
  }
  return reasons;
}

export function reduceRunState(state: RunState, event: ExecutionEvent): RunState {
  const next = applyEvent(state, event);
  return { ...next, lastSequence: event.sequence };
}

function applyEvent(state: RunState, event: ExecutionEvent): RunState {
  switch (event.type) {
    case 'execution.started':
      return {
        ...INITIAL_RUN_STATE,
        executionId: event.aggregateId,
        specId: event.payload.specId,
        status: 'running',
        items: Array.from({ length: event.payload.itemCount }, (_, i) => pendingItem(i)),
      };

    case 'graph.analyzed': {
      const items = state.items.map((item) => {
        const level = event.payload.levels.findIndex((members) => members.includes(item.index));
        return level === -1 ? item : { ...item, level };
      });
      return { ...state, items, levels: event.payload.levels, degraded: event.payload.degraded };
    }

    case 'graph.degraded':
      return { ...state, degraded: true };

    case 'level.started':
      return { ...state, currentLevel: event.payload.level };

    case 'level.completed':
      return {
        ...state,
        currentLevel: null,
        completedLevels: [...state.completedLevels, event.payload.level],
      };

    case 'item.started': {
      const { attempt, lateralPersona } = event.payload;
      const started = updateItem(state, event.payload.itemIndex, (item) => ({
        ...item,
        status: 'running',
        attempts: [...item.attempts, { attempt, lateralPersona, reasons: [], filesWritten: [] }],
      }));
      return { ...started, totalAttempts: state.totalAttempts + 1 };
    }

    case 'item.completed': {
      const { attempt, success, error, filesWritten } = event.payload;
      return updateItem(state, event.payload.itemIndex, (item) =>
        updateAttempt(item, attempt, (record) => ({
          ...record,
          filesWritten,
          reasons:
            success || error === null
              ? record.reasons
              : [...record.reasons, `attempt ${attempt} execution: ${error}`],
        }))
      );
    }

    case 'evaluation.stage_completed': {
      const { attempt, stage, passed, reasons } = event.payload;
      const updated = updateItem(state, event.payload.itemIndex, (item) => ({
        ...item,
        highestStage: Math.max(item.highestStage, stage),
      }));
      if (passed) {
        return updated;
      }
      return updateItem(updated, event.payload.itemIndex, (item) =>
        updateAttempt(item, attempt, (record) => ({
          ...record,
          reasons: [...record.reasons, ...reasons.map((r) => `attempt ${attempt} stage ${stage}: ${r}`)],
        }))
      );
    }

    case 'item.approved':
      return updateItem(state, event.payload.itemIndex, (item) => ({
        ...item,
        status: 'approved',
        highestStage: event.payload.highestStage,
        reducedConfidence: event.payload.reducedConfidence,
      }));

    case 'item.failed':
      return updateItem(state, event.payload.itemIndex, (item) => ({
        ...item,
        status: 'failed',
        finalReasons: event.payload.reasons,
      }));

    case 'item.skipped':
      return updateItem(state, event.payload.itemIndex, (item) => ({
        ...item,
        status: 'skipped',
        finalReasons: [event.payload.reason],
      }));

    case 'conflict.detected':
      return {
        ...state,
        conflicts: [
          ...state.conflicts,
          {
            level: event.payload.level,
            path: event.payload.path,
            itemIndices: event.payload.itemIndices,
            resolved: false,
            description: null,
          },
        ],
      };

    case 'conflict.resolved': {
      const { level, path, description } = event.payload;
      return {
        ...state,
        conflicts: state.conflicts.map((conflict): ConflictRecord =>
          conflict.level === level && conflict.path === path && !conflict.resolved
            ? { ...conflict, resolved: true, description }
            : conflict
        ),
      };
    }

    case 'consensus.vote_cast':
      return { ...state, votesCast: state.votesCast + 1 };

    case 'execution.cancelled':
      return {
        ...state,
        status: 'cancelled',
        items: state.items.map((item): ItemState =>
          item.status === 'pending' || item.status === 'running'
            ? { ...item, status: 'cancelled' }
            : item
        ),
      };

    case 'execution.completed':
      return { ...state, status: event.payload.status, currentLevel: null };

    case 'item.decomposed':
      return state;
  }
}

/**
 * Rebuild run state from a stored event stream.
 */
export function replayRunState(events: readonly ExecutionEvent[]): RunState {
  return events.reduce(reduceRunState, INITIAL_RUN_STATE);
}
