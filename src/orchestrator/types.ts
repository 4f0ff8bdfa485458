/**
 * Run result types.
 */

import type { ItemStatus, RunState } from '../events/run-state.js';
import type {
  DependencyGraph,
  EvaluationVerdict,
  LevelContext,
  RunStatus,
} from '../types/index.js';

export interface ItemResult {
  readonly index: number;
  readonly text: string;
  readonly status: ItemStatus;
  readonly level: number | null;
  readonly attempts: number;
  /** Every reason recorded across all attempts, oldest first */
  readonly reasons: readonly string[];
  readonly highestStage: number;
  readonly reducedConfidence: boolean;
  /** Verdict of the last evaluated attempt */
  readonly verdict: EvaluationVerdict | null;
}

export interface RunCounts {
  readonly approved: number;
  readonly failed: number;
  readonly skipped: number;
  readonly cancelled: number;
}

export interface RunResult {
  readonly executionId: string;
  readonly specId: string;
  readonly status: RunStatus;
  readonly graph: DependencyGraph;
  readonly items: readonly ItemResult[];
  readonly levelContexts: readonly LevelContext[];
  readonly counts: RunCounts;
  readonly durationMs: number;
  /** Final projection of the run's events */
  readonly state: RunState;
}
