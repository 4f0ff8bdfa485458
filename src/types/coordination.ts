/**
 * Level coordination types.
 */

export interface FileConflict {
  readonly path: string;
  /** Distinct top-level item indices that wrote the path, ascending */
  readonly itemIndices: readonly number[];
  readonly resolved: boolean;
  readonly resolutionDescription: string | null;
}

export interface CoordinatorReview {
  readonly levelNumber: number;
  readonly conflicts: readonly FileConflict[];
  readonly summary: string;
  readonly fixesApplied: readonly string[];
  readonly warnings: readonly string[];
  /** False when the resolution session failed or did not run */
  readonly sessionSucceeded: boolean;
}

export interface ItemSummary {
  readonly itemIndex: number;
  readonly text: string;
  readonly success: boolean;
  /** Short excerpt of the final output */
  readonly keyOutput: string;
  readonly filesTouched: readonly string[];
}

export interface LevelContext {
  readonly levelNumber: number;
  readonly summaries: readonly ItemSummary[];
  readonly review: CoordinatorReview | null;
}
