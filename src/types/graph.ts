/**
 * Dependency graph over the work items of one specification.
 */

export interface WorkItemNode {
  /** Position of the item in the specification (0-based) */
  readonly index: number;
  readonly text: string;
  /** Indices this item depends on, ascending */
  readonly dependsOn: readonly number[];
  readonly finalDeliverable: boolean;
  readonly affectsOntology: boolean;
}

export interface DependencyGraph {
  /** Nodes in original item order */
  readonly nodes: readonly WorkItemNode[];
  /** Execution levels; members of one level run concurrently */
  readonly levels: readonly (readonly number[])[];
  /** True when the graph came from the single-level fallback */
  readonly degraded: boolean;
  readonly degradedReason: string | null;
}
