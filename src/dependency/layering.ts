/**
 * Topological layering of work items into execution levels.
 */

export interface LayeringResult {
  /** Levels in execution order, members ascending */
  levels: number[][];
  /** Dependencies actually honored, per item, ascending */
  dependencies: number[][];
  /** Edges dropped to break cycles, as [item, dependency] */
  brokenEdges: [number, number][];
}

/**
 * Keep only in-range, non-self dependencies, deduplicated and sorted.
 */
export function sanitizeDependencies(count: number, raw: ReadonlyMap<number, Iterable<number>>): number[][] {
  const dependencies: number[][] = [];
  for (let index = 0; index < count; index++) {
    const accepted = new Set<number>();
    for (const dep of raw.get(index) ?? []) {
      if (Number.isInteger(dep) && dep >= 0 && dep < count && dep !== index) {
        accepted.add(dep);
      }
    }
    dependencies.push([...accepted].sort((a, b) => a - b));
  }
  return dependencies;
}

/**
 * Kahn layering. Level k holds every item whose dependencies all sit in
 * levels below k. When no item is ready the remaining items form a cycle:
 * the lowest remaining index loses its dependencies on other remaining
 * items and layering continues.
 */
export function buildLevels(dependencies: readonly (readonly number[])[]): LayeringResult {
  const count = dependencies.length;
  const effective = dependencies.map((deps) => [...deps]);
  const brokenEdges: [number, number][] = [];
  const levels: number[][] = [];
  const placed = new Set<number>();
  const remaining = new Set<number>(Array.from({ length: count }, (_, i) => i));

  while (remaining.size > 0) {
    const ordered = [...remaining].sort((a, b) => a - b);
    let ready = ordered.filter((index) => (effective[index] ?? []).every((dep) => placed.has(dep)));

    if (ready.length === 0) {
      const victim = ordered[0];
      if (victim === undefined) {
        break;
      }
      const deps = effective[victim] ?? [];
      for (const dep of deps) {
        if (remaining.has(dep)) {
          brokenEdges.push([victim, dep]);
        }
      }
      effective[victim] = deps.filter((dep) => !remaining.has(dep));
      ready = ordered.filter((index) => (effective[index] ?? []).every((dep) => placed.has(dep)));
    }

    levels.push(ready);
    for (const index of ready) {
      remaining.delete(index);
      placed.add(index);
    }
  }

  return { levels, dependencies: effective, brokenEdges };
}
