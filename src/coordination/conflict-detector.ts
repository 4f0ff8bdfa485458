/**
 * Conflict Detection Module
 *
 * Finds files written by more than one work item of the same level.
 * Pure: reads traces, makes no external calls.
 */

import * as path from 'node:path';
import type { ExecutionTrace, FileConflict } from '../types/index.js';
import { allInvocations, isWriteInvocation } from '../types/trace.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('conflict-detector');

export interface ConflictCheckResult {
  hasConflicts: boolean;
  conflicts: FileConflict[];
  /** Path -> items that wrote it, for every written path */
  writers: Map<string, number[]>;
}

/**
 * Collect, per path, the top-level items that wrote it. Sub-item writes
 * count for their parent item.
 */
export function collectWriters(traces: readonly ExecutionTrace[]): Map<string, number[]> {
  const writers = new Map<string, Set<number>>();
  for (const trace of traces) {
    for (const invocation of allInvocations(trace)) {
      if (!isWriteInvocation(invocation) || invocation.resourcePath === null) {
        continue;
      }
      const key = path.normalize(invocation.resourcePath);
      let items = writers.get(key);
      if (!items) {
        items = new Set<number>();
        writers.set(key, items);
      }
      items.add(trace.itemIndex);
    }
  }

  const result = new Map<string, number[]>();
  for (const [filePath, items] of writers) {
    result.set(filePath, [...items].sort((a, b) => a - b));
  }
  return result;
}

/**
 * Identity of a conflict within a level: the path and the items that wrote it.
 */
export function conflictKey(conflict: FileConflict): string {
  return `${conflict.path}|${conflict.itemIndices.join(',')}`;
}

export function detectConflicts(traces: readonly ExecutionTrace[]): ConflictCheckResult {
  const writers = collectWriters(traces);
  const conflicts: FileConflict[] = [];

  for (const filePath of [...writers.keys()].sort()) {
    const items = writers.get(filePath) ?? [];
    if (items.length >= 2) {
      conflicts.push({
        path: filePath,
        itemIndices: items,
        resolved: false,
        resolutionDescription: null,
      });
    }
  }

  if (conflicts.length > 0) {
    log.info(
      { conflictCount: conflicts.length, files: conflicts.map((c) => c.path) },
      'File conflicts detected'
    );
  }

  return { hasConflicts: conflicts.length > 0, conflicts, writers };
}
