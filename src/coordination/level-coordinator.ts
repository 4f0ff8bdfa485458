/**
 * Level Coordinator
 *
 * Runs after every item of a level has returned. Detects write conflicts
 * between items and, only when there are any, starts one agent session
 * that inspects and reconciles the conflicting files.
 */

import * as path from 'node:path';
import { z } from 'zod';
import { invokeWithDeadline } from '../agent/deadline.js';
import type {
  AgentInvoker,
  CoordinatorReview,
  ExecutionTrace,
  FileConflict,
  InvocationContext,
  LevelContext,
} from '../types/index.js';
import { extractJsonObject, truncate } from '../utils/json.js';
import { createLogger, truncateForLog } from '../utils/logger.js';
import { conflictKey, detectConflicts } from './conflict-detector.js';
import { createLevelContext, renderLevelContext, summarizeTrace } from './level-context.js';

const log = createLogger('level-coordinator');

export const COORDINATOR_CAPABILITIES: readonly string[] = ['Read', 'Bash', 'Edit', 'Grep', 'Glob'];

const MAX_FALLBACK_SUMMARY_CHARS = 500;

const reviewResponseSchema = z.object({
  review_summary: z.string().default(''),
  fixes_applied: z.array(z.string()).default([]),
  warnings_for_next_level: z.array(z.string()).default([]),
  conflicts_resolved: z.array(z.string()).optional(),
});

export interface LevelCoordinatorOptions {
  invoker: AgentInvoker;
  timeoutMs: number;
  workspaceDir: string;
  maxTurns: number;
}

export interface CoordinateOptions {
  /** Item text per item index, used in summaries and prompts */
  itemTexts: ReadonlyMap<number, string>;
  /** False once this level already spent its resolution session */
  allowResolution?: boolean;
  /** Keys of conflicts reported in earlier rounds; only new ones are handled */
  reportedConflicts?: ReadonlySet<string>;
  signal?: AbortSignal;
  /** Called with the detected conflicts before any resolution starts */
  onConflictsDetected?: (conflicts: readonly FileConflict[]) => void;
}

/**
 * Whether a path the coordinator listed names the conflicting file: the
 * same normalized path, or a trailing part of it that starts at a separator.
 */
export function matchesConflictPath(listed: string, conflictPath: string): boolean {
  const candidate = listed.trim();
  if (candidate === '') {
    return false;
  }
  const normalized = path.normalize(candidate);
  return conflictPath === normalized || conflictPath.endsWith(`${path.sep}${normalized}`);
}

export function buildResolutionPrompt(
  levelNumber: number,
  conflicts: readonly FileConflict[],
  levelText: string
): string {
  const conflictLines = conflicts
    .map((c) => `- \`${c.path}\` modified by: ${c.itemIndices.map((i) => `Item ${i + 1}`).join(', ')}`)
    .join('\n');

  return `Review the results of level ${levelNumber + 1}, whose items ran in parallel.

## Level Results
${levelText || '(no summaries available)'}

## File Conflicts Detected
${conflictLines}

## Your Tasks
1. Read each conflicting file.
2. Run \`git diff\` where useful to see what each item changed.
3. Where changes from different items conflict or overwrote each other, reconcile them with the Edit tool so every item's intent is kept.
4. Reply with this JSON after finishing:

\`\`\`json
{
  "review_summary": "What you found",
  "fixes_applied": ["Description of each fix"],
  "warnings_for_next_level": ["Anything later items must know"],
  "conflicts_resolved": ["path/of/each/reconciled/file"]
}
\`\`\``;
}

function unresolvedReview(
  levelNumber: number,
  conflicts: readonly FileConflict[],
  summary: string
): CoordinatorReview {
  return {
    levelNumber,
    conflicts,
    summary,
    fixesApplied: [],
    warnings: conflicts.map((c) => `Unresolved conflict in ${c.path} between items ${c.itemIndices.map((i) => i + 1).join(', ')}`),
    sessionSucceeded: false,
  };
}

export class LevelCoordinator {
  private readonly options: LevelCoordinatorOptions;

  constructor(options: LevelCoordinatorOptions) {
    this.options = options;
  }

  async coordinate(
    levelNumber: number,
    traces: readonly ExecutionTrace[],
    options: CoordinateOptions
  ): Promise<LevelContext> {
    const summaries = traces.map((trace) =>
      summarizeTrace(trace, options.itemTexts.get(trace.itemIndex) ?? '', true)
    );
    const reported = options.reportedConflicts;
    const conflicts = detectConflicts(traces).conflicts.filter(
      (conflict) => reported === undefined || !reported.has(conflictKey(conflict))
    );

    if (conflicts.length === 0) {
      return createLevelContext(levelNumber, summaries, null);
    }

    options.onConflictsDetected?.(conflicts);

    if (options.allowResolution === false) {
      log.warn(
        { levelNumber, conflictCount: conflicts.length },
        'Conflicts detected after this level already ran its resolution session'
      );
      return createLevelContext(
        levelNumber,
        summaries,
        unresolvedReview(levelNumber, conflicts, 'Conflict resolution already ran for this level')
      );
    }

    const review = await this.resolve(
      levelNumber,
      conflicts,
      renderLevelContext(createLevelContext(levelNumber, summaries, null)),
      options.signal
    );
    return createLevelContext(levelNumber, summaries, review);
  }

  /**
   * One bounded session. Any failure leaves the conflicts unresolved and
   * turns them into warnings for the next level.
   */
  async resolve(
    levelNumber: number,
    conflicts: readonly FileConflict[],
    levelText: string,
    signal?: AbortSignal
  ): Promise<CoordinatorReview> {
    const startTime = Date.now();
    const context: InvocationContext = {
      cwd: this.options.workspaceDir,
      timeoutMs: this.options.timeoutMs,
      maxTurns: this.options.maxTurns,
      systemPrompt: 'You are the level coordinator. You reconcile edits made by parallel tasks to the same files.',
    };
    if (signal) {
      context.signal = signal;
    }

    log.info({ levelNumber, conflictCount: conflicts.length }, 'Starting conflict resolution session');

    const outcome = await invokeWithDeadline(this.options.invoker, {
      prompt: buildResolutionPrompt(levelNumber, conflicts, levelText),
      capabilities: COORDINATOR_CAPABILITIES,
      context,
    });

    if (!outcome.success) {
      log.warn(
        { levelNumber, kind: outcome.error.kind, error: outcome.error.message },
        'Conflict resolution session failed, proceeding with unresolved conflicts'
      );
      return unresolvedReview(levelNumber, conflicts, `Coordinator review failed: ${outcome.error.message}`);
    }

    const raw = outcome.trace.output;
    const parsed = reviewResponseSchema.safeParse(extractJsonObject(raw));
    if (!parsed.success) {
      log.warn({ levelNumber, raw: truncateForLog(raw) }, 'Unparseable coordinator response');
      return unresolvedReview(
        levelNumber,
        conflicts,
        truncate(raw.trim(), MAX_FALLBACK_SUMMARY_CHARS) || 'No review output'
      );
    }

    const data = parsed.data;
    const listed = data.conflicts_resolved;
    const fixNote = data.fixes_applied[0] ?? data.review_summary;
    const description = fixNote ? `Resolved by coordinator: ${fixNote}` : 'Resolved by coordinator';

    const updated: FileConflict[] = conflicts.map((conflict) => {
      const addressed = listed === undefined || listed.some((p) => matchesConflictPath(p, conflict.path));
      return addressed
        ? { ...conflict, resolved: true, resolutionDescription: description }
        : conflict;
    });

    const warnings = [...data.warnings_for_next_level];
    for (const conflict of updated) {
      if (!conflict.resolved) {
        warnings.push(`Unresolved conflict in ${conflict.path}`);
      }
    }

    log.info(
      {
        levelNumber,
        resolved: updated.filter((c) => c.resolved).length,
        total: updated.length,
        durationMs: Date.now() - startTime,
      },
      'Conflict resolution session completed'
    );

    return {
      levelNumber,
      conflicts: updated,
      summary: data.review_summary || 'Coordinator review completed',
      fixesApplied: data.fixes_applied,
      warnings,
      sessionSucceeded: true,
    };
  }
}

export function createLevelCoordinator(options: LevelCoordinatorOptions): LevelCoordinator {
  return new LevelCoordinator(options);
}
