/**
 * Level context: what a finished level hands to the next one.
 */

import type {
  CoordinatorReview,
  ExecutionTrace,
  ItemSummary,
  LevelContext,
} from '../types/index.js';
import { writtenPaths } from '../types/trace.js';
import { truncate } from '../utils/json.js';

export const MAX_KEY_OUTPUT_CHARS = 200;
export const MAX_LEVEL_CONTEXT_CHARS = 2000;
export const MAX_FILES_PER_ITEM = 5;
const MAX_ITEM_HEADER_CHARS = 60;

const COMPLETE_MARKER_PATTERN = /\[TASK_COMPLETE\]/g;

/**
 * Summarize one item from its trace. The key output is the tail of the
 * final message, where agents put their summary.
 */
export function summarizeTrace(trace: ExecutionTrace, text: string, success: boolean): ItemSummary {
  const output = trace.output.replace(COMPLETE_MARKER_PATTERN, '').trim();
  return {
    itemIndex: trace.itemIndex,
    text,
    success,
    keyOutput: output.slice(-MAX_KEY_OUTPUT_CHARS).trim(),
    filesTouched: writtenPaths(trace),
  };
}

export function createLevelContext(
  levelNumber: number,
  summaries: readonly ItemSummary[],
  review: CoordinatorReview | null
): LevelContext {
  const ordered = [...summaries].sort((a, b) => a.itemIndex - b.itemIndex);
  return { levelNumber, summaries: ordered, review };
}

/**
 * Render one level as prompt text. Empty when no item of the level succeeded.
 */
export function renderLevelContext(context: LevelContext): string {
  const successful = context.summaries.filter((s) => s.success);
  if (successful.length === 0) {
    return '';
  }

  const lines: string[] = [`### Level ${context.levelNumber + 1} results`];
  for (const summary of successful) {
    lines.push(`- Item ${summary.itemIndex + 1}: ${truncate(summary.text, MAX_ITEM_HEADER_CHARS)}`);
    if (summary.filesTouched.length > 0) {
      const shown = summary.filesTouched.slice(0, MAX_FILES_PER_ITEM).join(', ');
      const hidden = summary.filesTouched.length - MAX_FILES_PER_ITEM;
      lines.push(`  Files: ${shown}${hidden > 0 ? ` (+${hidden} more)` : ''}`);
    }
    if (summary.keyOutput) {
      lines.push(`  Result: ${summary.keyOutput}`);
    }
  }

  const review = context.review;
  if (review) {
    lines.push('', '#### Coordinator review', review.summary);
    if (review.warnings.length > 0) {
      lines.push('Warnings:');
      for (const warning of review.warnings) {
        lines.push(`- ${warning}`);
      }
    }
  }

  return truncate(lines.join('\n'), MAX_LEVEL_CONTEXT_CHARS);
}

/**
 * Render every earlier level for injection into a prompt.
 */
export function renderLevelContexts(contexts: readonly LevelContext[]): string {
  const sections = contexts.map(renderLevelContext).filter((text) => text.length > 0);
  if (sections.length === 0) {
    return '';
  }
  return ['## Previous Work', 'These items were completed in earlier levels:', '', ...sections].join('\n');
}

/**
 * Combine the reviews of several rounds of one level. The first review's
 * summary and session outcome lead; conflicts, fixes and warnings add up.
 */
export function mergeReviews(
  levelNumber: number,
  reviews: readonly CoordinatorReview[]
): CoordinatorReview | null {
  const [first, ...rest] = reviews;
  if (!first) {
    return null;
  }
  return rest.reduce<CoordinatorReview>(
    (merged, review) => ({
      ...merged,
      conflicts: [...merged.conflicts, ...review.conflicts],
      fixesApplied: [...merged.fixesApplied, ...review.fixesApplied],
      warnings: [...merged.warnings, ...review.warnings],
    }),
    { ...first, levelNumber }
  );
}
