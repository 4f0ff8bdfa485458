/**
 * Level Coordination Tests
 */

import { describe, it, expect } from 'vitest';
import { conflictKey, detectConflicts } from '../src/coordination/conflict-detector.js';
import {
  createLevelContext,
  mergeReviews,
  renderLevelContext,
  renderLevelContexts,
  summarizeTrace,
} from '../src/coordination/level-context.js';
import { LevelCoordinator, matchesConflictPath } from '../src/coordination/level-coordinator.js';
import { AgentErrorKind } from '../src/types/errors.js';
import type { CoordinatorReview, FileConflict } from '../src/types/index.js';
import {
  ScriptedInvoker,
  fail,
  itemTrace,
  json,
  ok,
  read,
  subTrace,
  write,
} from './helpers/scripted-invoker.js';

function createCoordinator(invoker: ScriptedInvoker): LevelCoordinator {
  return new LevelCoordinator({ invoker, timeoutMs: 1000, workspaceDir: '/tmp/ws', maxTurns: 5 });
}

const itemTexts = new Map<number, string>([
  [0, 'Add logging settings'],
  [1, 'Add cache settings'],
  [2, 'Write the README'],
]);

describe('detectConflicts', () => {
  it('should report a path written by two items', () => {
    const result = detectConflicts([
      itemTrace(0, [write('config.py')]),
      itemTrace(1, [write('config.py', 'Edit')]),
    ]);

    expect(result.hasConflicts).toBe(true);
    expect(result.conflicts).toEqual([
      { path: 'config.py', itemIndices: [0, 1], resolved: false, resolutionDescription: null },
    ]);
  });

  it('should ignore reads and paths written by one item', () => {
    const result = detectConflicts([
      itemTrace(0, [write('a.py'), read('b.py')]),
      itemTrace(1, [write('b.py')]),
    ]);

    expect(result.hasConflicts).toBe(false);
    expect(result.writers.get('b.py')).toEqual([1]);
  });

  it('should never conflict sub-items of the same parent', () => {
    const result = detectConflicts([
      itemTrace(0, [], 'merged', [subTrace(0, [write('shared.ts')]), subTrace(1, [write('shared.ts')])]),
    ]);

    expect(result.conflicts).toEqual([]);
  });

  it('should attribute sub-item writes of different parents to their parents', () => {
    const result = detectConflicts([
      itemTrace(0, [], 'merged', [subTrace(0, [write('shared.ts')])]),
      itemTrace(2, [], 'merged', [subTrace(1, [write('shared.ts')])]),
    ]);

    expect(result.conflicts.map((c) => c.itemIndices)).toEqual([[0, 2]]);
  });

  it('should normalize paths before grouping', () => {
    const result = detectConflicts([
      itemTrace(0, [write('src/./app.ts')]),
      itemTrace(1, [write('src/app.ts')]),
    ]);

    expect(result.conflicts.map((c) => c.path)).toEqual(['src/app.ts']);
  });

  it('should not count a write that failed', () => {
    const result = detectConflicts([
      itemTrace(0, [write('config.py')]),
      itemTrace(1, [{ ...write('config.py'), success: false }]),
    ]);

    expect(result.hasConflicts).toBe(false);
    expect(result.writers.get('config.py')).toEqual([0]);
  });
});

describe('matchesConflictPath', () => {
  it('should match the same path after normalizing', () => {
    expect(matchesConflictPath('src/./app.ts', 'src/app.ts')).toBe(true);
    expect(matchesConflictPath(' config.py ', 'config.py')).toBe(true);
  });

  it('should match a trailing part only at a separator', () => {
    expect(matchesConflictPath('data.py', 'src/data.py')).toBe(true);
    expect(matchesConflictPath('a.py', 'src/data.py')).toBe(false);
  });

  it('should never match an empty entry', () => {
    expect(matchesConflictPath('', 'config.py')).toBe(false);
    expect(matchesConflictPath('   ', 'config.py')).toBe(false);
  });
});

describe('LevelCoordinator', () => {
  it('should make no backend call for a conflict-free level', async () => {
    const invoker = new ScriptedInvoker();

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(0, [write('a.py')]), itemTrace(1, [write('b.py')])],
      { itemTexts }
    );

    expect(invoker.calls).toHaveLength(0);
    expect(context.review).toBeNull();
    expect(context.summaries.map((s) => s.itemIndex)).toEqual([0, 1]);
  });

  it('should resolve an additive conflict on config.py', async () => {
    const invoker = new ScriptedInvoker();
    const detected: FileConflict[] = [];

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(1, [write('config.py')]), itemTrace(0, [write('config.py')])],
      { itemTexts, onConflictsDetected: (conflicts) => detected.push(...conflicts) }
    );

    expect(invoker.callsOf('resolution')).toHaveLength(1);
    expect(detected).toEqual([
      { path: 'config.py', itemIndices: [0, 1], resolved: false, resolutionDescription: null },
    ]);
    expect(context.review?.conflicts).toEqual([
      {
        path: 'config.py',
        itemIndices: [0, 1],
        resolved: true,
        resolutionDescription: 'Resolved by coordinator: combined both changes',
      },
    ]);
    expect(context.review?.sessionSucceeded).toBe(true);
  });

  it('should give the session read, inspect and edit tools and the conflict list', async () => {
    const invoker = new ScriptedInvoker();

    await createCoordinator(invoker).coordinate(
      2,
      [itemTrace(0, [write('config.py')]), itemTrace(1, [write('config.py')])],
      { itemTexts }
    );

    const request = invoker.callsOf('resolution')[0]?.request;
    expect(request?.capabilities).toEqual(['Read', 'Bash', 'Edit', 'Grep', 'Glob']);
    expect(request?.prompt).toContain('- `config.py` modified by: Item 1, Item 2');
    expect(request?.context.cwd).toBe('/tmp/ws');
  });

  it('should only mark the conflicts the session reports as resolved', async () => {
    const invoker = new ScriptedInvoker({
      resolution: () =>
        json({
          review_summary: 'fixed one',
          fixes_applied: [],
          warnings_for_next_level: ['check b.py'],
          conflicts_resolved: ['a.py'],
        }),
    });

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(0, [write('a.py'), write('b.py')]), itemTrace(1, [write('a.py'), write('b.py')])],
      { itemTexts }
    );

    expect(context.review?.conflicts.map((c) => [c.path, c.resolved])).toEqual([
      ['a.py', true],
      ['b.py', false],
    ]);
    expect(context.review?.conflicts[0]?.resolutionDescription).toBe('Resolved by coordinator: fixed one');
    expect(context.review?.warnings).toEqual(['check b.py', 'Unresolved conflict in b.py']);
  });

  it('should ignore empty and partial file names in the resolved list', async () => {
    const invoker = new ScriptedInvoker({
      resolution: () =>
        json({
          review_summary: 'fixed the config',
          conflicts_resolved: ['', 'a.py', 'config.py'],
        }),
    });

    const context = await createCoordinator(invoker).coordinate(
      0,
      [
        itemTrace(0, [write('data.py'), write('src/config.py')]),
        itemTrace(1, [write('data.py'), write('src/config.py')]),
      ],
      { itemTexts }
    );

    expect(context.review?.conflicts.map((c) => [c.path, c.resolved])).toEqual([
      ['data.py', false],
      ['src/config.py', true],
    ]);
    expect(context.review?.warnings).toEqual(['Unresolved conflict in data.py']);
  });

  it('should only handle conflicts not reported earlier in the level', async () => {
    const invoker = new ScriptedInvoker();
    const detected: FileConflict[] = [];
    const earlier: FileConflict = { path: 'config.py', itemIndices: [0, 1], resolved: false, resolutionDescription: null };

    const context = await createCoordinator(invoker).coordinate(
      0,
      [
        itemTrace(0, [write('config.py'), write('b.py')]),
        itemTrace(1, [write('config.py')]),
        itemTrace(2, [write('b.py')]),
      ],
      {
        itemTexts,
        reportedConflicts: new Set([conflictKey(earlier)]),
        onConflictsDetected: (conflicts) => detected.push(...conflicts),
      }
    );

    expect(detected.map((c) => [c.path, c.itemIndices])).toEqual([['b.py', [0, 2]]]);
    expect(invoker.callsOf('resolution')).toHaveLength(1);
    expect(invoker.callsOf('resolution')[0]?.request.prompt).not.toContain('`config.py`');
    expect(context.review?.conflicts.map((c) => c.path)).toEqual(['b.py']);
  });

  it('should make no call when every conflict was already reported', async () => {
    const invoker = new ScriptedInvoker();

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(0, [write('config.py')]), itemTrace(1, [write('config.py')])],
      { itemTexts, reportedConflicts: new Set(['config.py|0,1']) }
    );

    expect(invoker.calls).toHaveLength(0);
    expect(context.review).toBeNull();
  });

  it('should keep conflicts unresolved when the session fails', async () => {
    const invoker = new ScriptedInvoker({ resolution: () => fail(AgentErrorKind.UNAVAILABLE, 'no capacity') });

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(0, [write('config.py')]), itemTrace(1, [write('config.py')])],
      { itemTexts }
    );

    expect(context.review?.sessionSucceeded).toBe(false);
    expect(context.review?.summary).toBe('Coordinator review failed: no capacity');
    expect(context.review?.conflicts[0]?.resolved).toBe(false);
    expect(context.review?.warnings).toEqual(['Unresolved conflict in config.py between items 1, 2']);
  });

  it('should use the raw reply as summary when it is not JSON', async () => {
    const invoker = new ScriptedInvoker({ resolution: () => ok('I looked at the files and they are fine.') });

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(0, [write('config.py')]), itemTrace(1, [write('config.py')])],
      { itemTexts }
    );

    expect(context.review?.summary).toBe('I looked at the files and they are fine.');
    expect(context.review?.conflicts[0]?.resolved).toBe(false);
  });

  it('should not start a second session when resolution is not allowed', async () => {
    const invoker = new ScriptedInvoker();

    const context = await createCoordinator(invoker).coordinate(
      0,
      [itemTrace(0, [write('config.py')]), itemTrace(1, [write('config.py')])],
      { itemTexts, allowResolution: false }
    );

    expect(invoker.calls).toHaveLength(0);
    expect(context.review?.summary).toBe('Conflict resolution already ran for this level');
    expect(context.review?.sessionSucceeded).toBe(false);
  });
});

describe('level context', () => {
  it('should render item summaries for the next level', () => {
    const summary = summarizeTrace(
      itemTrace(0, [write('src/user.ts')], 'Created the model [TASK_COMPLETE]'),
      'Create the user model',
      true
    );
    const context = createLevelContext(0, [summary], null);

    expect(renderLevelContext(context)).toBe(
      ['### Level 1 results', '- Item 1: Create the user model', '  Files: src/user.ts', '  Result: Created the model'].join(
        '\n'
      )
    );
  });

  it('should limit files per item and appends review warnings', () => {
    const files = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((name) => write(`${name}.ts`));
    const review: CoordinatorReview = {
      levelNumber: 0,
      conflicts: [],
      summary: 'all merged',
      fixesApplied: [],
      warnings: ['keep a.ts stable'],
      sessionSucceeded: true,
    };
    const context = createLevelContext(0, [summarizeTrace(itemTrace(0, files, ''), 'many files', true)], review);

    expect(renderLevelContext(context)).toBe(
      [
        '### Level 1 results',
        '- Item 1: many files',
        '  Files: a.ts, b.ts, c.ts, d.ts, e.ts (+2 more)',
        '',
        '#### Coordinator review',
        'all merged',
        'Warnings:',
        '- keep a.ts stable',
      ].join('\n')
    );
  });

  it('should keep only the last 200 characters of the output', () => {
    const output = `${'x'.repeat(300)}END`;
    const summary = summarizeTrace(itemTrace(0, [], output), 'long', true);

    expect(summary.keyOutput).toHaveLength(200);
    expect(summary.keyOutput.endsWith('END')).toBe(true);
  });

  it('should truncate one level to 2000 characters', () => {
    const summaries = Array.from({ length: 30 }, (_, i) =>
      summarizeTrace(itemTrace(i, [], 'y'.repeat(200)), `item ${i}`, true)
    );
    const rendered = renderLevelContext(createLevelContext(0, summaries, null));

    expect(rendered).toHaveLength(2000);
    expect(rendered.endsWith('...')).toBe(true);
  });

  it('should skip failed items and empty levels', () => {
    const failed = summarizeTrace(itemTrace(0, [], 'partial'), 'broken', false);
    const contexts = [createLevelContext(0, [failed], null)];

    expect(renderLevelContext(contexts[0] ?? createLevelContext(0, [], null))).toBe('');
    expect(renderLevelContexts(contexts)).toBe('');
  });

  it('should merge reviews of several rounds', () => {
    const first: CoordinatorReview = {
      levelNumber: 1,
      conflicts: [{ path: 'a', itemIndices: [0, 1], resolved: true, resolutionDescription: 'done' }],
      summary: 'first',
      fixesApplied: ['fix a'],
      warnings: [],
      sessionSucceeded: true,
    };
    const later: CoordinatorReview = {
      levelNumber: 1,
      conflicts: [{ path: 'b', itemIndices: [0, 1], resolved: false, resolutionDescription: null }],
      summary: 'Conflict resolution already ran for this level',
      fixesApplied: [],
      warnings: ['Unresolved conflict in b between items 1, 2'],
      sessionSucceeded: false,
    };

    const merged = mergeReviews(1, [first, later]);

    expect(merged?.summary).toBe('first');
    expect(merged?.sessionSucceeded).toBe(true);
    expect(merged?.conflicts.map((c) => c.path)).toEqual(['a', 'b']);
    expect(merged?.warnings).toEqual(['Unresolved conflict in b between items 1, 2']);
    expect(mergeReviews(1, [])).toBeNull();
  });
});
