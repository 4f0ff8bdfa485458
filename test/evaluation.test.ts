/**
 * Evaluation Pipeline Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { NO_RETRY_POLICY, createRetryPolicyEngine } from '../src/agent/retry-policy.js';
import { ConsensusEngine } from '../src/consensus/consensus-engine.js';
import {
  MechanicalEvaluator,
  ShellCheck,
  parseCheckProfile,
  parseCoverage,
  type MechanicalCheck,
} from '../src/evaluation/mechanical.js';
import { EvaluationPipeline, SEMANTIC_UNAVAILABLE, consensusReasons } from '../src/evaluation/pipeline.js';
import {
  SemanticEvaluator,
  buildSemanticPrompt,
  computeDrift,
  toSemanticResult,
} from '../src/evaluation/semantic.js';
import { evaluateTriggers } from '../src/evaluation/trigger.js';
import { CheckProfileError, AgentErrorKind } from '../src/types/errors.js';
import { CheckKind, EvaluationStage, TriggerCondition, VerdictOutcome } from '../src/types/index.js';
import { evaluationRequest, testNode, testSpecification } from './helpers/fixtures.js';
import { APPROVE_VOTE, SEMANTIC_PASS, ScriptedInvoker, fail, json, type Responder } from './helpers/scripted-invoker.js';

function staticCheck(name: string, passed: boolean, message = passed ? `${name} passed` : `${name} failed`): MechanicalCheck {
  return {
    name,
    kind: CheckKind.CUSTOM,
    run: async () => ({ name, kind: CheckKind.CUSTOM, passed, message, durationMs: 0 }),
  };
}

function createPipeline(
  invoker: ScriptedInvoker,
  checks: readonly MechanicalCheck[] = [staticCheck('build', true)]
): EvaluationPipeline {
  const specification = testSpecification();
  const retry = createRetryPolicyEngine(NO_RETRY_POLICY);
  return new EvaluationPipeline({
    mechanical: new MechanicalEvaluator({ checks, workspaceDir: os.tmpdir(), timeoutMs: 1000, coverageThreshold: 0.7 }),
    semantic: new SemanticEvaluator({ invoker, retry, specification, timeoutMs: 1000 }),
    consensus: new ConsensusEngine({ invoker, retry, specification, timeoutMs: 1000 }),
  });
}

const semantic = (overrides: Record<string, unknown>): Responder => () => json({ ...SEMANTIC_PASS, ...overrides });

describe('semantic scoring', () => {
  it('should combine drift with weights 0.5, 0.3 and 0.2', () => {
    const drift = computeDrift(0.5, 0.1, 0);

    expect(drift.combined).toBeCloseTo(0.28, 10);
    const clamped = computeDrift(2, -1, 0.5);
    expect([clamped.goal, clamped.constraints, clamped.schema]).toEqual([1, 0, 0.5]);
    expect(clamped.combined).toBeCloseTo(0.6, 10);
  });

  it('should fail a satisfaction of 0.6 even when compliant', () => {
    const result = toSemanticResult({ ...SEMANTIC_PASS, score: 0.6, schema_altered: false });

    expect(result.passed).toBe(false);
    expect(result.compliance).toBe(true);
  });

  it('should fail a non-compliant artifact above the threshold', () => {
    const result = toSemanticResult({ ...SEMANTIC_PASS, score: 0.95, ac_compliance: false, schema_altered: false });

    expect(result.passed).toBe(false);
  });

  it('should pass exactly at the threshold', () => {
    expect(toSemanticResult({ ...SEMANTIC_PASS, score: 0.8, schema_altered: false }).passed).toBe(true);
  });

  it('should render the item, goal, history and artifact into the prompt', () => {
    const prompt = buildSemanticPrompt(
      testSpecification(),
      evaluationRequest({ attempt: 2, history: ['attempt 1: lint: 2 errors'] })
    );

    expect(prompt.startsWith('Evaluate the following artifact.')).toBe(true);
    expect(prompt).toContain('## Work Item (#1)\nCreate the user model');
    expect(prompt).toContain('## Constraints\n- Keep the public API stable');
    expect(prompt).toContain('## Output Schema: UserService\n- users (table): Stored users');
    expect(prompt).toContain('## Evaluation Principles\n- correctness (weight 0.7): Does what it says');
    expect(prompt).toContain('## Exit Conditions\n- tests pass [criteria: npm test exits 0]');
    expect(prompt).toContain('## Previous Attempts\n- attempt 1: lint: 2 errors');
    expect(prompt).toContain('## Artifact (attempt 2 of 3)\n### Files Written\n- src/user.ts');
  });

  it('should call the backend without tools for one turn', async () => {
    const invoker = new ScriptedInvoker();
    const evaluator = new SemanticEvaluator({
      invoker,
      retry: createRetryPolicyEngine(NO_RETRY_POLICY),
      specification: testSpecification(),
      timeoutMs: 1000,
    });

    const outcome = await evaluator.evaluate(evaluationRequest());

    expect(outcome.success).toBe(true);
    const request = invoker.callsOf('semantic')[0]?.request;
    expect(request?.capabilities).toEqual([]);
    expect(request?.context.maxTurns).toBe(1);
  });
});

describe('evaluateTriggers', () => {
  const quiet = {
    finalDeliverable: false,
    schemaAltered: false,
    drift: 0.1,
    uncertainty: 0.1,
    lateralStrategyAdopted: false,
    affectsOntology: false,
  };

  it('should not fire for a quiet attempt', () => {
    expect(evaluateTriggers(quiet)).toEqual({ fired: false, conditions: [], reasons: [] });
  });

  it('should not fire at exactly the thresholds', () => {
    expect(evaluateTriggers({ ...quiet, drift: 0.3, uncertainty: 0.3 }).fired).toBe(false);
  });

  it('should list every fired condition in priority order', () => {
    const result = evaluateTriggers({
      finalDeliverable: true,
      schemaAltered: true,
      drift: 0.45,
      uncertainty: 0.5,
      lateralStrategyAdopted: true,
      affectsOntology: true,
    });

    expect(result.conditions).toEqual([
      TriggerCondition.FINAL_DELIVERABLE,
      TriggerCondition.SCHEMA_ALTERED,
      TriggerCondition.HIGH_DRIFT,
      TriggerCondition.HIGH_UNCERTAINTY,
      TriggerCondition.LATERAL_STRATEGY,
      TriggerCondition.ONTOLOGY_AFFECTING,
    ]);
    expect(result.reasons).toEqual([
      'final deliverable',
      'output schema altered',
      'drift 0.45 exceeds 0.3',
      'uncertainty 0.50 exceeds 0.3',
      'lateral strategy adopted',
      'item affects the ontology',
    ]);
  });

  it('should honor custom thresholds', () => {
    expect(evaluateTriggers({ ...quiet, drift: 0.2 }, { drift: 0.15, uncertainty: 0.9 }).conditions).toEqual([
      TriggerCondition.HIGH_DRIFT,
    ]);
  });
});

describe('mechanical checks', () => {
  let workDir: string;

  beforeAll(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'stratum-checks-'));
  });

  afterAll(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  const run = (check: ShellCheck, coverageThreshold = 0.7) =>
    check.run({ cwd: workDir, timeoutMs: 10000, coverageThreshold });

  it('should pass a command that exits 0', async () => {
    const result = await run(new ShellCheck({ name: 'build', kind: CheckKind.BUILD, command: 'echo compiled' }));

    expect(result).toMatchObject({ name: 'build', kind: CheckKind.BUILD, passed: true, message: 'build passed' });
  });

  it('should report the exit code and output tail of a failing command', async () => {
    const result = await run(
      new ShellCheck({ name: 'lint', kind: CheckKind.LINT, command: 'echo "2 problems" >&2; exit 3' })
    );

    expect(result.passed).toBe(false);
    expect(result.message).toBe('lint failed with exit code 3 (expected 0)\n2 problems');
  });

  it('should accept a non-zero expected exit code', async () => {
    const result = await run(
      new ShellCheck({ name: 'grep', kind: CheckKind.STATIC, command: 'exit 1', expectedExitCode: 1 })
    );

    expect(result.passed).toBe(true);
  });

  it('should run in the workspace directory', async () => {
    await fs.writeFile(path.join(workDir, 'marker.txt'), 'present');

    const result = await run(new ShellCheck({ name: 'marker', kind: CheckKind.CUSTOM, command: 'test -f marker.txt' }));

    expect(result.passed).toBe(true);
  });

  it('should compare coverage to the threshold', async () => {
    const check = new ShellCheck({ name: 'coverage', kind: CheckKind.COVERAGE, command: 'echo "TOTAL 120 30 75%"' });

    expect((await run(check, 0.7)).message).toBe('Coverage 75.0% meets threshold 70.0%');
    const below = await run(check, 0.8);
    expect(below.passed).toBe(false);
    expect(below.message).toBe('Coverage 75.0% below threshold 80.0%');
  });

  it('should fail a command that overruns its timeout', async () => {
    const result = await run(
      new ShellCheck({ name: 'slow', kind: CheckKind.TEST, command: 'exec sleep 5', timeoutMs: 100 })
    );

    expect(result.passed).toBe(false);
    expect(result.message).toBe('slow timed out after 100ms');
  });

  it('should run every check in order and passes only when all pass', async () => {
    const evaluator = new MechanicalEvaluator({
      checks: [staticCheck('lint', true), staticCheck('test', false, '1 failing')],
      workspaceDir: workDir,
      timeoutMs: 1000,
      coverageThreshold: 0.7,
    });

    const result = await evaluator.evaluate();

    expect(evaluator.checkCount).toBe(2);
    expect(result.passed).toBe(false);
    expect(result.checks.map((c) => c.name)).toEqual(['lint', 'test']);
  });

  it('should pass with no checks configured', async () => {
    const evaluator = new MechanicalEvaluator({ checks: [], workspaceDir: workDir, timeoutMs: 1000, coverageThreshold: 0.7 });

    expect(await evaluator.evaluate()).toEqual({ passed: true, checks: [] });
  });
});

describe('parseCoverage', () => {
  it('should prefer the TOTAL line', () => {
    expect(parseCoverage('Statements: 81.25%\nTOTAL 10 2 64%')).toBe(0.64);
  });

  it('should fall back to the first percentage', () => {
    expect(parseCoverage('All files | 12.5% |')).toBe(0.125);
  });

  it('should return null without a figure', () => {
    expect(parseCoverage('no numbers here')).toBeNull();
  });
});

describe('parseCheckProfile', () => {
  it('should build shell checks from YAML', () => {
    const checks = parseCheckProfile(
      [
        '- name: lint',
        '  kind: lint',
        '  command: npm run lint',
        '- name: tests',
        '  command: npm test',
        '  timeout_ms: 60000',
      ].join('\n')
    );

    expect(checks.map((c) => [c.name, c.kind, c.command])).toEqual([
      ['lint', CheckKind.LINT, 'npm run lint'],
      ['tests', CheckKind.CUSTOM, 'npm test'],
    ]);
  });

  it('should treat an empty document as no checks', () => {
    expect(parseCheckProfile('')).toEqual([]);
  });

  it('should list every invalid entry', () => {
    expect(() => parseCheckProfile('- name: lint\n- command: make\n', 'checks.yaml')).toThrow(CheckProfileError);

    let caught: unknown;
    try {
      parseCheckProfile('- name: lint\n', 'checks.yaml');
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CheckProfileError);
    if (caught instanceof CheckProfileError) {
      expect(caught.issues).toEqual(['0.command: Required']);
      expect(caught.path).toBe('checks.yaml');
    }
  });
});

describe('EvaluationPipeline', () => {
  it('should send a mechanical failure back for another attempt without a backend call', async () => {
    const invoker = new ScriptedInvoker();
    const pipeline = createPipeline(invoker, [staticCheck('lint', false, '2 errors')]);

    const verdict = await pipeline.evaluate(evaluationRequest({ attempt: 1 }));

    expect(invoker.calls).toHaveLength(0);
    expect(verdict.outcome).toBe(VerdictOutcome.RETRY);
    expect(verdict.highestStage).toBe(EvaluationStage.MECHANICAL);
    expect(verdict.reasons).toEqual(['lint: 2 errors']);
  });

  it('should fail a mechanical failure on the last attempt', async () => {
    const pipeline = createPipeline(new ScriptedInvoker(), [staticCheck('lint', false, '2 errors')]);

    const verdict = await pipeline.evaluate(evaluationRequest({ attempt: 3, maxAttempts: 3 }));

    expect(verdict.outcome).toBe(VerdictOutcome.FAILED);
  });

  it('should approve at stage 2 when nothing triggers consensus', async () => {
    const invoker = new ScriptedInvoker();
    const stages: [number, boolean][] = [];

    const verdict = await createPipeline(invoker).evaluate(evaluationRequest(), {
      onStageComplete: (stage, passed) => stages.push([stage, passed]),
    });

    expect(verdict.approved).toBe(true);
    expect(verdict.outcome).toBe(VerdictOutcome.APPROVED);
    expect(verdict.highestStage).toBe(EvaluationStage.SEMANTIC);
    expect(verdict.consensus).toBeNull();
    expect(stages).toEqual([
      [EvaluationStage.MECHANICAL, true],
      [EvaluationStage.SEMANTIC, true],
    ]);
  });

  it('should reject a satisfaction of 0.6 without escalating', async () => {
    const invoker = new ScriptedInvoker({
      semantic: semantic({ score: 0.6, ac_compliance: true, reasoning: 'the email field is missing' }),
    });

    const verdict = await createPipeline(invoker).evaluate(evaluationRequest());

    expect(verdict.approved).toBe(false);
    expect(verdict.outcome).toBe(VerdictOutcome.REJECTED);
    expect(verdict.highestStage).toBe(EvaluationStage.SEMANTIC);
    expect(verdict.reasons).toEqual(['satisfaction 0.60 below threshold 0.80', 'the email field is missing']);
    expect(invoker.callsOf('advocate')).toHaveLength(0);
  });

  it('should not escalate a combined drift of 0.28', async () => {
    const invoker = new ScriptedInvoker({
      semantic: semantic({ goal_drift: 0.5, constraint_drift: 0.1, schema_drift: 0 }),
    });

    const verdict = await createPipeline(invoker).evaluate(evaluationRequest());

    expect(verdict.semantic?.drift.combined).toBeCloseTo(0.28, 10);
    expect(verdict.triggers?.fired).toBe(false);
    expect(verdict.highestStage).toBe(EvaluationStage.SEMANTIC);
    expect(invoker.callsOf('judge')).toHaveLength(0);
  });

  it('should escalate high drift to consensus and reports every vote', async () => {
    const invoker = new ScriptedInvoker({ semantic: semantic({ goal_drift: 0.8 }) });
    const votes: string[] = [];

    const verdict = await createPipeline(invoker).evaluate(evaluationRequest(), {
      onVote: (vote) => votes.push(vote.role),
    });

    expect(verdict.triggers?.conditions).toEqual([TriggerCondition.HIGH_DRIFT]);
    expect(verdict.highestStage).toBe(EvaluationStage.CONSENSUS);
    expect(verdict.approved).toBe(true);
    expect(votes).toEqual(['advocate', 'critic', 'judge']);
  });

  it('should always escalate a final deliverable', async () => {
    const invoker = new ScriptedInvoker();

    const verdict = await createPipeline(invoker).evaluate(
      evaluationRequest({ item: testNode(0, { text: 'Publish the release', finalDeliverable: true }) })
    );

    expect(verdict.highestStage).toBe(EvaluationStage.CONSENSUS);
    expect(invoker.callsOf('judge')).toHaveLength(1);
  });

  it('should reject a missed acceptance criterion without consulting consensus', async () => {
    const invoker = new ScriptedInvoker({
      semantic: semantic({ score: 0.95, ac_compliance: false, reasoning: 'the email field is missing' }),
    });
    const stages: [number, boolean][] = [];

    const verdict = await createPipeline(invoker).evaluate(
      evaluationRequest({ item: testNode(0, { text: 'Publish the release', finalDeliverable: true }) }),
      { onStageComplete: (stage, passed) => stages.push([stage, passed]) }
    );

    expect(verdict.approved).toBe(false);
    expect(verdict.outcome).toBe(VerdictOutcome.REJECTED);
    expect(verdict.highestStage).toBe(EvaluationStage.SEMANTIC);
    expect(verdict.consensus).toBeNull();
    expect(verdict.triggers).toBeNull();
    expect(verdict.reasons).toEqual(['acceptance criterion not met', 'the email field is missing']);
    expect(stages).toEqual([
      [EvaluationStage.MECHANICAL, true],
      [EvaluationStage.SEMANTIC, false],
    ]);
    expect(invoker.callsOf('advocate')).toHaveLength(0);
    expect(invoker.callsOf('judge')).toHaveLength(0);
  });

  it('should let the judge overrule a passing stage 2', async () => {
    const invoker = new ScriptedInvoker({
      judge: () =>
        json({ decision: 'rejected', confidence: 0.8, rationale: 'too shallow', required_changes: ['add tests'] }),
    });

    const verdict = await createPipeline(invoker).evaluate(evaluationRequest({ lateralStrategyAdopted: true }));

    expect(verdict.approved).toBe(false);
    expect(verdict.outcome).toBe(VerdictOutcome.REJECTED);
    expect(verdict.reasons).toEqual(['consensus rejected: too shallow', 'required change: add tests']);
  });

  it('should reject when semantic evaluation is unavailable', async () => {
    const invoker = new ScriptedInvoker({ semantic: () => fail(AgentErrorKind.UNAVAILABLE) });

    const verdict = await createPipeline(invoker).evaluate(evaluationRequest());

    expect(verdict.outcome).toBe(VerdictOutcome.REJECTED);
    expect(verdict.reasons).toEqual([SEMANTIC_UNAVAILABLE]);
  });
});

describe('ConsensusEngine', () => {
  const createEngine = (invoker: ScriptedInvoker): ConsensusEngine =>
    new ConsensusEngine({
      invoker,
      retry: createRetryPolicyEngine(NO_RETRY_POLICY),
      specification: testSpecification(),
      timeoutMs: 1000,
    });
  const trigger = { fired: true, conditions: [TriggerCondition.FINAL_DELIVERABLE], reasons: ['final deliverable'] };

  it('should still decide with reduced confidence when the advocate fails', async () => {
    const invoker = new ScriptedInvoker({ advocate: () => fail(AgentErrorKind.TIMEOUT, 'advocate timed out') });

    const result = await createEngine(invoker).deliberate(evaluationRequest(), trigger);

    expect(result.approved).toBe(true);
    expect(result.reducedConfidence).toBe(true);
    expect(result.missingRoles).toEqual(['advocate']);
    expect(result.votes.map((v) => v.role)).toEqual(['critic', 'judge']);
    expect(invoker.callsOf('judge')[0]?.request.prompt).toContain(
      '### Advocate Position\nMISSING: the advocate could not be reached.'
    );
  });

  it('should give the judge both positions', async () => {
    const invoker = new ScriptedInvoker({
      critic: () =>
        json({ ...APPROVE_VOTE, decision: 'Conditional', rationale: 'only patches the symptom', is_root_solution: false }),
    });

    const result = await createEngine(invoker).deliberate(evaluationRequest(), trigger);

    expect(result.reducedConfidence).toBe(false);
    expect(result.votes[1]).toEqual({
      role: 'critic',
      decision: 'conditional',
      confidence: 0.9,
      rationale: 'only patches the symptom',
      requiredChanges: [],
      isRootSolution: false,
    });
    const judgePrompt = invoker.callsOf('judge')[0]?.request.prompt ?? '';
    expect(judgePrompt).toContain('This review was escalated because: final deliverable.');
    expect(judgePrompt).toContain(
      '### Critic Position\nDecision: conditional (confidence 0.90)\nonly patches the symptom\nAddresses root requirement: no'
    );
  });

  it('should be unavailable without advocate and critic', async () => {
    const invoker = new ScriptedInvoker({
      advocate: () => fail(AgentErrorKind.UNAVAILABLE),
      critic: () => fail(AgentErrorKind.UNAVAILABLE),
    });

    const result = await createEngine(invoker).deliberate(evaluationRequest(), trigger);

    expect(invoker.callsOf('judge')).toHaveLength(0);
    expect(result.approved).toBe(false);
    expect(result.missingRoles).toEqual(['advocate', 'critic', 'judge']);
    expect(consensusReasons(result)).toEqual(['consensus unavailable']);
  });

  it('should be unavailable when the judge fails', async () => {
    const invoker = new ScriptedInvoker({ judge: () => fail(AgentErrorKind.UNAVAILABLE) });

    const result = await createEngine(invoker).deliberate(evaluationRequest(), trigger);

    expect(result.approved).toBe(false);
    expect(result.votes.map((v) => v.role)).toEqual(['advocate', 'critic']);
    expect(result.missingRoles).toEqual(['judge']);
  });

  it('should run advocate and critic concurrently', async () => {
    let inFlight = 0;
    let peak = 0;
    const slowVote: Responder = async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 20));
      inFlight--;
      return json(APPROVE_VOTE);
    };
    const invoker = new ScriptedInvoker({ advocate: slowVote, critic: slowVote });

    await createEngine(invoker).deliberate(evaluationRequest(), trigger);

    expect(peak).toBe(2);
  });
});
