/**
 * In-process AgentInvoker stand-in for tests.
 *
 * Classifies each request by the prompt the engine sent and answers with
 * a scripted reply per request kind.
 */

import { AgentError, AgentErrorKind } from '../../src/types/errors.js';
import type {
  AgentInvoker,
  AgentOutcome,
  AgentRequest,
  ExecutionTrace,
  SubItemTrace,
  ToolInvocation,
} from '../../src/types/index.js';

export type RequestKind =
  | 'dependency'
  | 'decomposition'
  | 'task'
  | 'resolution'
  | 'semantic'
  | 'advocate'
  | 'critic'
  | 'judge';

export type Reply = AgentOutcome | Promise<AgentOutcome>;
export type Responder = (request: AgentRequest, call: RecordedCall) => Reply;

export interface RecordedCall {
  kind: RequestKind;
  /** Zero-based item index the prompt is about, when it names one */
  itemIndex: number | null;
  request: AgentRequest;
}

export function classify(request: AgentRequest): RequestKind {
  const { prompt } = request;
  if (prompt.startsWith('Determine the execution dependencies')) return 'dependency';
  if (prompt.startsWith('Decide whether this work item should be decomposed')) return 'decomposition';
  if (prompt.startsWith('Review the results of level')) return 'resolution';
  if (prompt.startsWith('Evaluate the following artifact.')) return 'semantic';
  if (prompt.startsWith('You are reviewing as the advocate')) return 'advocate';
  if (prompt.startsWith('You are reviewing as the critic')) return 'critic';
  if (prompt.startsWith('You are reviewing as the judge')) return 'judge';
  return 'task';
}

export function itemIndexOf(prompt: string): number | null {
  const match = /Work Item \(#(\d+)\)/.exec(prompt) ?? /Work Item (\d+)/.exec(prompt);
  return match?.[1] ? Number(match[1]) - 1 : null;
}

export function ok(output: string, invocations: ToolInvocation[] = []): AgentOutcome {
  return {
    success: true,
    trace: { invocations, output, sessionId: null, durationMs: 1 },
  };
}

export function fail(kind: AgentErrorKind, message = `${kind} failure`): AgentOutcome {
  return { success: false, error: new AgentError(kind, message) };
}

export function json(value: unknown): AgentOutcome {
  return ok(JSON.stringify(value));
}

export function write(path: string, toolName = 'Write'): ToolInvocation {
  return { toolName, input: { file_path: path }, success: true, resourcePath: path };
}

export function read(path: string): ToolInvocation {
  return { toolName: 'Read', input: { file_path: path }, success: true, resourcePath: path };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export const SEMANTIC_PASS = {
  score: 0.9,
  ac_compliance: true,
  uncertainty: 0.1,
  goal_drift: 0,
  constraint_drift: 0,
  schema_drift: 0,
  reasoning: 'meets the item',
};

export const APPROVE_VOTE = {
  decision: 'approved',
  confidence: 0.9,
  rationale: 'sound',
  required_changes: [],
};

const DEFAULTS: Record<RequestKind, Responder> = {
  dependency: () => json({ dependencies: [] }),
  decomposition: () => ok('ATOMIC'),
  task: () => ok('done [TASK_COMPLETE]'),
  resolution: () =>
    json({
      review_summary: 'merged the edits',
      fixes_applied: ['combined both changes'],
      warnings_for_next_level: [],
    }),
  semantic: () => json(SEMANTIC_PASS),
  advocate: () => json(APPROVE_VOTE),
  critic: () => json(APPROVE_VOTE),
  judge: () => json(APPROVE_VOTE),
};

export class ScriptedInvoker implements AgentInvoker {
  readonly name = 'scripted';
  readonly calls: RecordedCall[] = [];
  private readonly script: Partial<Record<RequestKind, Responder>>;

  constructor(script: Partial<Record<RequestKind, Responder>> = {}) {
    this.script = script;
  }

  async invoke(request: AgentRequest): Promise<AgentOutcome> {
    const kind = classify(request);
    const call: RecordedCall = { kind, itemIndex: itemIndexOf(request.prompt), request };
    this.calls.push(call);
    const responder = this.script[kind] ?? DEFAULTS[kind];
    return responder(request, call);
  }

  callsOf(kind: RequestKind): RecordedCall[] {
    return this.calls.filter((call) => call.kind === kind);
  }
}

export function itemTrace(
  itemIndex: number,
  invocations: ToolInvocation[] = [],
  output = 'done',
  subTraces: SubItemTrace[] = []
): ExecutionTrace {
  return { itemIndex, invocations, output, sessionId: null, durationMs: 1, subTraces };
}

export function subTrace(subIndex: number, invocations: ToolInvocation[], text = `part ${subIndex + 1}`): SubItemTrace {
  return { subIndex, text, invocations, output: `${text} done`, sessionId: null, durationMs: 1 };
}
