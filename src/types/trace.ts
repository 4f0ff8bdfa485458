/**
 * Execution trace types: the structured record of what an agent session did.
 */

/**
 * Tools whose invocations count as writes for conflict detection.
 */
export const WRITE_TOOLS: ReadonlySet<string> = new Set(['Write', 'Edit', 'MultiEdit', 'NotebookEdit']);

export interface ToolInvocation {
  readonly toolName: string;
  readonly input: Readonly<Record<string, unknown>>;
  readonly success: boolean;
  /** File or resource the invocation targeted, when it had one */
  readonly resourcePath: string | null;
}

/**
 * Trace of a single agent session as returned by an invoker.
 */
export interface AgentTrace {
  readonly invocations: readonly ToolInvocation[];
  readonly output: string;
  readonly sessionId: string | null;
  readonly durationMs: number;
}

/**
 * Trace of one sub-item of a decomposed work item.
 */
export interface SubItemTrace extends AgentTrace {
  readonly subIndex: number;
  readonly text: string;
}

/**
 * Trace of one work item. For a decomposed item the item's own
 * invocations are empty and the work lives in subTraces.
 */
export interface ExecutionTrace extends AgentTrace {
  readonly itemIndex: number;
  readonly subTraces: readonly SubItemTrace[];
}

export function isWriteInvocation(invocation: ToolInvocation): boolean {
  return invocation.success && WRITE_TOOLS.has(invocation.toolName) && invocation.resourcePath !== null;
}

/**
 * Every invocation of a trace, the item's own first, then each sub-item's.
 */
export function allInvocations(trace: ExecutionTrace): ToolInvocation[] {
  const result = [...trace.invocations];
  for (const sub of trace.subTraces) {
    result.push(...sub.invocations);
  }
  return result;
}

/**
 * Distinct paths written by a trace, in first-write order.
 */
export function writtenPaths(trace: ExecutionTrace): string[] {
  const paths: string[] = [];
  for (const invocation of allInvocations(trace)) {
    if (isWriteInvocation(invocation) && invocation.resourcePath !== null && !paths.includes(invocation.resourcePath)) {
      paths.push(invocation.resourcePath);
    }
  }
  return paths;
}
