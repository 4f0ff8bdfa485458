/**
 * Agent invocation types.
 *
 * The engine talks to the outside world only through AgentInvoker:
 * prompt text in, structured trace out.
 */

import type { AgentError } from './errors.js';
import type { AgentTrace } from './trace.js';

export interface InvocationContext {
  /** Appended to the agent's system prompt */
  systemPrompt?: string;
  /** Working directory for the session */
  cwd?: string;
  maxTurns?: number;
  /** Deadline for the whole session */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface AgentRequest {
  prompt: string;
  /** Tool names the session may use; empty means no tools */
  capabilities: readonly string[];
  context: InvocationContext;
}

export type AgentOutcome =
  | { success: true; trace: AgentTrace }
  | { success: false; error: AgentError };

export interface AgentInvoker {
  readonly name: string;
  invoke(request: AgentRequest): Promise<AgentOutcome>;
}
