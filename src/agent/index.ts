export {
  ClaudeAgentInvoker,
  createClaudeAgentInvoker,
  buildQueryOptions,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_TURNS,
  type ClaudeAgentInvokerConfig,
} from './claude-agent-invoker.js';
export { TraceCollector, extractResourcePath } from './trace-collector.js';
export { callStructured, type StructuredCallOptions, type StructuredCallResult } from './structured-call.js';
export {
  RetryPolicyEngine,
  createRetryPolicyEngine,
  DEFAULT_RETRY_POLICY,
  NO_RETRY_POLICY,
  type RetryPolicy,
  type RetryResult,
  type RetryAttempt,
  type RetryEvaluation,
} from './retry-policy.js';
export {
  TASK_PROFILES,
  TASK_COMPLETE_MARKER,
  getTaskProfile,
  type TaskProfile,
  type TaskPromptInput,
} from './task-profiles.js';
export { invokeWithDeadline } from './deadline.js';
