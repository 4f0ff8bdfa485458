/**
 * Claude Agent Invoker
 *
 * AgentInvoker implementation over the Claude Agent SDK.
 */

import { query, type Options } from '@anthropic-ai/claude-agent-sdk';
import { AgentError, AgentErrorKind } from '../types/errors.js';
import type { AgentInvoker, AgentOutcome, AgentRequest } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { TraceCollector } from './trace-collector.js';

const logger = createLogger('agent:claude-invoker');

/**
 * Default timeout for one session (5 minutes)
 */
export const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

export const DEFAULT_MAX_TURNS = 50;

/**
 * Tools denied to sessions that were granted no capabilities.
 */
const TEXT_ONLY_DISALLOWED_TOOLS = [
  'Bash',
  'Write',
  'Edit',
  'MultiEdit',
  'NotebookEdit',
  'WebFetch',
  'WebSearch',
];

export interface ClaudeAgentInvokerConfig {
  defaultTimeoutMs?: number;
  defaultMaxTurns?: number;
  model?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Enable debug logging of all messages */
  debugMessages?: boolean;
}

/**
 * Build SDK options from an invocation request.
 */
export function buildQueryOptions(
  request: AgentRequest,
  config: ClaudeAgentInvokerConfig
): Options {
  const { context } = request;
  const textOnly = request.capabilities.length === 0;

  const options: Options = {
    maxTurns: context.maxTurns ?? config.defaultMaxTurns ?? DEFAULT_MAX_TURNS,
    // Required for headless execution
    permissionMode: 'bypassPermissions',
    allowDangerouslySkipPermissions: true,
    // Load project settings to respect CLAUDE.md files
    settingSources: ['project'],
  };

  if (textOnly) {
    options.disallowedTools = [...TEXT_ONLY_DISALLOWED_TOOLS];
  } else {
    options.allowedTools = [...request.capabilities];
  }

  if (context.cwd) {
    options.cwd = context.cwd;
  }

  if (config.model) {
    options.model = config.model;
  }

  options.systemPrompt = context.systemPrompt
    ? { type: 'preset', preset: 'claude_code', append: context.systemPrompt }
    : { type: 'preset', preset: 'claude_code' };

  if (config.env && Object.keys(config.env).length > 0) {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
    options.env = { ...env, ...config.env };
  }

  return options;
}

function classifyResultError(subtype: string): AgentErrorKind {
  return subtype === 'error_during_execution' || subtype === 'missing_result'
    ? AgentErrorKind.TRANSIENT
    : AgentErrorKind.UNAVAILABLE;
}

export class ClaudeAgentInvoker implements AgentInvoker {
  readonly name = 'claude-agent-sdk';

  private readonly config: ClaudeAgentInvokerConfig;

  constructor(config: ClaudeAgentInvokerConfig = {}) {
    this.config = config;
  }

  async invoke(request: AgentRequest): Promise<AgentOutcome> {
    const startTime = Date.now();
    const timeout = request.context.timeoutMs ?? this.config.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    const callerSignal = request.context.signal;

    if (callerSignal?.aborted) {
      return {
        success: false,
        error: new AgentError(AgentErrorKind.CANCELLED, 'Invocation cancelled before start'),
      };
    }

    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeout);
    const onCallerAbort = (): void => abortController.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });

    const options = buildQueryOptions(request, this.config);
    options.abortController = abortController;

    logger.debug(
      {
        cwd: options.cwd,
        maxTurns: options.maxTurns,
        allowedTools: options.allowedTools,
        timeout,
      },
      'Starting agent session'
    );

    const collector = new TraceCollector();

    try {
      for await (const message of query({ prompt: request.prompt, options })) {
        if (this.config.debugMessages) {
          logger.debug({ messageType: message.type }, 'SDK message received');
        }
        collector.process(message);
      }
    } catch (error) {
      if (callerSignal?.aborted) {
        return {
          success: false,
          error: new AgentError(AgentErrorKind.CANCELLED, 'Invocation cancelled'),
        };
      }
      if (abortController.signal.aborted) {
        logger.warn({ timeout }, 'Agent session timed out');
        return {
          success: false,
          error: new AgentError(AgentErrorKind.TIMEOUT, `Agent session timed out after ${timeout}ms`),
        };
      }
      const agentError = AgentError.from(error);
      logger.error({ error: agentError.message }, 'Agent session failed');
      return { success: false, error: agentError };
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }

    const durationMs = Date.now() - startTime;
    const failure = collector.getError();
    if (failure) {
      logger.warn({ subtype: failure.subtype, durationMs }, 'Agent session ended with error');
      return {
        success: false,
        error: new AgentError(classifyResultError(failure.subtype), failure.message),
      };
    }

    const trace = collector.toTrace(durationMs);
    logger.info(
      {
        sessionId: trace.sessionId,
        durationMs,
        toolCallCount: trace.invocations.length,
      },
      'Agent session completed'
    );

    return { success: true, trace };
  }
}

export function createClaudeAgentInvoker(config?: ClaudeAgentInvokerConfig): ClaudeAgentInvoker {
  return new ClaudeAgentInvoker(config);
}
