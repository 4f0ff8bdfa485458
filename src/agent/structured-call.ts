/**
 * Structured backend calls.
 *
 * One request, one JSON answer: invoke the agent, pull the JSON out of its
 * final text, validate it, and retry transient and parse failures under
 * the retry policy.
 */

import type { z } from 'zod';
import { AgentError, AgentErrorKind } from '../types/errors.js';
import type { AgentInvoker, InvocationContext } from '../types/index.js';
import { extractJson } from '../utils/json.js';
import { createLogger, truncateForLog } from '../utils/logger.js';
import { invokeWithDeadline } from './deadline.js';
import type { RetryPolicyEngine } from './retry-policy.js';

const log = createLogger('structured-call');

export interface StructuredCallOptions<T> {
  /** Short name of the call for logs */
  label: string;
  invoker: AgentInvoker;
  retry: RetryPolicyEngine;
  prompt: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  context: InvocationContext;
  capabilities?: readonly string[];
  /** Turns raw text into a candidate value; defaults to extractJson */
  extract?: (text: string) => unknown;
}

export type StructuredCallResult<T> =
  | { success: true; value: T; raw: string; attempts: number }
  | { success: false; error: AgentError; attempts: number };

function errorKindOf(error: Error): AgentErrorKind {
  return error instanceof AgentError ? error.kind : AgentErrorKind.TRANSIENT;
}

export async function callStructured<T>(options: StructuredCallOptions<T>): Promise<StructuredCallResult<T>> {
  const extract = options.extract ?? extractJson;

  const result = await options.retry.execute(
    async () => {
      if (options.context.signal?.aborted) {
        throw new AgentError(AgentErrorKind.CANCELLED, `${options.label} cancelled`);
      }

      const outcome = await invokeWithDeadline(options.invoker, {
        prompt: options.prompt,
        capabilities: options.capabilities ?? [],
        context: options.context,
      });
      if (!outcome.success) {
        throw outcome.error;
      }

      const raw = outcome.trace.output;
      const parsed = options.schema.safeParse(extract(raw));
      if (!parsed.success) {
        log.warn(
          { label: options.label, raw: truncateForLog(raw), issues: parsed.error.issues.length },
          'Unparseable backend response'
        );
        throw new AgentError(
          AgentErrorKind.PARSE,
          `${options.label}: response did not match the expected structure`,
          raw
        );
      }

      return { value: parsed.data, raw };
    },
    { extractErrorKind: errorKindOf }
  );

  if (result.success) {
    return { success: true, value: result.result.value, raw: result.result.raw, attempts: result.attempts.length };
  }

  return { success: false, error: AgentError.from(result.finalError), attempts: result.attempts.length };
}
