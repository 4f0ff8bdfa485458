/**
 * Retry Policy Engine
 *
 * Retries backend calls that fail for transient reasons, with exponential
 * backoff and optional jitter.
 */

import { AgentErrorKind } from '../types/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('retry-policy');

/**
 * Configuration for retry behavior.
 */
export interface RetryPolicy {
  /** Maximum number of retry attempts (0 = no retries) */
  maxRetries: number;

  /** Initial backoff delay in milliseconds */
  backoffMs: number;

  /** Backoff multiplier for exponential backoff */
  backoffMultiplier: number;

  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number;

  /** Error kinds that are retryable */
  retryableErrors: AgentErrorKind[];

  /** Whether to add jitter to backoff (0-25% of backoff value) */
  jitter: boolean;
}

/**
 * Result of evaluating whether to retry.
 */
export interface RetryEvaluation {
  shouldRetry: boolean;

  /** Delay in milliseconds before retry (0 if shouldRetry is false) */
  delayMs: number;

  /** Human-readable reason for the decision */
  reason: string;
}

/**
 * Record of a single attempt.
 */
export interface RetryAttempt {
  /** Attempt number (0 = first attempt, 1 = first retry, etc.) */
  attempt: number;
  success: boolean;
  error: Error | null;
  durationMs: number;
  willRetry: boolean;
  nextRetryMs: number | null;
}

interface RetrySummary {
  attempts: RetryAttempt[];
  totalDurationMs: number;
  /** Number of retries performed (0 if succeeded on first try) */
  retriedCount: number;
}

export type RetryResult<T> =
  | (RetrySummary & { success: true; result: T })
  | (RetrySummary & { success: false; finalError: Error });

export interface RetryExecuteOptions {
  /** Called after each attempt (success or failure) */
  onAttempt?: (attempt: RetryAttempt) => void;
  /** Classify a thrown error */
  extractErrorKind?: (error: Error) => AgentErrorKind;
}

/**
 * Default retry policy for backend calls.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  backoffMs: 1000,
  backoffMultiplier: 2,
  maxBackoffMs: 30000,
  retryableErrors: [AgentErrorKind.TRANSIENT, AgentErrorKind.TIMEOUT, AgentErrorKind.PARSE],
  jitter: true,
};

/**
 * No retry policy - for deterministic testing or when retries are undesirable.
 */
export const NO_RETRY_POLICY: RetryPolicy = {
  maxRetries: 0,
  backoffMs: 0,
  backoffMultiplier: 0,
  maxBackoffMs: 0,
  retryableErrors: [],
  jitter: false,
};

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * RetryPolicyEngine - Executes operations with configurable retry logic.
 */
export class RetryPolicyEngine {
  private readonly policy: RetryPolicy;

  constructor(policy: RetryPolicy = DEFAULT_RETRY_POLICY) {
    this.policy = policy;
  }

  /**
   * Evaluate whether an error should trigger a retry.
   *
   * @param attemptCount - Number of attempts already made (0 = first attempt failed)
   */
  evaluateRetry(errorKind: AgentErrorKind, attemptCount: number): RetryEvaluation {
    if (attemptCount >= this.policy.maxRetries) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Max retries (${this.policy.maxRetries}) exhausted`,
      };
    }

    if (!this.isRetryable(errorKind)) {
      return {
        shouldRetry: false,
        delayMs: 0,
        reason: `Error kind '${errorKind}' is not retryable`,
      };
    }

    const delayMs = this.calculateBackoff(attemptCount);

    return {
      shouldRetry: true,
      delayMs,
      reason: `Retrying after ${delayMs}ms (attempt ${attemptCount + 1}/${this.policy.maxRetries})`,
    };
  }

  /**
   * Execute an operation with retry logic. The operation signals failure
   * by throwing.
   */
  async execute<T>(
    operation: () => Promise<T>,
    options: RetryExecuteOptions = {}
  ): Promise<RetryResult<T>> {
    const attempts: RetryAttempt[] = [];
    const startTime = Date.now();
    let lastError = new Error('Operation was not attempted');

    // maxRetries + 1 because first attempt is not a retry
    const maxAttempts = this.policy.maxRetries + 1;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const attemptStart = Date.now();

      try {
        const result = await operation();

        const attemptRecord: RetryAttempt = {
          attempt,
          success: true,
          error: null,
          durationMs: Date.now() - attemptStart,
          willRetry: false,
          nextRetryMs: null,
        };
        attempts.push(attemptRecord);
        options.onAttempt?.(attemptRecord);

        return {
          success: true,
          result,
          attempts,
          totalDurationMs: Date.now() - startTime,
          retriedCount: attempt,
        };
      } catch (error) {
        lastError = toError(error);

        const errorKind = options.extractErrorKind?.(lastError) ?? AgentErrorKind.TRANSIENT;
        const evaluation = this.evaluateRetry(errorKind, attempt);

        const attemptRecord: RetryAttempt = {
          attempt,
          success: false,
          error: lastError,
          durationMs: Date.now() - attemptStart,
          willRetry: evaluation.shouldRetry,
          nextRetryMs: evaluation.shouldRetry ? evaluation.delayMs : null,
        };
        attempts.push(attemptRecord);
        options.onAttempt?.(attemptRecord);

        if (evaluation.shouldRetry) {
          log.info(
            { attempt, nextRetryMs: evaluation.delayMs, reason: evaluation.reason },
            'Retrying operation'
          );
          await this.sleep(evaluation.delayMs);
        } else {
          log.warn({ attempt, reason: evaluation.reason }, 'No more retries, failing');
          break;
        }
      }
    }

    return {
      success: false,
      finalError: lastError,
      attempts,
      totalDurationMs: Date.now() - startTime,
      retriedCount: attempts.length - 1,
    };
  }

  isRetryable(errorKind: AgentErrorKind): boolean {
    return this.policy.retryableErrors.includes(errorKind);
  }

  /**
   * Calculate backoff delay for a given attempt number.
   *
   * @param attemptNumber - The attempt number (0 = first retry)
   */
  calculateBackoff(attemptNumber: number): number {
    const base = this.policy.backoffMs * Math.pow(this.policy.backoffMultiplier, attemptNumber);
    const capped = Math.min(base, this.policy.maxBackoffMs);

    if (this.policy.jitter) {
      const jitter = capped * 0.25 * Math.random();
      return Math.round(capped + jitter);
    }

    return Math.round(capped);
  }

  private sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Create a RetryPolicyEngine with custom policy.
 *
 * @param policy - Partial policy to merge with defaults
 */
export function createRetryPolicyEngine(policy?: Partial<RetryPolicy>): RetryPolicyEngine {
  return new RetryPolicyEngine({
    ...DEFAULT_RETRY_POLICY,
    ...policy,
  });
}
