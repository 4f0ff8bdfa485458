import { AgentError, AgentErrorKind } from '../types/errors.js';
import type { AgentInvoker, AgentOutcome, AgentRequest } from '../types/index.js';

/**
 * Invoke an agent under the request's deadline and cancellation signal.
 *
 * The outcome settles as a timeout or cancellation as soon as either
 * fires; a call that is still in flight is left to finish and its result
 * is discarded.
 */
export function invokeWithDeadline(invoker: AgentInvoker, request: AgentRequest): Promise<AgentOutcome> {
  const { timeoutMs, signal } = request.context;

  if (signal?.aborted) {
    return Promise.resolve({
      success: false,
      error: new AgentError(AgentErrorKind.CANCELLED, 'Invocation cancelled before start'),
    });
  }

  return new Promise<AgentOutcome>((resolve) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const onAbort = (): void => {
      finish({ success: false, error: new AgentError(AgentErrorKind.CANCELLED, 'Invocation cancelled') });
    };

    function finish(outcome: AgentOutcome): void {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve(outcome);
    }

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        finish({
          success: false,
          error: new AgentError(AgentErrorKind.TIMEOUT, `Invocation exceeded its ${timeoutMs}ms deadline`),
        });
      }, timeoutMs);
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    void invoker.invoke(request).then(finish, (error: unknown) => {
      finish({ success: false, error: AgentError.from(error) });
    });
  });
}
