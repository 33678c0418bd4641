import type { Logger } from 'pino';
import { LLMRetryPolicy } from './types';
import { logger } from '../observability/logger';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** HTTP status carried by a provider error, if any */
export function getErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/** Wait before retry number `retry` (1 = first retry) */
export function retryDelayMs(policy: LLMRetryPolicy, retry: number): number {
  return policy.initialDelayMs * Math.pow(policy.expBase, retry - 1);
}

/**
 * Call the model service, retrying only errors whose HTTP status is in the
 * policy's retryable set. Anything else, or the last failure, is rethrown.
 */
export async function withLLMRetry<T>(
  call: () => Promise<T>,
  policy: LLMRetryPolicy,
  log: Logger = logger,
  sleep: Sleep = defaultSleep,
): Promise<T> {
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await call();
    } catch (err) {
      const status = getErrorStatus(err);
      const retryable = status !== undefined && policy.statusCodes.includes(status);
      if (!retryable || attempt >= attempts) throw err;

      const waitMs = retryDelayMs(policy, attempt);
      log.warn({ status, attempt, attempts, waitMs }, 'Model request failed; retrying');
      await sleep(waitMs);
    }
  }
}
