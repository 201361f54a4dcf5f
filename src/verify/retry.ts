import { setTimeout as sleep } from 'node:timers/promises';
import type { ProbeOutcome, RetryPolicy, Verifier } from '../types/probe.js';
import { logger } from '../utils/logger.js';

export interface VerifyAttempt {
  outcome: ProbeOutcome;
  /** Requests made, including the first */
  attempts: number;
}

/** Delay before retry number `attempt` (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const { type, delay, maxDelay } = policy.backoff;
  const raw = type === 'exponential' ? delay * 2 ** (attempt - 1) : delay;
  return Math.min(raw, maxDelay);
}

/**
 * Verifies `url`, retrying transient outcomes up to `policy.maxRetries`
 * times. When the budget runs out the last transient outcome is returned
 * as-is; the caller decides how to count it. Backoff waits end early on abort.
 */
export async function verifyWithRetry(
  verifier: Verifier,
  url: string,
  policy: RetryPolicy,
  signal?: AbortSignal,
): Promise<VerifyAttempt> {
  let attempts = 0;

  for (;;) {
    signal?.throwIfAborted();
    const outcome = await verifier.verify(url, signal);
    attempts++;

    if (outcome.kind !== 'transient' || attempts > policy.maxRetries) {
      if (outcome.kind === 'transient') {
        logger.debug({ url, attempts, reason: outcome.reason }, 'Retry budget exhausted');
      }
      return { outcome, attempts };
    }

    const delay = backoffDelay(policy, attempts);
    logger.debug(
      { url, attempt: attempts, maxRetries: policy.maxRetries, delay, reason: outcome.reason },
      'Transient failure, retrying',
    );
    if (delay > 0) await sleep(delay, undefined, { signal });
  }
}
