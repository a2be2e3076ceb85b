/**
 * @module retry-engine
 * RetryExecutor re-runs a failed step according to an explicit policy,
 * with linear or exponential backoff and attempt recording.
 *
 * Retries are opt-in: without a policy a step runs exactly once.
 */

import type { RetryPolicy, AttemptResult } from './types.js';

/**
 * Parse a human-readable delay string ("2s", "500ms") into milliseconds.
 */
export function parseDelay(delay: string): number {
  const trimmed = delay.trim();

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  const match = trimmed.match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h)$/);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined) {
    throw new Error(`Invalid delay format: "${delay}". Expected "2s", "500ms", etc.`);
  }

  const multipliers: Record<string, number> = {
    ms: 1,
    s: 1000,
    m: 60_000,
    h: 3_600_000,
  };

  return Math.round(parseFloat(amount) * (multipliers[unit] ?? 1));
}

/**
 * Compute the delay for a given attempt based on the backoff strategy.
 *
 * @param baseDelayMs - Base delay in milliseconds
 * @param attempt - Current attempt number (1-based; delay applies before attempt 2+)
 * @param backoff - Backoff strategy
 * @param multiplier - Backoff multiplier (used by both linear and exponential)
 * @returns Delay in milliseconds
 */
export function computeBackoffDelay(
  baseDelayMs: number,
  attempt: number,
  backoff?: 'linear' | 'exponential',
  multiplier = 2,
): number {
  if (!backoff || attempt <= 1) {
    return baseDelayMs;
  }

  const retryIndex = attempt - 1;

  switch (backoff) {
    case 'linear':
      return baseDelayMs * retryIndex * multiplier;
    case 'exponential':
      return baseDelayMs * Math.pow(multiplier, retryIndex - 1);
  }
}

/** How one attempt ended */
export interface AttemptVerdict {
  passed: boolean;
  error?: string;
  /** False for failures a retry cannot fix (binding, cancellation) */
  retryable: boolean;
}

/** Result returned by RetryExecutor.execute() */
export interface RetryResult<T> {
  /** Value of the last attempt */
  value: T;
  passed: boolean;
  attempts: AttemptResult[];
  finalError?: string;
}

/**
 * RetryExecutor wraps an attempt function with retry logic.
 *
 * Attempts return a value that `classify` judges; the value of the last
 * attempt is returned with the attempt history.
 */
export class RetryExecutor {
  /**
   * Run `attemptFn` until it passes, a failure is not retryable, the
   * policy's attempts are used up or `signal` aborts.
   */
  async execute<T>(
    attemptFn: (attempt: number) => Promise<T>,
    classify: (value: T) => AttemptVerdict,
    policy?: RetryPolicy,
    signal?: AbortSignal,
  ): Promise<RetryResult<T>> {
    const maxAttempts = policy?.maxAttempts ?? 1;
    const baseDelayMs = policy ? parseDelay(policy.delay) : 0;
    const attempts: AttemptResult[] = [];

    for (let i = 1; ; i++) {
      const attemptStart = Date.now();
      const value = await attemptFn(i);
      const verdict = classify(value);

      attempts.push({
        attempt: i,
        passed: verdict.passed,
        error: verdict.error,
        duration: Date.now() - attemptStart,
        timestamp: attemptStart,
      });

      if (verdict.passed) {
        return { value, passed: true, attempts };
      }
      if (!verdict.retryable || i >= maxAttempts || signal?.aborted) {
        return { value, passed: false, attempts, finalError: verdict.error };
      }

      const delay = computeBackoffDelay(
        baseDelayMs,
        i,
        policy?.backoff,
        policy?.backoffMultiplier ?? 2,
      );
      await sleep(delay, signal);
      if (signal?.aborted) {
        return { value, passed: false, attempts, finalError: verdict.error };
      }
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Resolve the effective retry policy from step, scenario, and suite levels.
 * Priority: step-level > scenario-level > suite default.
 *
 * @returns The resolved policy, or undefined if no retry is configured
 */
export function resolveRetryPolicy(
  stepRetry?: RetryPolicy,
  scenarioRetry?: RetryPolicy,
  suiteRetry?: RetryPolicy,
): RetryPolicy | undefined {
  return stepRetry ?? scenarioRetry ?? suiteRetry;
}
