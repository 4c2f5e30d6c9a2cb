import type { Logger } from "pino";
import { errorMessage } from "../errors";

export interface RetryPolicy {
  attempts: number;
  minDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions {
  policy: RetryPolicy;
  label: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  isRetryable?: (error: unknown) => boolean;
}

const BACKOFF_UNIT_MS = 1000;

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay after the `failedAttempt`-th failure (1-based): 1s, 2s, 4s, ...
 * clamped to the policy window.
 */
export function computeBackoffMs(policy: RetryPolicy, failedAttempt: number): number {
  const exponential = BACKOFF_UNIT_MS * 2 ** Math.max(0, failedAttempt - 1);
  return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, exponential));
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, options.policy.attempts);
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return await operation();
    } catch (error) {
      const retryable = options.isRetryable ? options.isRetryable(error) : true;
      if (!retryable || attempt >= attempts) {
        throw error;
      }

      const delayMs = computeBackoffMs(options.policy, attempt);
      options.logger?.warn(
        {
          err: errorMessage(error),
          attempt,
          maxAttempts: attempts,
          delayMs,
        },
        `Retrying ${options.label}`,
      );
      await wait(delayMs);
    }
  }
}
