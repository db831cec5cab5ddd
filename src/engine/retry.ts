import type { RetrySettings } from "../types";

export type RandomFn = () => number;

/**
 * Delay before retry number `attempt` (1-based: the delay after the first
 * failed attempt is `computeBackoffDelay(1, ...)`).  Jitter spreads the value
 * uniformly over `±jitterFactor` of the capped delay.
 */
export function computeBackoffDelay(
  attempt: number,
  retry: RetrySettings,
  random: RandomFn = Math.random,
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = retry.baseDelayMs * retry.exponentialBase ** exponent;
  const capped = Math.min(raw, retry.maxDelayMs);
  if (!retry.jitter || retry.jitterFactor === 0) {
    return Math.round(capped);
  }

  const spread = capped * retry.jitterFactor;
  const jittered = capped + (random() * 2 - 1) * spread;
  return Math.max(0, Math.round(jittered));
}

export class RetryPolicy {
  private readonly retry: RetrySettings;
  private readonly random: RandomFn;

  constructor(retry: RetrySettings, random: RandomFn = Math.random) {
    this.retry = retry;
    this.random = random;
  }

  get maxAttempts(): number {
    return this.retry.maxAttempts;
  }

  shouldRetry(attemptsSoFar: number): boolean {
    return attemptsSoFar < this.retry.maxAttempts;
  }

  delayFor(attemptsSoFar: number): number {
    return computeBackoffDelay(attemptsSoFar, this.retry, this.random);
  }
}

/** Resolves after `ms`, or early (without rejecting) when `signal` aborts. */
export function sleepWithSignal(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(handle);
      resolve();
    };
    const handle = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
