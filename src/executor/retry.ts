import { BackoffConfig, FixedDelayConfig } from "../config/pipeline-config.types";

/**
 * A retry policy is plain data plus a delay function, so callers can see
 * and test exactly how an operation is retried.
 */
export type RetryPolicy = {
  name: string;
  maxAttempts: number;
  /** delay before attempt `attempt + 1`, where `attempt` starts at 1 */
  delayMs(attempt: number): number;
};

export type RetryHooks = {
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

export function fixedDelay(cfg: FixedDelayConfig): RetryPolicy {
  return {
    name: "fixed",
    maxAttempts: cfg.maxAttempts,
    delayMs: () => cfg.delayMs,
  };
}

export function exponentialBackoff(cfg: BackoffConfig): RetryPolicy {
  return {
    name: "exponential",
    maxAttempts: cfg.maxAttempts,
    delayMs: (attempt) =>
      Math.min(cfg.initialDelayMs * Math.pow(cfg.multiplier, attempt - 1), cfg.maxDelayMs),
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs `fn` up to `policy.maxAttempts` times. The last error is rethrown
 * unchanged once attempts are exhausted.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  fn: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === policy.maxAttempts) break;

      const delay = policy.delayMs(attempt);
      hooks.onRetry?.(err, attempt, delay);
      if (delay > 0) await wait(delay);
    }
  }

  throw lastError;
}
