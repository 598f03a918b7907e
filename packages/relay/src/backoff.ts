export interface BackoffPolicy {
  minMs: number;
  maxMs: number;
  factor: number;
}

export const POLL_BACKOFF_POLICY: BackoffPolicy = {
  minMs: 1000,
  maxMs: 5000,
  factor: 2
};

export interface BackoffController {
  next: () => number;
  reset: () => void;
}

/**
 * Delay for the `attempt`-th consecutive empty poll (0-based), without jitter.
 */
export function computePollBackoffMs(
  attempt: number,
  policy: BackoffPolicy = POLL_BACKOFF_POLICY
): number {
  const min = Math.max(1, policy.minMs);
  const max = Math.max(min, policy.maxMs);

  return Math.min(max, min * policy.factor ** Math.max(0, attempt));
}

export function createBackoffController(
  policy: BackoffPolicy = POLL_BACKOFF_POLICY
): BackoffController {
  let attempt = 0;

  return {
    next(): number {
      const delayMs = computePollBackoffMs(attempt, policy);
      attempt += 1;
      return delayMs;
    },
    reset(): void {
      attempt = 0;
    }
  };
}

// Request retries: 1-based attempt, up to 20% jitter on top of the exponential delay.
export function computeExponentialBackoffMs(
  retryAttempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  randomFn: () => number
): number {
  const base = Math.max(1, baseDelayMs);
  const max = Math.max(base, maxDelayMs);
  const exponential = Math.min(max, base * 2 ** Math.max(0, retryAttempt - 1));
  const jitterWindow = Math.floor(exponential * 0.2);
  const jitter = Math.floor(randomFn() * (jitterWindow + 1));

  return Math.min(max, exponential + jitter);
}
