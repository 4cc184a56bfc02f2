/**
 * Retry delay policies
 *
 * A DelayPolicy maps a 1-based attempt number to the delay before the next
 * attempt. Fetch retries use a fixed delay; network reconnection escalates
 * to a longer delay after a threshold.
 */

export type DelayPolicy = (attempt: number) => number;

export interface BackoffState {
  attempt: number;
  nextDelay: number;
  exhausted: boolean;
}

/**
 * Same delay for every attempt
 */
export function fixedDelay(ms: number): DelayPolicy {
  return () => ms;
}

/**
 * `delay` for the first `escalateAfter` attempts, `escalatedDelay` afterwards
 */
export function steppedDelay(options: {
  delay: number;
  escalatedDelay: number;
  escalateAfter: number;
}): DelayPolicy {
  return (attempt) =>
    attempt > options.escalateAfter ? options.escalatedDelay : options.delay;
}

/**
 * Attempt counter bound to a delay policy. An attempt beyond maxAttempts
 * is reported as exhausted.
 */
export function createBackoffController(
  policy: DelayPolicy,
  maxAttempts = Infinity
) {
  let attempt = 0;

  return {
    /** Record an attempt and return the delay before the next one */
    next: (): BackoffState => {
      attempt++;
      return {
        attempt,
        nextDelay: policy(attempt),
        exhausted: attempt > maxAttempts,
      };
    },
  };
}

export type BackoffController = ReturnType<typeof createBackoffController>;
