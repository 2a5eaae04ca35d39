export const MAX_RETRIES = 5;

// Index 0 is the wait after the first failed attempt.
const BACKOFF_SCHEDULE_SECONDS = [30, 120, 600, 1_800, 3_600] as const;

export type RetryDecision =
  | { exhausted: true }
  | { exhausted: false; delayMs: number; nextRetryTime: Date };

export function getBackoffDelayMs(attempt: number): number {
  if (!Number.isInteger(attempt) || attempt < 1 || attempt > BACKOFF_SCHEDULE_SECONDS.length) {
    throw new RangeError(`No backoff defined for attempt ${attempt}`);
  }

  return BACKOFF_SCHEDULE_SECONDS[attempt - 1] * 1000;
}

export function isRetryBudgetExhausted(retryCount: number): boolean {
  return retryCount >= MAX_RETRIES;
}

/**
 * Decides what follows a failed attempt, given the retry count that already
 * includes that failure.
 */
export function decideNextRetry(retryCount: number, now: Date): RetryDecision {
  if (isRetryBudgetExhausted(retryCount)) {
    return { exhausted: true };
  }

  const delayMs = getBackoffDelayMs(retryCount);
  return {
    exhausted: false,
    delayMs,
    nextRetryTime: new Date(now.getTime() + delayMs),
  };
}
