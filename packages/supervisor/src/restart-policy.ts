/**
 * Restart policy for the supervised worker.
 *
 * - exponential backoff: attempt n waits initialDelayMs × 2^(n−1)
 * - cumulative budget: no restart once maxRestarts attempts have been made
 *
 * The delay is not capped. Growth is bounded by maxRestarts, which config
 * validation limits to MAX_RESTARTS_LIMIT.
 */

export interface RestartPolicy {
  maxRestarts: number;       // cumulative restart budget
  initialDelayMs: number;    // delay before the first restart
}

/** Backoff before restart attempt `attempt` (numbered from 1). */
export function restartDelay(attempt: number, initialDelayMs: number): number {
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new RangeError(`Restart attempt must be a positive integer, got ${attempt}`);
  }
  return initialDelayMs * 2 ** (attempt - 1);
}

/** Whether another restart is permitted after `restartCount` attempts. */
export function mayRestart(restartCount: number, maxRestarts: number): boolean {
  return restartCount < maxRestarts;
}

/** Every delay the policy would produce, in attempt order. */
export function restartSchedule(policy: RestartPolicy): number[] {
  const delays: number[] = [];
  for (let attempt = 1; mayRestart(attempt - 1, policy.maxRestarts); attempt++) {
    delays.push(restartDelay(attempt, policy.initialDelayMs));
  }
  return delays;
}
