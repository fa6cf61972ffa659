/**
 * Retry budget and exponential cooldown for backends that fail to start.
 */

export interface BackoffOptions {
  /** Consecutive start failures tolerated before a reset is required. */
  maxAttempts?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
}

export const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  maxAttempts: 5,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Cooldown after a given (zero-based) failure number:
 * initialDelay * 2^attempt, capped at maxDelay.
 */
export function calculateBackoff(
  attempt: number,
  options?: BackoffOptions,
): number {
  const opts = { ...DEFAULT_BACKOFF, ...options };
  const delay = opts.initialDelayMs * Math.pow(2, Math.max(0, attempt));
  return Math.min(delay, opts.maxDelayMs);
}
