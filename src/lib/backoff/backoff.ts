/**
 * Exponential backoff between navigation retry attempts.
 */

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Upper bound for any single delay (ms) */
  maxDelayMs: number;
  /** Growth factor per attempt */
  multiplier: number;
  /** Random extra delay as a fraction of the base delay (0-1) */
  jitterFactor: number;
}

/**
 * Default retry backoff: 1s, doubling, capped at 10s, up to 10% jitter.
 */
export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
  multiplier: 2,
  jitterFactor: 0.1,
};

/**
 * Delay before retry `attempt` (0-indexed).
 *
 * @example
 * ```typescript
 * calculateBackoffMs(0); // ~1000ms
 * calculateBackoffMs(2); // ~4000ms
 * ```
 */
export const calculateBackoffMs = (
  attempt: number,
  config: BackoffConfig = DEFAULT_BACKOFF_CONFIG,
): number => {
  const { initialDelayMs, maxDelayMs, multiplier, jitterFactor } = config;

  const cappedDelayMs = Math.min(initialDelayMs * multiplier ** attempt, maxDelayMs);
  const jitter = cappedDelayMs * jitterFactor * Math.random();

  return Math.floor(cappedDelayMs + jitter);
};
