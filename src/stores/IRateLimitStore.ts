/**
 * Fixed-window request counters keyed by caller and action.
 */

export interface RateLimitResult {
  /** Requests counted in the current window, including this one. */
  count: number;
  /** Unix time (seconds) at which the window resets. */
  resetAt: number;
}

export interface IRateLimitStore {
  increment(key: string, windowSeconds: number): Promise<RateLimitResult>;
}
