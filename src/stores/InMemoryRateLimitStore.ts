/**
 * Process-local rate limit counters. Used in tests and local runs;
 * counts are lost on cold start.
 */

import type { IRateLimitStore, RateLimitResult } from './IRateLimitStore.js';

export class InMemoryRateLimitStore implements IRateLimitStore {
  private windows = new Map<string, RateLimitResult>();

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const now = Math.floor(Date.now() / 1000);
    const current = this.windows.get(key);

    if (!current || now >= current.resetAt) {
      const fresh = { count: 1, resetAt: now + windowSeconds };
      this.windows.set(key, fresh);
      return { ...fresh };
    }

    current.count += 1;
    return { ...current };
  }

  reset(): void {
    this.windows.clear();
  }
}
