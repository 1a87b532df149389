/**
 * Supabase-backed rate limit counters.
 * `increment_rate_limit` upserts the counter row and returns it in one round trip.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IRateLimitStore, RateLimitResult } from './IRateLimitStore.js';
import type { RateLimitRow } from '../types/database.js';

export class SupabaseRateLimitStore implements IRateLimitStore {
  constructor(private readonly db: SupabaseClient) {}

  async increment(key: string, windowSeconds: number): Promise<RateLimitResult> {
    const { data, error } = await this.db
      .rpc('increment_rate_limit', {
        rate_key: key,
        window_seconds: windowSeconds,
      })
      .single();

    if (error) throw new Error(`Failed to increment rate limit: ${error.message}`);

    const row = data as RateLimitRow;
    return {
      count: row.count,
      resetAt: Math.floor(new Date(row.reset_at).getTime() / 1000),
    };
  }
}
