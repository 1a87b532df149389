/**
 * Supabase implementation of IModerationLogRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IModerationLogRepository } from './IModerationLogRepository.js';
import type { ModerationLogRow } from '../types/database.js';

export class SupabaseModerationLogRepository implements IModerationLogRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<ModerationLogRow, 'id' | 'created_at'>): Promise<ModerationLogRow> {
    const { data, error } = await this.db
      .from('moderation_logs')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert moderation log: ${error.message}`);
    return data as ModerationLogRow;
  }
}
