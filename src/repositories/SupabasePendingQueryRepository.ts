/**
 * Supabase implementation of IPendingQueryRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IPendingQueryRepository } from './IPendingQueryRepository.js';
import type { PendingQueryRow } from '../types/database.js';

export class SupabasePendingQueryRepository implements IPendingQueryRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findRecent(
    queryText: string,
    sessionId: string,
    since: Date
  ): Promise<PendingQueryRow | null> {
    const { data, error } = await this.db
      .from('pending_queries')
      .select('*')
      .eq('query_text', queryText)
      .eq('session_id', sessionId)
      .gte('created_at', since.toISOString())
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to find pending query: ${error.message}`);
    return data as PendingQueryRow | null;
  }

  async findLatest(queryText: string, sessionId: string): Promise<PendingQueryRow | null> {
    const { data, error } = await this.db
      .from('pending_queries')
      .select('*')
      .eq('query_text', queryText)
      .eq('session_id', sessionId)
      .order('created_at', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to find pending query: ${error.message}`);
    return data as PendingQueryRow | null;
  }

  async insert(
    row: Omit<PendingQueryRow, 'id' | 'created_at' | 'promoted' | 'answer'>
  ): Promise<PendingQueryRow> {
    const { data, error } = await this.db
      .from('pending_queries')
      .insert({ ...row, promoted: false, answer: null })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert pending query: ${error.message}`);
    return data as PendingQueryRow;
  }

  async markPromoted(id: string, answer: string): Promise<void> {
    const { error } = await this.db
      .from('pending_queries')
      .update({ promoted: true, answer })
      .eq('id', id);

    if (error) throw new Error(`Failed to promote pending query: ${error.message}`);
  }
}
