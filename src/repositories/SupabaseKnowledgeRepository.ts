/**
 * Supabase implementation of IKnowledgeRepository.
 * `faq` maps to the curated `faq_entries` table, `kb` to `knowledge_entries`.
 * Substring search runs in a Postgres function so the query text never has to
 * be escaped into a PostgREST filter string.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  IKnowledgeRepository,
  KnowledgeSearchOptions,
} from './IKnowledgeRepository.js';
import type { KnowledgeRow } from '../types/database.js';
import type { KnowledgeStore } from '../types/models.js';

const TABLES: Record<KnowledgeStore, string> = {
  faq: 'faq_entries',
  kb: 'knowledge_entries',
};

export class SupabaseKnowledgeRepository implements IKnowledgeRepository {
  constructor(private readonly db: SupabaseClient) {}

  async search(
    store: KnowledgeStore,
    options: KnowledgeSearchOptions
  ): Promise<KnowledgeRow[]> {
    const { data, error } = await this.db.rpc('search_knowledge', {
      target_store: store,
      search_query: options.query,
      filter_category: options.category ?? null,
      match_count: options.limit,
    });

    if (error) throw new Error(`Failed to search ${TABLES[store]}: ${error.message}`);
    return (data ?? []) as KnowledgeRow[];
  }

  async insert(
    store: KnowledgeStore,
    row: Omit<KnowledgeRow, 'id' | 'created_at' | 'usage_count' | 'last_used_at'>
  ): Promise<KnowledgeRow> {
    const { data, error } = await this.db
      .from(TABLES[store])
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert into ${TABLES[store]}: ${error.message}`);
    return data as KnowledgeRow;
  }

  async markUsed(store: KnowledgeStore, ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    const { error } = await this.db.rpc('mark_knowledge_used', {
      target_store: store,
      entry_ids: ids,
    });

    if (error) throw new Error(`Failed to mark ${TABLES[store]} used: ${error.message}`);
  }
}
