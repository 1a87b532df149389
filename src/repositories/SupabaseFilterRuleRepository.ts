/**
 * Supabase implementation of IFilterRuleRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IFilterRuleRepository } from './IFilterRuleRepository.js';
import type { ContentFilterRow } from '../types/database.js';
import type { ContentType } from '../types/models.js';

const SCOPE_COLUMNS: Record<ContentType, keyof ContentFilterRow> = {
  user_input: 'applies_to_input',
  ai_response: 'applies_to_output',
  faq_result: 'applies_to_kb',
};

export class SupabaseFilterRuleRepository implements IFilterRuleRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findActive(contentType: ContentType, language: string): Promise<ContentFilterRow[]> {
    const { data, error } = await this.db
      .from('content_filters')
      .select('*')
      .eq('is_active', true)
      .eq(SCOPE_COLUMNS[contentType], true)
      .in('language', [language, 'all']);

    if (error) throw new Error(`Failed to load filter rules: ${error.message}`);
    return (data ?? []) as ContentFilterRow[];
  }

  async insert(
    row: Omit<ContentFilterRow, 'id' | 'created_at' | 'updated_at'>
  ): Promise<ContentFilterRow> {
    const { data, error } = await this.db
      .from('content_filters')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert filter rule: ${error.message}`);
    return data as ContentFilterRow;
  }

  async findAll(): Promise<ContentFilterRow[]> {
    const { data, error } = await this.db
      .from('content_filters')
      .select('*')
      .order('created_at', { ascending: false });

    if (error) throw new Error(`Failed to list filter rules: ${error.message}`);
    return (data ?? []) as ContentFilterRow[];
  }
}
