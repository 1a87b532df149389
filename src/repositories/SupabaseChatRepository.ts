/**
 * Supabase implementation of IChatRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IChatRepository } from './IChatRepository.js';
import type {
  ChatMessageRow,
  ChatSessionRow,
  RequestLogRow,
} from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export class SupabaseChatRepository implements IChatRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findSession(id: string): Promise<ChatSessionRow | null> {
    const { data, error } = await this.db
      .from('chat_sessions')
      .select('*')
      .eq('id', id)
      .maybeSingle();

    if (error) throw new Error(`Failed to find chat session: ${error.message}`);
    return data as ChatSessionRow | null;
  }

  async createSession(id: string): Promise<ChatSessionRow> {
    const { data, error } = await this.db
      .from('chat_sessions')
      .upsert({ id }, { onConflict: 'id', ignoreDuplicates: false })
      .select()
      .single();

    if (error) throw new Error(`Failed to create chat session: ${error.message}`);
    return data as ChatSessionRow;
  }

  async appendMessage(
    row: Omit<ChatMessageRow, 'id' | 'created_at'>
  ): Promise<ChatMessageRow> {
    const { data, error } = await this.db
      .from('chat_messages')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to append chat message: ${error.message}`);

    const { error: touchError } = await this.db
      .from('chat_sessions')
      .update({ last_activity_at: new Date().toISOString() })
      .eq('id', row.session_id);

    if (touchError)
      throw new Error(`Failed to touch chat session: ${touchError.message}`);
    return data as ChatMessageRow;
  }

  async listMessages(
    sessionId: string,
    options: PaginationOptions
  ): Promise<ChatMessageRow[]> {
    const { data, error } = await this.db
      .from('chat_messages')
      .select('*')
      .eq('session_id', sessionId)
      .order('created_at', { ascending: true })
      .range(options.offset, options.offset + options.limit - 1);

    if (error) throw new Error(`Failed to list chat messages: ${error.message}`);
    return (data ?? []) as ChatMessageRow[];
  }

  async insertRequestLog(
    row: Omit<RequestLogRow, 'id' | 'created_at'>
  ): Promise<RequestLogRow> {
    const { data, error } = await this.db
      .from('request_logs')
      .insert(row)
      .select()
      .single();

    if (error) throw new Error(`Failed to insert request log: ${error.message}`);
    return data as RequestLogRow;
  }
}
