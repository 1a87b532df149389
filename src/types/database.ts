/**
 * Database row types. Mirror actual Supabase table schemas.
 * Kept separate so the database can evolve independently of domain models.
 * Column names use snake_case to match PostgreSQL conventions.
 */

// ── Moderation ──

export interface ContentFilterRow {
  id: string;
  filter_type: string;
  pattern: string;
  severity: string;
  replacement: string;
  applies_to_input: boolean;
  applies_to_output: boolean;
  applies_to_kb: boolean;
  language: string;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface ModerationLogRow {
  id: string;
  original_text: string;
  modified_text: string;
  action: string;
  matched_rule_id: string | null;
  content_type: string;
  session_id: string | null;
  client_address: string | null;
  created_at: string;
}

// ── Knowledge ──

/** Shared shape of `faq_entries` and `knowledge_entries`. */
export interface KnowledgeRow {
  id: string;
  question: string;
  answer: string;
  category: string;
  keywords: string;
  language: string;
  source: string;
  confidence_score: number;
  is_verified: boolean;
  is_active: boolean;
  usage_count: number;
  last_used_at: string | null;
  created_at: string;
}

export interface PendingQueryRow {
  id: string;
  query_text: string;
  language: string;
  results_found: boolean;
  should_promote: boolean;
  promoted: boolean;
  answer: string | null;
  session_id: string;
  created_at: string;
}

// ── Chat ──

export interface ChatSessionRow {
  id: string;
  created_at: string;
  last_activity_at: string;
}

export interface ChatMessageRow {
  id: string;
  session_id: string;
  message_type: string;
  content: string;
  response_time: number | null;
  tokens_used: number | null;
  model_used: string | null;
  created_at: string;
}

export interface RequestLogRow {
  id: string;
  session_id: string | null;
  user_message: string;
  ai_response: string;
  response_time: number;
  api_success: boolean;
  error_message: string;
  tokens_used: number;
  moderated: boolean;
  faq_entry_ids: string[];
  kb_entry_ids: string[];
  created_at: string;
}

// ── Configuration ──

export interface ProviderConfigRow {
  id: string;
  provider: string;
  api_key: string;
  api_url: string;
  is_active: boolean;
}

export interface ModelConfigRow {
  id: string;
  name: string;
  model_name: string;
  max_tokens: number;
  temperature: number;
  top_p: number;
  repetition_penalty: number;
  is_active: boolean;
}

export interface SystemPromptRow {
  id: string;
  name: string;
  prompt_type: string;
  content: string;
  is_active: boolean;
}

// ── Rate Limiting ──

/** Row returned by the `increment_rate_limit` function. */
export interface RateLimitRow {
  count: number;
  reset_at: string;
}
