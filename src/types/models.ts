/**
 * Domain models: core entities as the application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Moderation ──

export type FilterType = 'banned_word' | 'phrase' | 'pattern';
export type Severity = 'low' | 'medium' | 'high';
export type ModerationAction = 'warned' | 'censored' | 'blocked';
export type ContentType = 'user_input' | 'ai_response' | 'faq_result';

/** Language code of a rule or text; rules may also target `all`. */
export type LanguageCode = 'ru' | 'kk' | 'en';

export const FILTER_TYPES: readonly FilterType[] = ['banned_word', 'phrase', 'pattern'];
export const SEVERITIES: readonly Severity[] = ['low', 'medium', 'high'];

export interface ContentFilterRule {
  id: string;
  filterType: FilterType;
  pattern: string;
  severity: Severity;
  replacement: string;
  appliesToInput: boolean;
  appliesToOutput: boolean;
  appliesToKnowledgeBase: boolean;
  /** Language code, or `all`. */
  language: string;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

// ── Knowledge ──

/** Which of the two knowledge stores an entry lives in. */
export type KnowledgeStore = 'faq' | 'kb';
export type KnowledgeSource = 'manual' | 'ai_generated' | 'search_based';

export type KnowledgeCategory =
  | 'schedules'
  | 'documents'
  | 'scholarships'
  | 'exams'
  | 'administration'
  | 'general';

export interface KnowledgeEntry {
  id: string;
  store: KnowledgeStore;
  question: string;
  answer: string;
  category: string;
  keywords: string;
  language: string;
  source: KnowledgeSource;
  /** In [0, 1]. */
  confidenceScore: number;
  isVerified: boolean;
  isActive: boolean;
  usageCount: number;
  lastUsedAt: Date | null;
  createdAt: Date;
}

// ── Chat ──

export type MessageType = 'user' | 'assistant' | 'system';

/** One processed message exchange, persisted as a request log row. */
export interface ChatTurn {
  sessionId: string;
  userText: string;
  aiText: string;
  success: boolean;
  errorMessage: string;
  responseTimeSeconds: number;
  tokensUsed: number;
  moderated: boolean;
  usedKnowledge: Array<{ store: KnowledgeStore; id: string }>;
}

// ── Configuration ──

export type ConfigKind = 'provider' | 'model' | 'prompt';

export const CONFIG_KINDS: readonly ConfigKind[] = ['provider', 'model', 'prompt'];
