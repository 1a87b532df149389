/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type {
  ConfigKind,
  FilterType,
  MessageType,
  ModerationAction,
  Severity,
} from './models.js';

// ── Requests ──

export interface FaqSearchRequest {
  query: string;
  category?: string;
  sessionId?: string;
  clientAddress?: string | null;
}

export interface CreateFilterRuleRequest {
  filterType: FilterType;
  pattern: string;
  severity: Severity;
  replacement?: string;
  appliesToInput?: boolean;
  appliesToOutput?: boolean;
  appliesToKnowledgeBase?: boolean;
  language?: string;
  isActive?: boolean;
}

// ── Chat ──

export type ChatOutcome =
  | 'answered'
  | 'invalid'
  | 'blocked'
  | 'provider_error'
  | 'internal_error';

export interface ChatSuccess {
  success: true;
  outcome: 'answered';
  message: string;
  responseTimeSeconds: number;
  tokensUsed: number;
  /** True when output moderation changed or flagged the answer. */
  moderated: boolean;
  knowledgeEntriesUsed: number;
  sessionId: string;
}

export interface ChatFailure {
  success: false;
  outcome: Exclude<ChatOutcome, 'answered'>;
  error: string;
  responseTimeSeconds: number;
  sessionId: string;
}

/** Result of handling one inbound message. `success` is authoritative. */
export type ChatResult = ChatSuccess | ChatFailure;

export interface ChatMessageResponse {
  id: string;
  type: MessageType;
  content: string;
  timestamp: string;
  responseTime: number | null;
  tokensUsed: number | null;
}

export interface ChatHistoryResponse {
  sessionId: string;
  messages: ChatMessageResponse[];
}

// ── Knowledge ──

export interface FaqEntryResponse {
  id: string;
  store: string;
  question: string;
  answer: string;
  category: string;
  createdAt: string;
}

export interface FaqSearchResponse {
  entries: FaqEntryResponse[];
}

// ── Moderation ──

export interface ModerationResult {
  filteredText: string;
  isFiltered: boolean;
  action: ModerationAction | null;
  matchedRuleIds: string[];
  severity: Severity | null;
  /** Language the rules were selected for (detected when `auto`). */
  language: string;
}

export interface FilterRuleResponse {
  id: string;
  filterType: FilterType;
  pattern: string;
  severity: Severity;
  replacement: string;
  appliesToInput: boolean;
  appliesToOutput: boolean;
  appliesToKnowledgeBase: boolean;
  language: string;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

// ── Configuration ──

export interface ActivateConfigResponse {
  kind: ConfigKind;
  id: string;
  isActive: true;
}

export interface ConfigStatusResponse {
  model: {
    name: string;
    modelName: string;
    maxTokens: number;
    temperature: number;
    isActive: boolean;
  };
  prompt: {
    name: string;
    type: string;
    isActive: boolean;
  };
  provider: {
    provider: string;
    url: string;
    isActive: boolean;
  };
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'UNAUTHORIZED'
  | 'NOT_FOUND'
  | 'PAYLOAD_TOO_LARGE'
  | 'RATE_LIMITED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
