/**
 * Knowledge retrieval over the curated FAQ store and the auto-grown KB store,
 * plus the unanswered-query ledger that feeds new KB entries.
 *
 * Matching is substring-based and unranked: `contextFor` favours recall over
 * precision and may return loosely related entries.
 */

import type { IKnowledgeRepository } from '../repositories/IKnowledgeRepository.js';
import type { IPendingQueryRepository } from '../repositories/IPendingQueryRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { KnowledgeRow } from '../types/database.js';
import type {
  FaqEntryResponse,
  FaqSearchRequest,
  FaqSearchResponse,
} from '../types/api.js';
import type {
  KnowledgeEntry,
  KnowledgeSource,
  KnowledgeStore,
} from '../types/models.js';
import type { ContentModerator } from './ContentModerator.js';
import { categorize } from '../knowledge/categories.js';
import { detectLanguage } from '../moderation/language.js';

const DEFAULT_SEARCH_LIMIT = 5;
const CONTEXT_TOKEN_LIMIT = 2;
const DEFAULT_CONTEXT_ENTRIES = 3;
const LOOKUP_LIMIT = 20;

/** Same query from the same session within this window is recorded once. */
export const PENDING_DEDUP_WINDOW_MS = 60 * 60 * 1000;

export const LEARNED_CONFIDENCE = 0.8;

const KNOWLEDGE_SOURCES: readonly KnowledgeSource[] = ['manual', 'ai_generated', 'search_based'];

export interface SearchOptions {
  category?: string;
  limit?: number;
}

export class KnowledgeBaseService {
  constructor(
    private readonly knowledgeRepo: IKnowledgeRepository,
    private readonly pendingQueryRepo: IPendingQueryRepository,
    private readonly moderator: ContentModerator,
    private readonly logProvider: ILogProvider
  ) {}

  /**
   * Curated entries first, then auto-grown ones. Each store contributes at
   * most half the limit (at least one), and the merge is trimmed to `limit`.
   */
  async search(query: string, options: SearchOptions = {}): Promise<KnowledgeEntry[]> {
    if (query.trim().length === 0) return [];

    const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
    const perStore = Math.max(1, Math.floor(limit / 2));

    const [faqRows, kbRows] = await Promise.all([
      this.knowledgeRepo.search('faq', { query, category: options.category, limit: perStore }),
      this.knowledgeRepo.search('kb', { query, category: options.category, limit: perStore }),
    ]);

    return [
      ...faqRows.slice(0, perStore).map((row) => rowToEntry(row, 'faq')),
      ...kbRows.slice(0, perStore).map((row) => rowToEntry(row, 'kb')),
    ].slice(0, limit);
  }

  /** Entries to feed the LLM for a message, deduplicated in first-seen order. */
  async contextFor(
    message: string,
    maxEntries = DEFAULT_CONTEXT_ENTRIES
  ): Promise<KnowledgeEntry[]> {
    const collected: KnowledgeEntry[] = [];
    const seen = new Set<string>();

    for (const token of extractTokens(message, 2)) {
      const entries = await this.search(token, { limit: CONTEXT_TOKEN_LIMIT });

      for (const entry of entries) {
        const key = `${entry.store}:${entry.id}`;
        if (seen.has(key)) continue;
        seen.add(key);
        collected.push(entry);
        if (collected.length >= maxEntries) return collected;
      }
    }

    return collected;
  }

  /** FAQ search for the HTTP layer. Answers are moderated as `faq_result`. */
  async lookup(request: FaqSearchRequest): Promise<FaqSearchResponse> {
    const query = request.query.trim();
    if (query.length === 0) return { entries: [] };

    const found = await this.search(query, {
      category: request.category,
      limit: LOOKUP_LIMIT,
    });

    if (found.length === 0 && request.sessionId) {
      await this.recordUnanswered(query, request.sessionId, detectLanguage(query));
    }

    const entries: FaqEntryResponse[] = [];
    for (const entry of found) {
      const moderation = await this.moderator.filter(entry.answer, 'faq_result', {
        sessionId: request.sessionId ?? null,
        clientAddress: request.clientAddress ?? null,
      });
      if (moderation.action === 'blocked') continue;

      entries.push({
        id: entry.id,
        store: entry.store,
        question: entry.question,
        answer: moderation.isFiltered ? moderation.filteredText : entry.answer,
        category: entry.category,
        createdAt: entry.createdAt.toISOString(),
      });
    }

    return { entries };
  }

  /**
   * Record a query the knowledge stores could not answer.
   * Returns false when the same query was already recorded for the session
   * within the dedup window.
   */
  async recordUnanswered(
    queryText: string,
    sessionId: string,
    language: string
  ): Promise<boolean> {
    const since = new Date(Date.now() - PENDING_DEDUP_WINDOW_MS);
    const existing = await this.pendingQueryRepo.findRecent(queryText, sessionId, since);
    if (existing) return false;

    await this.pendingQueryRepo.insert({
      query_text: queryText,
      language,
      results_found: false,
      should_promote: true,
      session_id: sessionId,
    });

    this.logProvider.debug('Recorded unanswered query', { sessionId, language });
    return true;
  }

  /**
   * Turn an answered query into an auto-grown KB entry and mark the latest
   * matching pending query as promoted.
   */
  async learn(
    question: string,
    answer: string,
    sessionId: string,
    language: string
  ): Promise<KnowledgeEntry> {
    const row = await this.knowledgeRepo.insert('kb', {
      question,
      answer,
      category: categorize(question),
      keywords: extractTokens(question, 3).join(', '),
      language,
      source: 'ai_generated',
      confidence_score: LEARNED_CONFIDENCE,
      is_verified: false,
      is_active: true,
    });

    const pending = await this.pendingQueryRepo.findLatest(question, sessionId);
    if (pending && !pending.promoted) {
      await this.pendingQueryRepo.markPromoted(pending.id, answer);
    }

    this.logProvider.info('Learned knowledge entry', {
      entryId: row.id,
      category: row.category,
      sessionId,
    });

    return rowToEntry(row, 'kb');
  }

  async markUsed(entries: Array<Pick<KnowledgeEntry, 'store' | 'id'>>): Promise<void> {
    const byStore: Record<KnowledgeStore, string[]> = { faq: [], kb: [] };
    for (const entry of entries) byStore[entry.store].push(entry.id);

    await Promise.all([
      this.knowledgeRepo.markUsed('faq', byStore.faq),
      this.knowledgeRepo.markUsed('kb', byStore.kb),
    ]);
  }
}

// ── Helpers ──

/** Lower-cased whitespace tokens, edge punctuation trimmed, distinct, longer than `minLength`. */
export function extractTokens(text: string, minLength: number): string[] {
  const tokens = text
    .toLowerCase()
    .split(/\s+/)
    .map((token) => token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, ''))
    // Length is measured after trimming: "бал," is three letters, not four.
    .filter((token) => token.length > minLength);

  return [...new Set(tokens)];
}

function isKnowledgeSource(value: string): value is KnowledgeSource {
  return (KNOWLEDGE_SOURCES as readonly string[]).includes(value);
}

export function rowToEntry(row: KnowledgeRow, store: KnowledgeStore): KnowledgeEntry {
  return {
    id: row.id,
    store,
    question: row.question,
    answer: row.answer,
    category: row.category,
    keywords: row.keywords,
    language: row.language,
    source: isKnowledgeSource(row.source) ? row.source : 'manual',
    confidenceScore: row.confidence_score,
    isVerified: row.is_verified,
    isActive: row.is_active,
    usageCount: row.usage_count,
    lastUsedAt: row.last_used_at ? new Date(row.last_used_at) : null,
    createdAt: new Date(row.created_at),
  };
}
