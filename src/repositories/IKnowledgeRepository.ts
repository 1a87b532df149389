/**
 * Knowledge data access interface.
 * One interface over both stores: `faq` (curated) and `kb` (auto-grown).
 */

import type { KnowledgeRow } from '../types/database.js';
import type { KnowledgeStore } from '../types/models.js';

export interface KnowledgeSearchOptions {
  /** Case-insensitive substring matched against question, answer and keywords. */
  query: string;
  category?: string;
  limit: number;
}

export interface IKnowledgeRepository {
  /** Active entries of one store matching the query, in store order. */
  search(store: KnowledgeStore, options: KnowledgeSearchOptions): Promise<KnowledgeRow[]>;

  insert(
    store: KnowledgeStore,
    row: Omit<KnowledgeRow, 'id' | 'created_at' | 'usage_count' | 'last_used_at'>
  ): Promise<KnowledgeRow>;

  /** Increment usage_count and set last_used_at for the given entries. */
  markUsed(store: KnowledgeStore, ids: string[]): Promise<void>;
}
