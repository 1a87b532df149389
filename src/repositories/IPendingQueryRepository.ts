/**
 * Unanswered-query ledger.
 */

import type { PendingQueryRow } from '../types/database.js';

export interface IPendingQueryRepository {
  /** Most recent record for the pair created at or after `since`, if any. */
  findRecent(queryText: string, sessionId: string, since: Date): Promise<PendingQueryRow | null>;

  /** Most recent record for the pair regardless of age. */
  findLatest(queryText: string, sessionId: string): Promise<PendingQueryRow | null>;

  insert(
    row: Omit<PendingQueryRow, 'id' | 'created_at' | 'promoted' | 'answer'>
  ): Promise<PendingQueryRow>;

  markPromoted(id: string, answer: string): Promise<void>;
}
