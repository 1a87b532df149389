/**
 * Moderation audit log. Append-only.
 */

import type { ModerationLogRow } from '../types/database.js';

export interface IModerationLogRepository {
  insert(row: Omit<ModerationLogRow, 'id' | 'created_at'>): Promise<ModerationLogRow>;
}
