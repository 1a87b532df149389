/**
 * In-memory mock for IModerationLogRepository.
 */

import type { IModerationLogRepository } from '../../src/repositories/IModerationLogRepository.js';
import type { ModerationLogRow } from '../../src/types/database.js';

export class MockModerationLogRepository implements IModerationLogRepository {
  readonly events: ModerationLogRow[] = [];
  private nextId = 1;

  async insert(row: Omit<ModerationLogRow, 'id' | 'created_at'>): Promise<ModerationLogRow> {
    const full: ModerationLogRow = {
      ...row,
      id: `event-${this.nextId++}`,
      created_at: new Date().toISOString(),
    };
    this.events.push(full);
    return full;
  }
}
