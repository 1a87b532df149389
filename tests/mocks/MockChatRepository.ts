/**
 * In-memory mock for IChatRepository.
 */

import type { IChatRepository } from '../../src/repositories/IChatRepository.js';
import type {
  ChatMessageRow,
  ChatSessionRow,
  RequestLogRow,
} from '../../src/types/database.js';
import type { PaginationOptions } from '../../src/types/common.js';

export class MockChatRepository implements IChatRepository {
  readonly sessions = new Map<string, ChatSessionRow>();
  readonly messages: ChatMessageRow[] = [];
  readonly requestLogs: RequestLogRow[] = [];
  private nextId = 1;

  async findSession(id: string): Promise<ChatSessionRow | null> {
    return this.sessions.get(id) ?? null;
  }

  async createSession(id: string): Promise<ChatSessionRow> {
    const existing = this.sessions.get(id);
    if (existing) return existing;

    const now = new Date().toISOString();
    const row: ChatSessionRow = { id, created_at: now, last_activity_at: now };
    this.sessions.set(id, row);
    return row;
  }

  async appendMessage(row: Omit<ChatMessageRow, 'id' | 'created_at'>): Promise<ChatMessageRow> {
    const session = this.sessions.get(row.session_id);
    if (!session) throw new Error(`Session "${row.session_id}" not found`);

    const now = new Date().toISOString();
    const full: ChatMessageRow = { ...row, id: `message-${this.nextId++}`, created_at: now };
    this.messages.push(full);
    session.last_activity_at = now;
    return full;
  }

  async listMessages(sessionId: string, options: PaginationOptions): Promise<ChatMessageRow[]> {
    return this.messages
      .filter((m) => m.session_id === sessionId)
      .slice(options.offset, options.offset + options.limit);
  }

  async insertRequestLog(row: Omit<RequestLogRow, 'id' | 'created_at'>): Promise<RequestLogRow> {
    const full: RequestLogRow = {
      ...row,
      id: `log-${this.nextId++}`,
      created_at: new Date().toISOString(),
    };
    this.requestLogs.push(full);
    return full;
  }
}
