/**
 * Chat session, message and request-log data access interface.
 */

import type {
  ChatMessageRow,
  ChatSessionRow,
  RequestLogRow,
} from '../types/database.js';
import type { PaginationOptions } from '../types/common.js';

export interface IChatRepository {
  findSession(id: string): Promise<ChatSessionRow | null>;

  createSession(id: string): Promise<ChatSessionRow>;

  /** Append a message and bump the session's last_activity_at. */
  appendMessage(row: Omit<ChatMessageRow, 'id' | 'created_at'>): Promise<ChatMessageRow>;

  /** Messages of a session, oldest first. */
  listMessages(sessionId: string, options: PaginationOptions): Promise<ChatMessageRow[]>;

  insertRequestLog(row: Omit<RequestLogRow, 'id' | 'created_at'>): Promise<RequestLogRow>;
}
