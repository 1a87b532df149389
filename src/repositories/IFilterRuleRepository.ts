/**
 * Content filter rule data access interface.
 * Rules are administered externally; the moderation path only reads them.
 */

import type { ContentFilterRow } from '../types/database.js';
import type { ContentType } from '../types/models.js';

export interface IFilterRuleRepository {
  /**
   * Active rules whose scope covers `contentType` and whose language is
   * `language` or `all`. Order is not guaranteed.
   */
  findActive(contentType: ContentType, language: string): Promise<ContentFilterRow[]>;

  insert(
    row: Omit<ContentFilterRow, 'id' | 'created_at' | 'updated_at'>
  ): Promise<ContentFilterRow>;

  /** All rules, newest first. */
  findAll(): Promise<ContentFilterRow[]>;
}
