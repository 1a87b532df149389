/**
 * Configuration records (provider credentials, model settings, system prompts).
 * At most one record of each kind is active.
 */

import type {
  ModelConfigRow,
  ProviderConfigRow,
  SystemPromptRow,
} from '../types/database.js';
import type { ConfigKind } from '../types/models.js';

export interface IConfigRepository {
  getActiveProvider(): Promise<ProviderConfigRow | null>;

  getActiveModel(): Promise<ModelConfigRow | null>;

  getActivePrompt(promptType: string): Promise<SystemPromptRow | null>;

  /**
   * Atomically clear the active flag on every record of `kind` and set it on `id`.
   * Returns false when no record of that kind has the id.
   */
  setActive(kind: ConfigKind, id: string): Promise<boolean>;
}
