/**
 * Supabase implementation of IConfigRepository.
 * Activation goes through the `set_active_config` Postgres function, which
 * clears and sets the active flag inside one transaction.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IConfigRepository } from './IConfigRepository.js';
import type {
  ModelConfigRow,
  ProviderConfigRow,
  SystemPromptRow,
} from '../types/database.js';
import type { ConfigKind } from '../types/models.js';

export class SupabaseConfigRepository implements IConfigRepository {
  constructor(private readonly db: SupabaseClient) {}

  async getActiveProvider(): Promise<ProviderConfigRow | null> {
    const { data, error } = await this.db
      .from('provider_configs')
      .select('*')
      .eq('is_active', true)
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to load provider config: ${error.message}`);
    return data as ProviderConfigRow | null;
  }

  async getActiveModel(): Promise<ModelConfigRow | null> {
    const { data, error } = await this.db
      .from('model_configs')
      .select('*')
      .eq('is_active', true)
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to load model config: ${error.message}`);
    return data as ModelConfigRow | null;
  }

  async getActivePrompt(promptType: string): Promise<SystemPromptRow | null> {
    const { data, error } = await this.db
      .from('system_prompts')
      .select('*')
      .eq('prompt_type', promptType)
      .eq('is_active', true)
      .limit(1)
      .maybeSingle();

    if (error) throw new Error(`Failed to load system prompt: ${error.message}`);
    return data as SystemPromptRow | null;
  }

  async setActive(kind: ConfigKind, id: string): Promise<boolean> {
    const { data, error } = await this.db.rpc('set_active_config', {
      config_kind: kind,
      config_id: id,
    });

    if (error) throw new Error(`Failed to activate ${kind} config: ${error.message}`);
    return data === true;
  }
}
