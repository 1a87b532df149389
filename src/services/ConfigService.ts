/**
 * Configuration record activation and status.
 */

import type { IConfigRepository } from '../repositories/IConfigRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ActivateConfigResponse, ConfigStatusResponse } from '../types/api.js';
import { CONFIG_KINDS, type ConfigKind } from '../types/models.js';
import type { LLMSettings } from '../config.js';
import { NotFoundError, ValidationError } from '../errors.js';
import { SYSTEM_PROMPT_TYPE } from './ChatService.js';

export function isConfigKind(value: string): value is ConfigKind {
  return (CONFIG_KINDS as readonly string[]).includes(value);
}

export class ConfigService {
  constructor(
    private readonly configRepo: IConfigRepository,
    private readonly fallback: LLMSettings,
    private readonly logProvider: ILogProvider
  ) {}

  /** Make `id` the only active record of its kind. */
  async activate(kind: string, id: string): Promise<ActivateConfigResponse> {
    if (!isConfigKind(kind)) {
      throw new ValidationError(`kind must be one of: ${CONFIG_KINDS.join(', ')}`);
    }

    const activated = await this.configRepo.setActive(kind, id);
    if (!activated) {
      throw new NotFoundError(`No ${kind} configuration with id ${id}`);
    }

    this.logProvider.info('Configuration activated', { kind, id });
    return { kind, id, isActive: true };
  }

  /** Active records, with defaults reported as inactive. Never exposes API keys. */
  async getStatus(): Promise<ConfigStatusResponse> {
    const [model, prompt, provider] = await Promise.all([
      this.configRepo.getActiveModel(),
      this.configRepo.getActivePrompt(SYSTEM_PROMPT_TYPE),
      this.configRepo.getActiveProvider(),
    ]);

    return {
      model: model
        ? {
            name: model.name,
            modelName: model.model_name,
            maxTokens: model.max_tokens,
            temperature: model.temperature,
            isActive: true,
          }
        : {
            name: 'default',
            modelName: this.fallback.model,
            maxTokens: this.fallback.maxTokens,
            temperature: this.fallback.temperature,
            isActive: false,
          },
      prompt: prompt
        ? { name: prompt.name, type: prompt.prompt_type, isActive: true }
        : { name: 'default', type: SYSTEM_PROMPT_TYPE, isActive: false },
      provider: provider
        ? { provider: provider.provider, url: provider.api_url, isActive: true }
        : { provider: 'default', url: this.fallback.apiUrl, isActive: false },
    };
  }
}
