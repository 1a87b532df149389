import { describe, it, expect, beforeEach } from 'vitest';
import { ConfigService } from '../../src/services/ConfigService.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { DEFAULT_LLM_API_URL, DEFAULT_MODEL_SETTINGS } from '../../src/config.js';
import { NotFoundError, ValidationError } from '../../src/errors.js';
import { MockConfigRepository } from '../mocks/MockConfigRepository.js';

describe('ConfigService', () => {
  let configRepo: MockConfigRepository;
  let service: ConfigService;

  beforeEach(() => {
    configRepo = new MockConfigRepository();
    service = new ConfigService(
      configRepo,
      { apiUrl: DEFAULT_LLM_API_URL, apiKey: 'test-secret', ...DEFAULT_MODEL_SETTINGS },
      new ConsoleLogProvider()
    );

    configRepo.models.push(
      {
        id: 'model-1',
        name: 'Fast',
        model_name: 'vendor/fast-model',
        max_tokens: 300,
        temperature: 0.5,
        top_p: 0.9,
        repetition_penalty: 1,
        is_active: true,
      },
      {
        id: 'model-2',
        name: 'Large',
        model_name: 'vendor/large-model',
        max_tokens: 800,
        temperature: 0.3,
        top_p: 0.8,
        repetition_penalty: 1.1,
        is_active: false,
      }
    );
    configRepo.prompts.push(
      { id: 'prompt-1', name: 'A', prompt_type: 'system', content: 'a', is_active: true },
      { id: 'prompt-2', name: 'B', prompt_type: 'system', content: 'b', is_active: false },
      { id: 'prompt-3', name: 'C', prompt_type: 'greeting', content: 'c', is_active: true }
    );
  });

  describe('activate', () => {
    it('should make the record the only active one of its kind', async () => {
      const result = await service.activate('model', 'model-2');

      expect(result).toEqual({ kind: 'model', id: 'model-2', isActive: true });
      expect(configRepo.models.map((m) => m.is_active)).toEqual([false, true]);
    });

    it('should only clear prompts of the same prompt type', async () => {
      await service.activate('prompt', 'prompt-2');

      expect(configRepo.prompts.map((p) => p.is_active)).toEqual([false, true, true]);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(service.activate('model', 'missing')).rejects.toThrow(NotFoundError);
      expect(configRepo.models.map((m) => m.is_active)).toEqual([true, false]);
    });

    it('should throw ValidationError for an unknown kind', async () => {
      await expect(service.activate('theme', 'model-1')).rejects.toThrow(ValidationError);
    });
  });

  describe('getStatus', () => {
    it('should report the active records without the API key', async () => {
      configRepo.providers.push({
        id: 'provider-1',
        provider: 'together',
        api_key: 'test-secret',
        api_url: 'https://llm.example.test/v1/chat/completions',
        is_active: true,
      });

      const status = await service.getStatus();

      expect(status).toEqual({
        model: {
          name: 'Fast',
          modelName: 'vendor/fast-model',
          maxTokens: 300,
          temperature: 0.5,
          isActive: true,
        },
        prompt: { name: 'A', type: 'system', isActive: true },
        provider: {
          provider: 'together',
          url: 'https://llm.example.test/v1/chat/completions',
          isActive: true,
        },
      });
      expect(JSON.stringify(status)).not.toContain('test-secret');
    });

    it('should report defaults as inactive when nothing is set', async () => {
      configRepo.models.length = 0;
      configRepo.prompts.length = 0;

      const status = await service.getStatus();

      expect(status).toEqual({
        model: {
          name: 'default',
          modelName: 'mistralai/Mistral-7B-Instruct-v0.1',
          maxTokens: 500,
          temperature: 0.7,
          isActive: false,
        },
        prompt: { name: 'default', type: 'system', isActive: false },
        provider: { provider: 'default', url: DEFAULT_LLM_API_URL, isActive: false },
      });
    });
  });
});
