/**
 * OpenAI-compatible chat-completion provider (Together.ai by default).
 * Resolves endpoint, key and sampling parameters from the active configuration
 * records on every call, falling back to the environment defaults.
 * Uses native fetch. No retries.
 */

import type { IConfigRepository } from '../repositories/IConfigRepository.js';
import type { ILogProvider } from './ILogProvider.js';
import type {
  CompletionMessage,
  CompletionResult,
  ILLMProvider,
} from './ILLMProvider.js';
import type { LLMSettings } from '../config.js';

const REQUEST_TIMEOUT_MS = 30_000;

interface CompletionChoice {
  message: { content: string };
}

interface ParsedCompletion {
  text: string;
  totalTokens: number;
}

export class ChatCompletionProvider implements ILLMProvider {
  private readonly timeoutMs: number;

  constructor(
    private readonly configRepo: IConfigRepository,
    private readonly fallback: LLMSettings,
    private readonly logProvider: ILogProvider,
    opts?: { timeoutMs?: number }
  ) {
    this.timeoutMs = opts?.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async complete(messages: CompletionMessage[]): Promise<CompletionResult> {
    const settings = await this.resolveSettings();
    const start = performance.now();
    const elapsed = () => (performance.now() - start) / 1000;

    try {
      const res = await fetch(settings.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${settings.apiKey}`,
        },
        body: JSON.stringify({
          model: settings.model,
          messages,
          max_tokens: settings.maxTokens,
          temperature: settings.temperature,
          top_p: settings.topP,
          repetition_penalty: settings.repetitionPenalty,
          stream: false,
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (res.status !== 200) {
        const body = await res.text().catch(() => '');
        const error = `API Error: ${res.status} - ${body}`;
        this.logProvider.error('LLM request rejected', {
          status: res.status,
          model: settings.model,
        });
        return { success: false, error, responseTimeSeconds: elapsed() };
      }

      const parsed = parseCompletion(await res.json());
      if (!parsed) {
        this.logProvider.error('LLM response has unexpected shape', {
          model: settings.model,
        });
        return {
          success: false,
          error: 'API Error: malformed completion response',
          responseTimeSeconds: elapsed(),
        };
      }

      const responseTimeSeconds = elapsed();
      this.logProvider.info('LLM response generated', {
        model: settings.model,
        responseTimeSeconds: Number(responseTimeSeconds.toFixed(2)),
        tokensUsed: parsed.totalTokens,
      });

      return {
        success: true,
        text: parsed.text,
        responseTimeSeconds,
        tokensUsed: parsed.totalTokens,
        modelId: settings.model,
      };
    } catch (err) {
      const error = `Request failed: ${err instanceof Error ? err.message : String(err)}`;
      this.logProvider.error('LLM request failed', { model: settings.model, error });
      return { success: false, error, responseTimeSeconds: elapsed() };
    }
  }

  /**
   * Active provider + model records layered over the fallback.
   * A failed configuration read degrades to the fallback instead of throwing.
   */
  private async resolveSettings(): Promise<LLMSettings> {
    const settings: LLMSettings = { ...this.fallback };

    try {
      const provider = await this.configRepo.getActiveProvider();
      if (provider) {
        settings.apiKey = provider.api_key;
        settings.apiUrl = provider.api_url;
      }
    } catch (err) {
      this.logProvider.warn('Provider config unavailable, using defaults', {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    try {
      const model = await this.configRepo.getActiveModel();
      if (model) {
        settings.model = model.model_name;
        settings.maxTokens = model.max_tokens;
        settings.temperature = model.temperature;
        settings.topP = model.top_p;
        settings.repetitionPenalty = model.repetition_penalty;
      }
    } catch (err) {
      this.logProvider.warn('Model config unavailable, using defaults', {
        error: err instanceof Error ? err.message : String(err),
      });
    }

    return settings;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isChoice(value: unknown): value is CompletionChoice {
  return (
    isRecord(value) &&
    isRecord(value.message) &&
    typeof value.message.content === 'string'
  );
}

/** Extract `choices[0].message.content` and `usage.total_tokens` (0 when absent). */
function parseCompletion(body: unknown): ParsedCompletion | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null;

  const first: unknown = body.choices[0];
  if (!isChoice(first)) return null;

  const usage = body.usage;
  const totalTokens =
    isRecord(usage) && typeof usage.total_tokens === 'number' ? usage.total_tokens : 0;

  return { text: first.message.content, totalTokens };
}
