/**
 * Scripted ILLMProvider. Returns the configured result and records every call.
 */

import type {
  CompletionMessage,
  CompletionResult,
  ILLMProvider,
} from '../../src/providers/ILLMProvider.js';

export class MockLLMProvider implements ILLMProvider {
  readonly calls: CompletionMessage[][] = [];
  private result: CompletionResult = {
    success: true,
    text: 'Mock answer',
    responseTimeSeconds: 0.5,
    tokensUsed: 42,
    modelId: 'mock-model',
  };

  async complete(messages: CompletionMessage[]): Promise<CompletionResult> {
    this.calls.push(messages);
    return this.result;
  }

  respondWith(text: string, tokensUsed = 42): void {
    this.result = {
      success: true,
      text,
      responseTimeSeconds: 0.5,
      tokensUsed,
      modelId: 'mock-model',
    };
  }

  failWith(error: string): void {
    this.result = { success: false, error, responseTimeSeconds: 0.5 };
  }
}
