/**
 * Chat-completion provider interface.
 * Implementations never throw: every failure is a `success: false` result.
 */

export type CompletionRole = 'system' | 'user' | 'assistant';

export interface CompletionMessage {
  role: CompletionRole;
  content: string;
}

export interface CompletionSuccess {
  success: true;
  text: string;
  responseTimeSeconds: number;
  tokensUsed: number;
  modelId: string;
}

export interface CompletionFailure {
  success: false;
  error: string;
  responseTimeSeconds: number;
}

export type CompletionResult = CompletionSuccess | CompletionFailure;

export interface ILLMProvider {
  complete(messages: CompletionMessage[]): Promise<CompletionResult>;
}
