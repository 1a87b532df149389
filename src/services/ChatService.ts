/**
 * Per-message chat orchestration.
 *
 * validate → moderate input → retrieve context → call LLM → moderate output
 * → log turn → (learn). Every path resolves to a ChatResult; nothing thrown
 * inside the flow crosses `handleMessage`.
 */

import type { IChatRepository } from '../repositories/IChatRepository.js';
import type { IConfigRepository } from '../repositories/IConfigRepository.js';
import type {
  CompletionMessage,
  ILLMProvider,
} from '../providers/ILLMProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ChatMessageRow } from '../types/database.js';
import type {
  ChatFailure,
  ChatHistoryResponse,
  ChatMessageResponse,
  ChatResult,
} from '../types/api.js';
import type { ChatTurn, KnowledgeEntry, MessageType } from '../types/models.js';
import type { ContentModerator } from './ContentModerator.js';
import type { KnowledgeBaseService } from './KnowledgeBaseService.js';
import { NotFoundError } from '../errors.js';

export const MAX_MESSAGE_LENGTH = 1000;
export const MIN_LEARNABLE_ANSWER_LENGTH = 50;
const DEFAULT_HISTORY_LIMIT = 50;

export const SYSTEM_PROMPT_TYPE = 'system';

export const DEFAULT_SYSTEM_PROMPT = [
  'You are a helpful assistant for a university.',
  'Use the provided knowledge base information to answer questions about schedules,',
  'documents, scholarships, exams and administration.',
  'Answer in Russian unless the student writes in Kazakh or English, then answer in their language.',
  'If the knowledge base has nothing relevant, give general guidance and suggest contacting the appropriate department.',
].join(' ');

export const PROVIDER_APOLOGY =
  'Извините, сервис временно недоступен. Попробуйте позже. / Sorry, the assistant is temporarily unavailable. Please try again later.';

export const INTERNAL_ERROR_MESSAGE = 'An internal error occurred';

export interface HandleMessageInput {
  sessionId: string;
  userText: string;
  clientAddress?: string | null;
}

const MESSAGE_TYPES: readonly MessageType[] = ['user', 'assistant', 'system'];

export class ChatService {
  constructor(
    private readonly chatRepo: IChatRepository,
    private readonly configRepo: IConfigRepository,
    private readonly moderator: ContentModerator,
    private readonly knowledge: KnowledgeBaseService,
    private readonly llm: ILLMProvider,
    private readonly logProvider: ILogProvider
  ) {}

  async handleMessage(input: HandleMessageInput): Promise<ChatResult> {
    const started = performance.now();
    const elapsed = (): number => (performance.now() - started) / 1000;

    try {
      return await this.process(input, elapsed);
    } catch (err) {
      this.logProvider.error('Chat message processing failed', {
        sessionId: input.sessionId,
        error: err instanceof Error ? err.message : String(err),
      });
      return failure(input.sessionId, 'internal_error', INTERNAL_ERROR_MESSAGE, elapsed());
    }
  }

  async getHistory(
    sessionId: string,
    limit = DEFAULT_HISTORY_LIMIT
  ): Promise<ChatHistoryResponse> {
    const session = await this.chatRepo.findSession(sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }

    const rows = await this.chatRepo.listMessages(sessionId, { limit, offset: 0 });
    return { sessionId, messages: rows.map(rowToMessageResponse) };
  }

  // ── Private ──

  private async process(
    input: HandleMessageInput,
    elapsed: () => number
  ): Promise<ChatResult> {
    const { sessionId } = input;
    const clientAddress = input.clientAddress ?? null;
    const userText = input.userText.trim();

    if (userText === '') {
      return failure(sessionId, 'invalid', 'Message cannot be empty', elapsed());
    }
    if (charCount(userText) > MAX_MESSAGE_LENGTH) {
      return failure(
        sessionId,
        'invalid',
        `Message too long (max ${MAX_MESSAGE_LENGTH} characters)`,
        elapsed()
      );
    }

    const inputModeration = await this.moderator.filter(userText, 'user_input', {
      sessionId,
      clientAddress,
    });

    if (inputModeration.action === 'blocked') {
      this.logProvider.warn('User message blocked', {
        sessionId,
        ruleIds: inputModeration.matchedRuleIds,
      });
      return failure(sessionId, 'blocked', inputModeration.filteredText, elapsed());
    }

    const question = inputModeration.filteredText;
    const language = inputModeration.language;

    await this.bestEffort('record user message', sessionId, () =>
      this.appendMessage(sessionId, 'user', question)
    );

    let context: KnowledgeEntry[] = [];
    let searchFailed = false;
    try {
      context = await this.knowledge.contextFor(question);
    } catch (err) {
      searchFailed = true;
      this.logProvider.warn('Knowledge search failed, answering without context', {
        sessionId,
        error: err instanceof Error ? err.message : String(err),
      });
    }

    if (!searchFailed && context.length === 0) {
      await this.bestEffort('record unanswered query', sessionId, () =>
        this.knowledge.recordUnanswered(question, sessionId, language)
      );
    }

    const messages = await this.composeMessages(question, context);
    const completion = await this.llm.complete(messages);

    if (!completion.success || completion.text.trim().length === 0) {
      const detail = completion.success ? 'Empty completion' : completion.error;
      this.logProvider.error('LLM completion failed', { sessionId, error: detail });

      await this.logTurn({
        sessionId,
        userText: input.userText,
        aiText: '',
        success: false,
        errorMessage: detail,
        responseTimeSeconds: completion.responseTimeSeconds,
        tokensUsed: 0,
        moderated: false,
        usedKnowledge: context,
      });
      return failure(sessionId, 'provider_error', PROVIDER_APOLOGY, elapsed());
    }

    const outputModeration = await this.moderator.filter(completion.text, 'ai_response', {
      sessionId,
      clientAddress,
    });
    const answer = outputModeration.isFiltered ? outputModeration.filteredText : completion.text;

    await this.logTurn({
      sessionId,
      userText: input.userText,
      aiText: answer,
      success: true,
      errorMessage: '',
      responseTimeSeconds: completion.responseTimeSeconds,
      tokensUsed: completion.tokensUsed,
      moderated: outputModeration.isFiltered,
      usedKnowledge: context,
    });

    await this.bestEffort('record assistant message', sessionId, () =>
      this.appendMessage(sessionId, 'assistant', answer, {
        responseTime: completion.responseTimeSeconds,
        tokensUsed: completion.tokensUsed,
        modelUsed: completion.modelId,
      })
    );

    if (context.length > 0) {
      await this.bestEffort('update knowledge usage', sessionId, () =>
        this.knowledge.markUsed(context)
      );
    } else if (
      !searchFailed &&
      outputModeration.action !== 'blocked' &&
      charCount(answer) >= MIN_LEARNABLE_ANSWER_LENGTH
    ) {
      await this.bestEffort('learn from answer', sessionId, () =>
        this.knowledge.learn(question, answer, sessionId, language)
      );
    }

    return {
      success: true,
      outcome: 'answered',
      message: answer,
      responseTimeSeconds: elapsed(),
      tokensUsed: completion.tokensUsed,
      moderated: outputModeration.isFiltered,
      knowledgeEntriesUsed: context.length,
      sessionId,
    };
  }

  private async composeMessages(
    question: string,
    context: KnowledgeEntry[]
  ): Promise<CompletionMessage[]> {
    const messages: CompletionMessage[] = [
      { role: 'system', content: await this.systemPrompt() },
    ];

    if (context.length > 0) {
      const pairs = context.map((entry) => `Q: ${entry.question}\nA: ${entry.answer}\n\n`);
      messages.push({
        role: 'system',
        content: `Relevant information from knowledge base:\n${pairs.join('')}`,
      });
    }

    messages.push({ role: 'user', content: question });
    return messages;
  }

  private async systemPrompt(): Promise<string> {
    try {
      const prompt = await this.configRepo.getActivePrompt(SYSTEM_PROMPT_TYPE);
      if (prompt && prompt.content.trim().length > 0) return prompt.content;
      this.logProvider.debug('No active system prompt, using default');
    } catch (err) {
      this.logProvider.warn('Failed to load system prompt, using default', {
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return DEFAULT_SYSTEM_PROMPT;
  }

  private async appendMessage(
    sessionId: string,
    type: MessageType,
    content: string,
    meta: { responseTime?: number; tokensUsed?: number; modelUsed?: string } = {}
  ): Promise<void> {
    const session = await this.chatRepo.findSession(sessionId);
    if (!session) {
      await this.chatRepo.createSession(sessionId);
    }

    await this.chatRepo.appendMessage({
      session_id: sessionId,
      message_type: type,
      content,
      response_time: meta.responseTime ?? null,
      tokens_used: meta.tokensUsed ?? null,
      model_used: meta.modelUsed ?? null,
    });
  }

  private async logTurn(turn: ChatTurn): Promise<void> {
    await this.bestEffort('write request log', turn.sessionId, () =>
      this.chatRepo.insertRequestLog({
        session_id: turn.sessionId,
        user_message: turn.userText,
        ai_response: turn.aiText,
        response_time: turn.responseTimeSeconds,
        api_success: turn.success,
        error_message: turn.errorMessage,
        tokens_used: turn.tokensUsed,
        moderated: turn.moderated,
        faq_entry_ids: turn.usedKnowledge.filter((e) => e.store === 'faq').map((e) => e.id),
        kb_entry_ids: turn.usedKnowledge.filter((e) => e.store === 'kb').map((e) => e.id),
      })
    );
  }

  /** Run a side write whose failure is logged and otherwise ignored. */
  private async bestEffort(
    operation: string,
    sessionId: string,
    fn: () => Promise<unknown>
  ): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logProvider.error(`Failed to ${operation}`, {
        sessionId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

function failure(
  sessionId: string,
  outcome: ChatFailure['outcome'],
  error: string,
  responseTimeSeconds: number
): ChatFailure {
  return { success: false, outcome, error, responseTimeSeconds, sessionId };
}

function isMessageType(value: string): value is MessageType {
  return (MESSAGE_TYPES as readonly string[]).includes(value);
}

function rowToMessageResponse(row: ChatMessageRow): ChatMessageResponse {
  return {
    id: row.id,
    type: isMessageType(row.message_type) ? row.message_type : 'system',
    content: row.content,
    timestamp: row.created_at,
    responseTime: row.response_time,
    tokensUsed: row.tokens_used,
  };
}

/** Length in code points, so an emoji counts as one character. */
function charCount(text: string): number {
  return [...text].length;
}
