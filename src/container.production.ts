/**
 * Production container: Supabase repositories and the chat-completion provider.
 * Built once per cold start and reused across warm invocations.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import { ChatCompletionProvider } from './providers/ChatCompletionProvider.js';
import { SupabaseFilterRuleRepository } from './repositories/SupabaseFilterRuleRepository.js';
import { SupabaseModerationLogRepository } from './repositories/SupabaseModerationLogRepository.js';
import { SupabaseKnowledgeRepository } from './repositories/SupabaseKnowledgeRepository.js';
import { SupabasePendingQueryRepository } from './repositories/SupabasePendingQueryRepository.js';
import { SupabaseChatRepository } from './repositories/SupabaseChatRepository.js';
import { SupabaseConfigRepository } from './repositories/SupabaseConfigRepository.js';
import { SupabaseRateLimitStore } from './stores/SupabaseRateLimitStore.js';

let cached: Container | null = null;

export function getProductionContainer(): Container {
  if (cached) return cached;

  const config = loadConfig();
  const db = getSupabaseClient(config);

  const logProvider = new ConsoleLogProvider({
    outputToConsole: true,
    minLevel: config.logLevel,
    bufferEvents: false,
    baseFields: { service: 'unidesk' },
  });

  const configRepo = new SupabaseConfigRepository(db);

  cached = createContainer({
    filterRuleRepo: new SupabaseFilterRuleRepository(db),
    moderationLogRepo: new SupabaseModerationLogRepository(db),
    knowledgeRepo: new SupabaseKnowledgeRepository(db),
    pendingQueryRepo: new SupabasePendingQueryRepository(db),
    chatRepo: new SupabaseChatRepository(db),
    configRepo,
    llmProvider: new ChatCompletionProvider(configRepo, config.llm, logProvider),
    llmDefaults: config.llm,
    logProvider,
    rateLimitStore: new SupabaseRateLimitStore(db),
    adminApiKey: config.adminApiKey,
  });

  return cached;
}
