/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Production passes
 * Supabase repositories; tests pass the in-memory mocks.
 */

import type { IFilterRuleRepository } from './repositories/IFilterRuleRepository.js';
import type { IModerationLogRepository } from './repositories/IModerationLogRepository.js';
import type { IKnowledgeRepository } from './repositories/IKnowledgeRepository.js';
import type { IPendingQueryRepository } from './repositories/IPendingQueryRepository.js';
import type { IChatRepository } from './repositories/IChatRepository.js';
import type { IConfigRepository } from './repositories/IConfigRepository.js';
import type { ILLMProvider } from './providers/ILLMProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRateLimitStore } from './stores/IRateLimitStore.js';
import type { Middleware } from './middleware/pipeline.js';
import type { LLMSettings } from './config.js';
import { ContentModerator } from './services/ContentModerator.js';
import { KnowledgeBaseService } from './services/KnowledgeBaseService.js';
import { ChatService } from './services/ChatService.js';
import { FilterRuleService } from './services/FilterRuleService.js';
import { ConfigService } from './services/ConfigService.js';
import { createAdminAuthMiddleware } from './middleware/authenticate.js';
import { createRateLimitMiddleware, RATE_LIMITS } from './middleware/rate-limit.js';
import { createLoggingMiddleware } from './middleware/logging.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { bodyLimit, MAX_BODY_BYTES } from './middleware/body-limit.js';

export interface Container {
  moderator: ContentModerator;
  knowledgeService: KnowledgeBaseService;
  chatService: ChatService;
  filterRuleService: FilterRuleService;
  configService: ConfigService;
  logProvider: ILogProvider;
  adminAuth: Middleware;
  errorHandler: Middleware;
  bodyLimit: Middleware;
  logging: Middleware;
  rateLimit: {
    chat: Middleware;
    faq: Middleware;
  };
}

export interface ContainerDeps {
  filterRuleRepo: IFilterRuleRepository;
  moderationLogRepo: IModerationLogRepository;
  knowledgeRepo: IKnowledgeRepository;
  pendingQueryRepo: IPendingQueryRepository;
  chatRepo: IChatRepository;
  configRepo: IConfigRepository;
  llmProvider: ILLMProvider;
  /** Fallback LLM settings, reported by the status endpoint when no record is active. */
  llmDefaults: LLMSettings;
  logProvider: ILogProvider;
  rateLimitStore: IRateLimitStore;
  adminApiKey: string | null;
}

export function createContainer(deps: ContainerDeps): Container {
  const moderator = new ContentModerator(
    deps.filterRuleRepo,
    deps.moderationLogRepo,
    deps.logProvider
  );
  const knowledgeService = new KnowledgeBaseService(
    deps.knowledgeRepo,
    deps.pendingQueryRepo,
    moderator,
    deps.logProvider
  );
  const chatService = new ChatService(
    deps.chatRepo,
    deps.configRepo,
    moderator,
    knowledgeService,
    deps.llmProvider,
    deps.logProvider
  );
  const filterRuleService = new FilterRuleService(deps.filterRuleRepo, deps.logProvider);
  const configService = new ConfigService(deps.configRepo, deps.llmDefaults, deps.logProvider);

  return {
    moderator,
    knowledgeService,
    chatService,
    filterRuleService,
    configService,
    logProvider: deps.logProvider,
    adminAuth: createAdminAuthMiddleware(deps.adminApiKey),
    errorHandler: createErrorHandler(deps.logProvider),
    bodyLimit: bodyLimit(MAX_BODY_BYTES),
    logging: createLoggingMiddleware(deps.logProvider),
    rateLimit: {
      chat: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.chat),
      faq: createRateLimitMiddleware(deps.rateLimitStore, RATE_LIMITS.faq),
    },
  };
}
