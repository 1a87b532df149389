/**
 * Environment configuration, read once at start-up.
 * Runtime LLM settings live in the active configuration records; the values
 * here are the fallbacks used when none is active.
 */

import { isLogLevel, type LogLevel } from './providers/ILogProvider.js';

export const DEFAULT_LLM_API_URL = 'https://api.together.xyz/v1/chat/completions';

export interface LLMSettings {
  apiUrl: string;
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  repetitionPenalty: number;
}

/** Model defaults applied when no model configuration record is active. */
export const DEFAULT_MODEL_SETTINGS: Omit<LLMSettings, 'apiUrl' | 'apiKey'> = {
  model: 'mistralai/Mistral-7B-Instruct-v0.1',
  maxTokens: 500,
  temperature: 0.7,
  topP: 0.9,
  repetitionPenalty: 1.0,
};

export interface AppConfig {
  supabaseUrl: string;
  supabaseServiceRoleKey: string;
  llm: LLMSettings;
  /** Admin routes reject every request when unset. */
  adminApiKey: string | null;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const missing = ['SUPABASE_URL', 'SUPABASE_SERVICE_ROLE_KEY'].filter(
    (name) => !env[name]
  );
  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const logLevel = env.LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error (got "${logLevel}")`);
  }

  return {
    supabaseUrl: env.SUPABASE_URL ?? '',
    supabaseServiceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY ?? '',
    llm: {
      apiUrl: env.LLM_API_URL || DEFAULT_LLM_API_URL,
      apiKey: env.LLM_API_KEY ?? '',
      ...DEFAULT_MODEL_SETTINGS,
    },
    adminApiKey: env.ADMIN_API_KEY || null,
    logLevel,
  };
}
