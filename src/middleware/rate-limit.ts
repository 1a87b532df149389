/**
 * Fixed-window rate limiting per client and action. Counters live in an
 * IRateLimitStore: in memory for tests, a Supabase function in production.
 */

import type { IRateLimitStore } from '../stores/IRateLimitStore.js';
import type { HandlerContext, Middleware, Handler } from './pipeline.js';
import { RateLimitError } from '../errors.js';

export interface RateLimitConfig {
  /** Extract the rate limit key from the request/context. */
  key: (req: Request, ctx: HandlerContext) => string;
  /** Maximum requests allowed within the window. */
  limit: number;
  /** Window duration in seconds. */
  windowSeconds: number;
}

export function createRateLimitMiddleware(
  store: IRateLimitStore,
  config: RateLimitConfig
): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const key = config.key(req, ctx);
      const { count, resetAt } = await store.increment(key, config.windowSeconds);

      if (count > config.limit) {
        throw new RateLimitError(Math.max(1, resetAt - Math.floor(Date.now() / 1000)));
      }

      return withLimitHeaders(await next(req, ctx), config.limit - count, config.limit, resetAt);
    };
  };
}

function withLimitHeaders(
  response: Response,
  remaining: number,
  limit: number,
  resetAt: number
): Response {
  const headers = new Headers(response.headers);
  headers.set('X-RateLimit-Limit', String(limit));
  headers.set('X-RateLimit-Remaining', String(Math.max(0, remaining)));
  headers.set('X-RateLimit-Reset', String(resetAt));

  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}

// ── Key extraction ──

/** Per-client key. Prefers the platform-reported address over X-Forwarded-For. */
export function clientKey(action: string) {
  return (req: Request, ctx: HandlerContext): string => {
    const forwarded = req.headers.get('X-Forwarded-For')?.split(',')[0]?.trim();
    const address = ctx.clientAddress || forwarded || 'unknown';
    return `ip:${address}:${action}`;
  };
}

// ── Pre-built rate limit configs ──

const ONE_HOUR = 3600;

export const RATE_LIMITS = {
  /** POST /chat: each message costs an LLM call */
  chat: { key: clientKey('chat'), limit: 60, windowSeconds: ONE_HOUR },
  /** GET /faq */
  faq: { key: clientKey('faq'), limit: 300, windowSeconds: ONE_HOUR },
} as const satisfies Record<string, RateLimitConfig>;
