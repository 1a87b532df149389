/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Plain Request/Response, so any fetch-style runtime can host it.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createChatHandlers } from './chat.js';
import { createFaqHandlers } from './faq.js';
import { createAdminHandlers } from './admin.js';
import type { ApiErrorResponse, ErrorCode } from '../types/api.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const chat = createChatHandlers(container);
  const faq = createFaqHandlers(container);
  const admin = createAdminHandlers(container);

  const routes: Route[] = [
    // Chat
    { method: 'POST', pattern: /^\/api\/v1\/chat\/?$/, handler: chat.send },
    { method: 'GET', pattern: /^\/api\/v1\/sessions\/[^/]+\/messages\/?$/, handler: chat.history },

    // FAQ
    { method: 'GET', pattern: /^\/api\/v1\/faq\/?$/, handler: faq.search },

    // Admin
    { method: 'GET', pattern: /^\/api\/v1\/admin\/filter-rules\/?$/, handler: admin.listRules },
    { method: 'POST', pattern: /^\/api\/v1\/admin\/filter-rules\/?$/, handler: admin.createRule },
    { method: 'POST', pattern: /^\/api\/v1\/admin\/config\/[^/]+\/[^/]+\/activate\/?$/, handler: admin.activateConfig },
    { method: 'GET', pattern: /^\/api\/v1\/admin\/status\/?$/, handler: admin.status },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const { pathname } = new URL(req.url);

    if (req.method === 'OPTIONS') {
      return new Response(null, { status: 204, headers: corsHeaders() });
    }

    const matching = routes.filter((r) => r.pattern.test(pathname));
    const route = matching.find((r) => r.method === req.method);
    if (route) {
      return addCorsHeaders(await route.handler(req, ctx));
    }

    if (matching.length > 0) {
      return routingError(405, 'INVALID_REQUEST', `Method ${req.method} not allowed`, {
        Allow: matching.map((r) => r.method).join(', '),
      });
    }

    return routingError(404, 'NOT_FOUND', `No route matches ${req.method} ${pathname}`);
  };

  return { handle, routes };
}

function routingError(
  status: number,
  code: ErrorCode,
  message: string,
  extraHeaders: Record<string, string> = {}
): Response {
  const body: ApiErrorResponse = { error: { code, message } };
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...extraHeaders, ...corsHeaders() },
  });
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
