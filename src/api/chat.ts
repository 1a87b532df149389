/**
 * Chat endpoints.
 * POST /api/v1/chat                    — Send a message, get the assistant's answer
 * GET  /api/v1/sessions/:id/messages   — Message history of a session
 */

import { randomUUID } from 'node:crypto';
import {
  pipeline,
  readJsonBody,
  stringField,
  validateBody,
} from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { ChatOutcome } from '../types/api.js';
import { ValidationError } from '../errors.js';
import { decodePathParam, pathSegments } from './path.js';

const chatSchema: BodySchema = {
  message: { type: 'string', required: true },
  sessionId: { type: 'string', required: false, maxLength: 128 },
};

const OUTCOME_STATUS: Record<ChatOutcome, number> = {
  answered: 200,
  blocked: 200,
  invalid: 400,
  provider_error: 502,
  internal_error: 500,
};

const MAX_HISTORY_LIMIT = 50;

export function createChatHandlers(container: Container) {
  const send: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.bodyLimit,
    container.rateLimit.chat,
    validateBody(chatSchema)
  )(async (req, ctx) => {
    const body = await readJsonBody(req);
    const sessionId = stringField(body, 'sessionId') || randomUUID();

    const result = await container.chatService.handleMessage({
      sessionId,
      userText: stringField(body, 'message') ?? '',
      clientAddress: ctx.clientAddress,
    });

    const payload = result.outcome === 'blocked' ? { ...result, blocked: true } : result;

    return new Response(JSON.stringify(payload), {
      status: OUTCOME_STATUS[result.outcome],
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const history: Handler = pipeline(container.logging, container.errorHandler)(async (req, _ctx) => {
    const url = new URL(req.url);
    // ['api', 'v1', 'sessions', ':id', 'messages']
    const sessionId = decodePathParam(pathSegments(req)[3], 'sessionId');

    const limitParam = url.searchParams.get('limit');
    const limit = limitParam === null ? MAX_HISTORY_LIMIT : Number(limitParam);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_HISTORY_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_HISTORY_LIMIT}`);
    }

    const result = await container.chatService.getHistory(sessionId, limit);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { send, history };
}
