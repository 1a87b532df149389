/**
 * Error handler middleware.
 * Turns anything thrown below it into `{ error: { code, message, details? } }`.
 * AppErrors keep their status; anything else is a 500 with a generic message,
 * and the real error goes to the log provider when one is given.
 */

import { AppError, RateLimitError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { ApiErrorResponse } from '../types/api.js';
import type { Handler, Middleware } from './pipeline.js';

const UNEXPECTED: ApiErrorResponse = {
  error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
};

export function createErrorHandler(logProvider?: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      try {
        return await next(req, ctx);
      } catch (err) {
        if (err instanceof AppError) {
          return appErrorResponse(err);
        }

        logProvider?.error('Unhandled error', {
          path: new URL(req.url).pathname,
          error: err instanceof Error ? err.message : String(err),
        });
        return json(UNEXPECTED, 500);
      }
    };
  };
}

/** Error handler without logging. */
export const errorHandler: Middleware = createErrorHandler();

function appErrorResponse(err: AppError): Response {
  const body: ApiErrorResponse = {
    error: {
      code: err.code,
      message: err.message,
      ...(err.details && { details: err.details }),
    },
  };

  const retryAfter = err instanceof RateLimitError ? err.details?.retryAfter : undefined;
  return json(body, err.statusCode, retryAfter ? { 'Retry-After': String(retryAfter) } : {});
}

function json(body: ApiErrorResponse, status: number, extra: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...extra },
  });
}
