/**
 * Request logging middleware: one event per request with method, path,
 * status, duration and, when known, the client address.
 * 5xx and thrown errors log at error, 4xx at warn, the rest at info.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, HandlerContext, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  return status >= 400 ? 'warn' : 'info';
}

function requestEvent(
  req: Request,
  ctx: HandlerContext,
  status: number,
  durationMs: number,
  fields?: Record<string, unknown>
): RequestLogEvent {
  const path = new URL(req.url).pathname;
  return {
    level: fields ? 'error' : levelForStatus(status),
    message: `${req.method} ${path} → ${status} (${durationMs}ms)`,
    method: req.method,
    path,
    status,
    durationMs,
    ...(fields && { fields }),
    ...(ctx.clientAddress && { clientAddress: ctx.clientAddress }),
  };
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const start = performance.now();
      const elapsed = () => Math.round(performance.now() - start);

      let response: Response;
      try {
        response = await next(req, ctx);
      } catch (err) {
        // Logged as a 500 and re-thrown for the runtime to report
        logProvider.log(
          requestEvent(req, ctx, 500, elapsed(), {
            error: err instanceof Error ? err.message : String(err),
          })
        );
        throw err;
      }

      logProvider.log(requestEvent(req, ctx, response.status, elapsed()));
      return response;
    };
  };
}
