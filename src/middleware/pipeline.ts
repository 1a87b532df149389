/**
 * Middleware pipeline for the serverless handler: an onion of wrappers
 * around a route handler.
 */

export interface HandlerContext {
  /** Caller address as reported by the hosting platform, when known. */
  clientAddress: string | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware left-to-right:
 *   pipeline(bodyLimit, rateLimit)(handler)
 *   → bodyLimit wraps (rateLimit wraps handler)
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}
