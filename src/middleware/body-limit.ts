/**
 * Request body size limit.
 * Checks Content-Length up front, then the actual byte length of the body.
 */

import { PayloadTooLargeError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';

export const MAX_BODY_BYTES = 16 * 1024;

export function bodyLimit(maxBytes = MAX_BODY_BYTES): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      if (req.method === 'GET' || req.method === 'HEAD' || req.method === 'OPTIONS') {
        return next(req, ctx);
      }

      const declared = Number(req.headers.get('Content-Length'));
      if (Number.isFinite(declared) && declared > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }

      const text = await req.text();
      if (new TextEncoder().encode(text).byteLength > maxBytes) {
        throw new PayloadTooLargeError(maxBytes);
      }

      // The body stream is consumed; hand the handler a fresh request
      const newReq = new Request(req.url, {
        method: req.method,
        headers: req.headers,
        body: text,
      });

      return next(newReq, ctx);
    };
  };
}
