/**
 * Admin authentication middleware.
 * Accepts `Authorization: Bearer <ADMIN_API_KEY>`; the comparison runs in
 * constant time. With no key configured every admin request is rejected.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import { UnauthorizedError } from '../errors.js';
import type { Handler, Middleware } from './pipeline.js';

export function createAdminAuthMiddleware(adminApiKey: string | null): Middleware {
  const expected = adminApiKey ? digest(adminApiKey) : null;

  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        throw new UnauthorizedError(
          'Missing or invalid Authorization header. Use: Bearer <admin_key>'
        );
      }

      const token = authHeader.slice(7).trim();
      if (!expected || !token || !timingSafeEqual(digest(token), expected)) {
        throw new UnauthorizedError('Invalid admin key');
      }

      return next(req, ctx);
    };
  };
}

/** Fixed-length digest so tokens of any length compare in constant time. */
function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}
