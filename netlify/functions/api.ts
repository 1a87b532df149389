/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

const router = createRouter(getProductionContainer());

export default async (req: Request, context: Context) => {
  return router.handle(req, {
    clientAddress: context.ip || null,
  });
};

export const config = {
  path: '/api/v1/*',
};
