/**
 * FAQ search endpoint.
 * GET /api/v1/faq?q=&category=&sessionId= — Search both knowledge stores
 */

import { pipeline } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';

const MAX_QUERY_LENGTH = 500;
const MAX_CATEGORY_LENGTH = 50;

export function createFaqHandlers(container: Container) {
  const search: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.rateLimit.faq
  )(async (req, ctx) => {
    const params = new URL(req.url).searchParams;
    const query = params.get('q') ?? '';
    const category = params.get('category') || undefined;

    if (query.length > MAX_QUERY_LENGTH) {
      throw new ValidationError(`q must be ${MAX_QUERY_LENGTH} characters or less`);
    }
    if (category && category.length > MAX_CATEGORY_LENGTH) {
      throw new ValidationError(`category must be ${MAX_CATEGORY_LENGTH} characters or less`);
    }

    const result = await container.knowledgeService.lookup({
      query,
      category,
      sessionId: params.get('sessionId') || undefined,
      clientAddress: ctx.clientAddress,
    });

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { search };
}
