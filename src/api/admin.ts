/**
 * Admin endpoints (Bearer ADMIN_API_KEY required).
 * GET  /api/v1/admin/filter-rules                 — List filter rules
 * POST /api/v1/admin/filter-rules                 — Create a filter rule
 * POST /api/v1/admin/config/:kind/:id/activate    — Make a configuration record the active one
 * GET  /api/v1/admin/status                       — Active configuration overview
 */

import {
  pipeline,
  booleanField,
  readJsonBody,
  stringField,
  validateBody,
} from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { FILTER_TYPES, SEVERITIES } from '../types/models.js';
import { ValidationError } from '../errors.js';
import { decodePathParam, pathSegments } from './path.js';

const createRuleSchema: BodySchema = {
  filterType: { type: 'string', required: true, enum: FILTER_TYPES },
  pattern: { type: 'string', required: true, maxLength: 500 },
  severity: { type: 'string', required: true, enum: SEVERITIES },
  replacement: { type: 'string', required: false, maxLength: 100 },
  appliesToInput: { type: 'boolean', required: false },
  appliesToOutput: { type: 'boolean', required: false },
  appliesToKnowledgeBase: { type: 'boolean', required: false },
  language: { type: 'string', required: false, maxLength: 10 },
  isActive: { type: 'boolean', required: false },
};

export function createAdminHandlers(container: Container) {
  const listRules: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.adminAuth
  )(async (_req, _ctx) => {
    const rules = await container.filterRuleService.listRules();

    return new Response(JSON.stringify({ rules }), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const createRule: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.adminAuth,
    container.bodyLimit,
    validateBody(createRuleSchema)
  )(async (req, _ctx) => {
    const body = await readJsonBody(req);
    const filterType = FILTER_TYPES.find((t) => t === body.filterType);
    const severity = SEVERITIES.find((s) => s === body.severity);
    if (!filterType || !severity) {
      throw new ValidationError('filterType and severity are required');
    }

    const result = await container.filterRuleService.createRule({
      filterType,
      severity,
      pattern: stringField(body, 'pattern') ?? '',
      replacement: stringField(body, 'replacement'),
      appliesToInput: booleanField(body, 'appliesToInput'),
      appliesToOutput: booleanField(body, 'appliesToOutput'),
      appliesToKnowledgeBase: booleanField(body, 'appliesToKnowledgeBase'),
      language: stringField(body, 'language'),
      isActive: booleanField(body, 'isActive'),
    });

    return new Response(JSON.stringify(result), {
      status: 201,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const activateConfig: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.adminAuth
  )(async (req, _ctx) => {
    const parts = pathSegments(req);
    // ['api', 'v1', 'admin', 'config', ':kind', ':id', 'activate']
    const kind = parts[4] ?? '';
    const id = decodePathParam(parts[5], 'id');

    const result = await container.configService.activate(kind, id);

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  const status: Handler = pipeline(
    container.logging,
    container.errorHandler,
    container.adminAuth
  )(async (_req, _ctx) => {
    const result = await container.configService.getStatus();

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { listRules, createRule, activateConfig, status };
}
