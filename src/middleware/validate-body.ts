/**
 * Body validation middleware.
 * Parses the JSON body and checks it against a BodySchema. A failing request
 * gets a 400 listing the first problem of every failing field.
 */

import type { BodySchema, FieldSchema } from '../types/common.js';
import type { Handler, Middleware } from './pipeline.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function validateBody(schema: BodySchema): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      let parsed: unknown;

      try {
        parsed = await req.json();
      } catch {
        return errorResponse('Request body must be valid JSON');
      }

      if (!isRecord(parsed)) {
        return errorResponse('Request body must be a JSON object');
      }

      const errors = validateFields(parsed, schema);
      if (errors.length > 0) {
        return errorResponse(errors.join('; '), { fields: errors });
      }

      // The body stream is spent; pass a fresh request downstream
      return next(
        new Request(req.url, {
          method: req.method,
          headers: req.headers,
          body: JSON.stringify(parsed),
        }),
        ctx
      );
    };
  };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateFields(body: Record<string, unknown>, schema: BodySchema): string[] {
  return Object.entries(schema).flatMap(([field, fieldSchema]) => {
    const problem = fieldError(field, body[field], fieldSchema);
    return problem ? [problem] : [];
  });
}

const TYPE_CHECKS: Record<FieldSchema['type'], (value: unknown) => boolean> = {
  string: (v) => typeof v === 'string',
  boolean: (v) => typeof v === 'boolean',
};

/** First problem with one field, or null. Missing optional fields pass. */
function fieldError(field: string, value: unknown, schema: FieldSchema): string | null {
  if (value === undefined || value === null) {
    return schema.required ? `${field} is required` : null;
  }

  if (!TYPE_CHECKS[schema.type](value)) {
    return `${field} must be a ${schema.type}`;
  }

  if (typeof value === 'string') {
    if (schema.maxLength !== undefined && [...value].length > schema.maxLength) {
      return `${field} must be ${schema.maxLength} characters or less`;
    }
    if (schema.enum && !schema.enum.includes(value)) {
      return `${field} must be one of: ${schema.enum.join(', ')}`;
    }
  }

  return null;
}

function errorResponse(
  message: string,
  details?: Record<string, unknown>
): Response {
  return new Response(
    JSON.stringify({
      error: {
        code: 'INVALID_REQUEST',
        message,
        ...(details && { details }),
      },
    }),
    { status: 400, headers: JSON_HEADERS }
  );
}

// ── Typed accessors for handlers behind validateBody ──

/** Read a body that validateBody has already checked is a JSON object. */
export async function readJsonBody(req: Request): Promise<Record<string, unknown>> {
  const parsed: unknown = await req.json();
  return isRecord(parsed) ? parsed : {};
}

export function stringField(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  return typeof value === 'string' ? value : undefined;
}

export function booleanField(body: Record<string, unknown>, field: string): boolean | undefined {
  const value = body[field];
  return typeof value === 'boolean' ? value : undefined;
}
