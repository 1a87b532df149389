/**
 * Shared utility types.
 */

export type FieldType = 'string' | 'boolean';

export interface FieldSchema {
  type: FieldType;
  required: boolean;
  maxLength?: number;
  enum?: readonly string[];
}

/** Declarative request-body schema consumed by `validateBody`. */
export type BodySchema = Record<string, FieldSchema>;

export interface PaginationOptions {
  limit: number;
  offset: number;
}
