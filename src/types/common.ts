/**
 * Request body schemas checked by the validateBody middleware.
 */

export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

export interface FieldSchema {
  type: FieldType;
  required?: boolean;
  /** Strings only. */
  minLength?: number;
  maxLength?: number;
  enum?: string[];
  /** Numbers only. */
  integer?: boolean;
  min?: number;
  max?: number;
  /** Arrays only: element type and maximum length. */
  items?: 'string';
  maxItems?: number;
}

export type BodySchema = Record<string, FieldSchema>;

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
