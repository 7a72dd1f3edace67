/**
 * Typed readers for request bodies that already passed validateBody.
 * Each reader re-checks the runtime type so handlers need no casts.
 */

import { ValidationError } from '../errors.js';
import { isJsonObject, type JsonObject } from '../types/common.js';

export async function readJson(req: Request): Promise<JsonObject> {
  const body: unknown = await req.json();
  if (!isJsonObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function requiredString(body: JsonObject, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string`);
  }
  return value;
}

export function optionalString(body: JsonObject, field: string): string | undefined {
  const value = body[field];
  return value === undefined || value === null ? undefined : requiredString(body, field);
}

export function optionalNumber(body: JsonObject, field: string): number | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError(`${field} must be a number`);
  }
  return value;
}

export function optionalBoolean(body: JsonObject, field: string): boolean | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean`);
  }
  return value;
}

export function stringArray(body: JsonObject, field: string): string[] {
  const value = body[field];
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array`);
  }
  const strings: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ValidationError(`${field} must contain only strings`);
    }
    strings.push(item);
  }
  return strings;
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
