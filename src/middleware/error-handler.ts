/**
 * Error handler middleware.
 * Turns a thrown error into the JSON error envelope. AppErrors keep their
 * status, code and details; anything else becomes a 500 whose message is kept
 * out of the response and recorded in the request outcome instead.
 */

import { AppError, CollaboratorError, PartialWriteError } from '../errors.js';
import { recordOutcome, type Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      const { status, body } = toErrorResponse(err);
      recordOutcome(ctx, outcomeOf(err, body.error.code));
      return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
    }
  };
}

function toErrorResponse(err: unknown): { status: number; body: ApiErrorResponse } {
  if (err instanceof AppError) {
    return {
      status: err.statusCode,
      body: {
        error: {
          code: err.code,
          message: err.message,
          ...(err.details && { details: err.details }),
        },
      },
    };
  }
  return {
    status: 500,
    body: { error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' } },
  };
}

function outcomeOf(err: unknown, errorCode: string): Record<string, unknown> {
  if (err instanceof CollaboratorError) return { errorCode, collaborator: err.collaborator };
  if (err instanceof PartialWriteError) return { errorCode, written: err.written };
  if (err instanceof AppError) return { errorCode };
  return { errorCode, error: err instanceof Error ? err.message : String(err) };
}
