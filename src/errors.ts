/**
 * Application error hierarchy.
 * Every error carries a machine-readable code and the HTTP status the API maps it to.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_REQUEST', message, 400, details);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super('FORBIDDEN', message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, 404, details);
  }
}

export class ConflictError extends AppError {
  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, 409, details);
  }
}

export type Collaborator = 'embedder' | 'evaluator';

/** The Embedder or Evaluator failed, timed out, or answered with malformed data. */
export class CollaboratorError extends AppError {
  constructor(
    readonly collaborator: Collaborator,
    message: string,
    cause?: unknown
  ) {
    super('COLLABORATOR_FAILURE', message, 502, { collaborator }, { cause });
  }
}

/**
 * A judgment was only partly written to the graph.
 * `written` lists the node ids that were persisted before the failure;
 * replaying the same prepared judgment completes the record.
 */
export class PartialWriteError extends AppError {
  constructor(
    readonly written: string[],
    cause: unknown
  ) {
    super(
      'PARTIAL_WRITE',
      `Judgment partially recorded: ${cause instanceof Error ? cause.message : String(cause)}`,
      500,
      { written },
      { cause }
    );
  }
}
