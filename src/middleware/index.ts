export { pipeline, recordOutcome } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler } from './error-handler.js';
export { validateBody } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
