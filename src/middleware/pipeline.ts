/**
 * Handler composition for the memory API.
 * `pipeline(a, b)(h)` runs a, then b, then h, and unwinds in reverse.
 */

export interface HandlerContext {
  /** Netlify request id; ties the request log line to the service events. */
  requestId?: string;
  /** What the route did (ids written, result counts), for the request log line. */
  outcome?: Record<string, unknown>;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

export function pipeline(...middlewares: Middleware[]): Middleware {
  return (handler) => middlewares.reduceRight<Handler>((next, wrap) => wrap(next), handler);
}

/** Merge outcome fields into the context; later keys win. */
export function recordOutcome(ctx: HandlerContext, fields: Record<string, unknown>): void {
  ctx.outcome = { ...ctx.outcome, ...fields };
}
