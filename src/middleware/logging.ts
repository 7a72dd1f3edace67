/**
 * Request logging middleware.
 * One RequestLogEvent per call with method, path, status, duration, the
 * runtime's request id and the outcome the route or error handler recorded.
 * 5xx → error, 4xx → warn, anything else → info. A thrown error is logged as
 * a 500 and re-thrown.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next) => async (req, ctx) => {
    const { pathname } = new URL(req.url);
    const started = performance.now();

    const emit = (status: number, extra?: Record<string, unknown>): void => {
      const durationMs = Math.round(performance.now() - started);
      const fields = { ...ctx.outcome, ...extra };
      const event: RequestLogEvent = {
        level: levelForStatus(status),
        message: `${req.method} ${pathname} → ${status} (${durationMs}ms)`,
        method: req.method,
        path: pathname,
        status,
        durationMs,
        ...(ctx.requestId !== undefined && { requestId: ctx.requestId }),
        ...(Object.keys(fields).length > 0 && { fields }),
      };
      logProvider.log(event);
    };

    try {
      const response = await next(req, ctx);
      emit(response.status);
      return response;
    } catch (err) {
      emit(500, { error: err instanceof Error ? err.message : String(err) });
      throw err;
    }
  };
}
