/**
 * Logging provider interface.
 * Services and middleware emit structured events through it; the concrete
 * provider decides where they go.
 */

/** Log severity levels. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** A structured log event. */
export interface LogEvent {
  level: LogLevel;
  message: string;
  /** ISO-8601 timestamp (auto-set if omitted). */
  timestamp?: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

/** Extended event for HTTP request logging. */
export interface RequestLogEvent extends LogEvent {
  method: string;
  path: string;
  status: number;
  durationMs: number;
  requestId?: string;
}

export interface ILogProvider {
  log(event: LogEvent): void;

  /** Flush any buffered events. Returns when the flush attempt completes. */
  flush(): Promise<void>;

  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}
