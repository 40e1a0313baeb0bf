import { rootLogger } from './logging/pino-setup.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Writes a structured log event through the root pino logger.
 *
 * The event name goes both into the record (`event`) and the message so that
 * pretty printers and JSON consumers see the same thing. Sensitive fields in
 * `data` are censored by the logger's redaction paths.
 * @param level - Log severity level
 * @param event - Event identifier for categorization, e.g. `auth:token_refresh`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: Record<string, unknown>): void {
  rootLogger[level]({ event, ...data }, event);
}

/**
 * Logs an error event with enough context for debugging.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: Record<string, unknown>): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const code =
    rawError && typeof rawError === 'object' && 'code' in rawError ? rawError.code : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    code,
    extra,
  });
}
