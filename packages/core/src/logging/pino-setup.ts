/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact (through pino's `redact` option) for path-based redaction
 * of credential material: access tokens, refresh tokens, client secrets,
 * private keys, assertions and authorization headers.
 */

import pino from 'pino';

/**
 * Paths censored in every log record.
 * @public
 */
export const REDACTED_PATHS = [
  // OAuth2 token endpoint fields
  'access_token',
  '*.access_token',
  'refresh_token',
  '*.refresh_token',
  'client_secret',
  '*.client_secret',
  'assertion',
  '*.assertion',
  'id_token',
  '*.id_token',

  // Credential objects
  'token',
  '*.token',
  'refreshToken',
  '*.refreshToken',
  'clientSecret',
  '*.clientSecret',

  // Service account key files
  'private_key',
  '*.private_key',
  'privateKey',
  '*.privateKey',

  // Headers
  'authorization',
  '*.authorization',
  'Authorization',
  '*.Authorization',
  '*.headers.authorization',
  '*.headers.Authorization',

  // Generic sensitive patterns
  '*.secret',
  '*.key',
  '*.credential',
];

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type ConfiguredLevel = (typeof LOG_LEVELS)[number];

function isConfiguredLevel(value: string): value is ConfiguredLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Reads the log level from CREDBRIDGE_LOG_LEVEL.
 * Defaults to 'silent' if not set or invalid.
 * @internal
 */
export function resolveLogLevel(
  env: Record<string, string | undefined> = process.env,
): ConfiguredLevel {
  const value = (env.CREDBRIDGE_LOG_LEVEL ?? '').toLowerCase();
  return isConfiguredLevel(value) ? value : 'silent';
}

/**
 * Creates a pino logger carrying the library's redaction rules.
 *
 * @param level - Minimum level to emit
 * @param destination - Optional stream; defaults to stdout
 * @public
 */
export function createRedactingLogger(
  level: pino.LevelWithSilent = 'silent',
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: { name: 'credbridge' },
    redact: {
      paths: REDACTED_PATHS,
      censor: '[REDACTED]',
      remove: false, // Keep the keys, just redact values
    },
    serializers: {
      ...pino.stdSerializers,
      err: pino.stdSerializers.err,
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * By default the level is 'silent' so that a library never writes to the
 * host application's stdout uninvited. Set CREDBRIDGE_LOG_LEVEL, or assign
 * `rootLogger.level`, when debugging.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'debug';
 * rootLogger.info({ refresh_token: 'abc' }); // Logs: { refresh_token: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = createRedactingLogger(resolveLogLevel());

export { rootLogger };
