/**
 * Tests for pino-setup redaction
 *
 * Verifies that credential material is automatically redacted via fast-redact
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type pino from 'pino';
import { createRedactingLogger, resolveLogLevel, rootLogger } from './pino-setup.js';
import { logEvent, logError } from '../logger.js';

describe('Pino Redaction', () => {
  let testLogger: pino.Logger;
  let logs: string[];

  beforeEach(() => {
    logs = [];
    testLogger = createRedactingLogger('info', {
      write: (msg: string) => {
        logs.push(msg);
      },
    });
  });

  describe('OAuth2 token endpoint fields', () => {
    it('redacts access_token fields', () => {
      testLogger.info({ access_token: 'ya29.test-access-token' });

      const logged = JSON.parse(logs[0]);
      expect(logged.access_token).toBe('[REDACTED]');
    });

    it('redacts nested refresh_token fields', () => {
      testLogger.info({ response: { refresh_token: 'test-refresh', expires_in: 3600 } });

      const logged = JSON.parse(logs[0]);
      expect(logged.response.refresh_token).toBe('[REDACTED]');
      expect(logged.response.expires_in).toBe(3600);
    });

    it('redacts JWT assertions', () => {
      testLogger.info({ body: { assertion: 'header.payload.signature' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.body.assertion).toBe('[REDACTED]');
    });
  });

  describe('Credential material', () => {
    it('redacts private keys from key file info', () => {
      testLogger.info({ info: { private_key: 'test-private-key', client_email: 'sa@example.com' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.info.private_key).toBe('[REDACTED]');
      expect(logged.info.client_email).toBe('sa@example.com');
    });

    it('redacts authorization headers', () => {
      testLogger.info({ headers: { Authorization: 'Bearer test-token' } });

      const logged = JSON.parse(logs[0]);
      expect(logged.headers.Authorization).toBe('[REDACTED]');
    });
  });

  it('keeps the event name and non-sensitive fields', () => {
    testLogger.info({ event: 'auth:token_acquired', expiresAt: '2030-01-01T00:00:00.000Z' });

    const logged = JSON.parse(logs[0]);
    expect(logged.event).toBe('auth:token_acquired');
    expect(logged.expiresAt).toBe('2030-01-01T00:00:00.000Z');
    expect(logged.name).toBe('credbridge');
  });
});

describe('resolveLogLevel', () => {
  it('reads CREDBRIDGE_LOG_LEVEL case-insensitively', () => {
    expect(resolveLogLevel({ CREDBRIDGE_LOG_LEVEL: 'DEBUG' })).toBe('debug');
  });

  it('falls back to silent for unknown values', () => {
    expect(resolveLogLevel({ CREDBRIDGE_LOG_LEVEL: 'verbose' })).toBe('silent');
    expect(resolveLogLevel({})).toBe('silent');
  });
});

describe('logEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('passes the event name as record field and message', () => {
    const spy = vi.spyOn(rootLogger, 'warn').mockImplementation(() => undefined);

    logEvent('warn', 'auth:test_event', { attempt: 2 });

    expect(spy).toHaveBeenCalledWith({ event: 'auth:test_event', attempt: 2 }, 'auth:test_event');
  });

  it('logs errors with message and code', () => {
    const spy = vi.spyOn(rootLogger, 'error').mockImplementation(() => undefined);
    const error = Object.assign(new Error('boom'), { code: 'ECONNRESET' });

    logError('discovery', error, { step: 'metadata' });

    expect(spy).toHaveBeenCalledTimes(1);
    const [record, message] = spy.mock.calls[0];
    expect(message).toBe('error:discovery');
    expect(record).toMatchObject({
      event: 'error:discovery',
      message: 'boom',
      code: 'ECONNRESET',
      extra: { step: 'metadata' },
    });
  });
});
