import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TransportError } from '@credbridge/core';
import { OAuth2ErrorCode } from '../../errors/authentication-error.js';
import { RefreshError } from '../../errors/credential-errors.js';
import { JWT_GRANT_TYPE } from '../../oauth2/constants.js';
import { jwtGrant, refreshGrant } from '../../oauth2/token-endpoint-client.js';
import {
  TEST_TOKEN_URI,
  createMockRequest,
  formBodyOf,
  jsonResponse,
  textResponse,
} from '../test-utils.js';

vi.mock('@credbridge/core', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@credbridge/core')>();
  return {
    ...actual,
    logEvent: vi.fn(),
  };
});

describe('token endpoint client', () => {
  let request: ReturnType<typeof createMockRequest>;

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    request = createMockRequest();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('jwtGrant', () => {
    it('posts the assertion as a form and returns token and expiry', async () => {
      const body = { access_token: 'token', expires_in: 500, extra: 'data' };
      request.mockResolvedValue(jsonResponse(body));

      const result = await jwtGrant(request, TEST_TOKEN_URI, 'test-assertion');

      expect(request).toHaveBeenCalledWith({
        url: TEST_TOKEN_URI,
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: expect.any(String),
      });
      expect(formBodyOf(request)).toEqual({
        assertion: 'test-assertion',
        grant_type: JWT_GRANT_TYPE,
      });
      expect(result).toEqual({
        accessToken: 'token',
        expiry: new Date('2026-01-01T00:08:20Z'),
        response: body,
      });
    });

    it('leaves expiry undefined without expires_in', async () => {
      request.mockResolvedValue(jsonResponse({ access_token: 'token' }));

      const result = await jwtGrant(request, TEST_TOKEN_URI, 'test-assertion');

      expect(result.expiry).toBeUndefined();
    });

    it('leaves expiry undefined when expires_in is zero', async () => {
      request.mockResolvedValue(jsonResponse({ access_token: 'token', expires_in: 0 }));

      const result = await jwtGrant(request, TEST_TOKEN_URI, 'test-assertion');

      expect(result.expiry).toBeUndefined();
    });

    it('raises RefreshError with the endpoint error and description', async () => {
      request.mockResolvedValue(
        jsonResponse({ error: 'invalid_grant', error_description: 'Invalid JWT Signature.' }, 400),
      );

      const error = await jwtGrant(request, TEST_TOKEN_URI, 'test-assertion').catch(
        (e: unknown) => e,
      );

      expect(error).toBeInstanceOf(RefreshError);
      expect(error).toMatchObject({
        message: 'invalid_grant: Invalid JWT Signature.',
        code: OAuth2ErrorCode.INVALID_GRANT,
      });
    });

    it('raises RefreshError with the raw body when it is not an error document', async () => {
      request.mockResolvedValue(textResponse('Internal failure', 500));

      await expect(jwtGrant(request, TEST_TOKEN_URI, 'test-assertion')).rejects.toThrow(
        new RefreshError('Internal failure'),
      );
    });

    it('raises RefreshError when the success body has no access token', async () => {
      request.mockResolvedValue(jsonResponse({ expires_in: 500 }));

      await expect(jwtGrant(request, TEST_TOKEN_URI, 'test-assertion')).rejects.toThrow(
        RefreshError,
      );
    });

    it('raises RefreshError when the success body is not JSON', async () => {
      request.mockResolvedValue(textResponse('<html>'));

      await expect(jwtGrant(request, TEST_TOKEN_URI, 'test-assertion')).rejects.toThrow(
        'Token endpoint returned a body that is not valid JSON',
      );
    });

    it('lets transport failures through unchanged', async () => {
      const failure = TransportError.connectionFailed('ECONNREFUSED');
      request.mockRejectedValue(failure);

      await expect(jwtGrant(request, TEST_TOKEN_URI, 'test-assertion')).rejects.toBe(failure);
    });
  });

  describe('refreshGrant', () => {
    it('posts the refresh token form', async () => {
      request.mockResolvedValue(jsonResponse({ access_token: 'A', expires_in: 500 }));

      await refreshGrant(request, TEST_TOKEN_URI, 'r', 'c', 's');

      expect(formBodyOf(request)).toEqual({
        grant_type: 'refresh_token',
        client_id: 'c',
        client_secret: 's',
        refresh_token: 'r',
      });
    });

    it('keeps the original refresh token when none is returned', async () => {
      request.mockResolvedValue(jsonResponse({ access_token: 'A', expires_in: 500 }));

      const result = await refreshGrant(request, TEST_TOKEN_URI, 'r', 'c', 's');

      expect(result).toEqual({
        accessToken: 'A',
        refreshToken: 'r',
        expiry: new Date('2026-01-01T00:08:20Z'),
        response: { access_token: 'A', expires_in: 500 },
      });
    });

    it('returns a rotated refresh token', async () => {
      request.mockResolvedValue(jsonResponse({ access_token: 'A', refresh_token: 'r2' }));

      const result = await refreshGrant(request, TEST_TOKEN_URI, 'r', 'c', 's');

      expect(result.refreshToken).toBe('r2');
    });

    it('raises RefreshError with just the error code when there is no description', async () => {
      request.mockResolvedValue(jsonResponse({ error: 'invalid_client' }, 401));

      await expect(refreshGrant(request, TEST_TOKEN_URI, 'r', 'c', 's')).rejects.toThrow(
        new RefreshError('invalid_client'),
      );
    });
  });
});
