import { logEvent, RequestUtils, type HttpRequest } from '@credbridge/core';
import {
  TokenEndpointResponseSchema,
  type TokenEndpointResponse,
} from '@credbridge/schemas';
import { AuthErrorCode } from '../errors/authentication-error.js';
import { RefreshError } from '../errors/credential-errors.js';
import { parseErrorResponse } from '../utils/error/parse-error-response.js';
import { JWT_GRANT_TYPE, REFRESH_GRANT_TYPE } from './constants.js';

export interface JwtGrantResult {
  accessToken: string;
  /** Undefined when the endpoint reported no lifetime */
  expiry: Date | undefined;
  response: TokenEndpointResponse;
}

export interface RefreshGrantResult extends JwtGrantResult {
  /** The rotated refresh token, or the one sent when none came back */
  refreshToken: string;
}

async function tokenEndpointRequest(
  request: HttpRequest,
  tokenUri: string,
  body: Record<string, string>,
): Promise<TokenEndpointResponse> {
  const requestId = RequestUtils.generateRequestId('token');
  logEvent('debug', 'auth:token_request_start', {
    requestId,
    tokenUri,
    grantType: body.grant_type,
  });

  const response = await request({
    url: tokenUri,
    method: 'POST',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(body).toString(),
  });

  if (response.status !== 200) {
    const error = parseErrorResponse(response);
    logEvent('warn', 'auth:token_request_rejected', {
      requestId,
      status: response.status,
      code: error.code,
    });
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(response.data);
  } catch (error) {
    throw new RefreshError(
      'Token endpoint returned a body that is not valid JSON',
      AuthErrorCode.REFRESH_FAILED,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = TokenEndpointResponseSchema.safeParse(data);
  if (!parsed.success) {
    throw new RefreshError(
      `Token endpoint response is invalid: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join(', ')}`,
    );
  }

  logEvent('debug', 'auth:token_request_complete', {
    requestId,
    expiresIn: parsed.data.expires_in,
  });
  return parsed.data;
}

function expiryFrom(response: TokenEndpointResponse): Date | undefined {
  return response.expires_in ? new Date(Date.now() + response.expires_in * 1000) : undefined;
}

/**
 * Exchanges a signed JWT assertion for an access token (RFC 7523).
 * @throws {RefreshError} When the endpoint rejects the grant or answers
 *   without an access token
 * @throws {TransportError} When the request itself fails
 * @public
 */
export async function jwtGrant(
  request: HttpRequest,
  tokenUri: string,
  assertion: string,
): Promise<JwtGrantResult> {
  const response = await tokenEndpointRequest(request, tokenUri, {
    assertion,
    grant_type: JWT_GRANT_TYPE,
  });

  return {
    accessToken: response.access_token,
    expiry: expiryFrom(response),
    response,
  };
}

/**
 * Exchanges a refresh token for a new access token (RFC 6749 section 6).
 * @throws {RefreshError} When the endpoint rejects the grant
 * @throws {TransportError} When the request itself fails
 * @public
 */
export async function refreshGrant(
  request: HttpRequest,
  tokenUri: string,
  refreshToken: string,
  clientId: string,
  clientSecret: string,
): Promise<RefreshGrantResult> {
  const response = await tokenEndpointRequest(request, tokenUri, {
    grant_type: REFRESH_GRANT_TYPE,
    client_id: clientId,
    client_secret: clientSecret,
    refresh_token: refreshToken,
  });

  return {
    accessToken: response.access_token,
    refreshToken: response.refresh_token ?? refreshToken,
    expiry: expiryFrom(response),
    response,
  };
}
