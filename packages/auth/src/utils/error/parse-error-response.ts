import { TokenEndpointErrorSchema } from '@credbridge/schemas';
import type { HttpResponse } from '@credbridge/core';
import { AuthErrorCode, OAuth2ErrorCode } from '../../errors/authentication-error.js';
import { RefreshError } from '../../errors/credential-errors.js';
import { createOAuth2Error } from './create-oauth2-error.js';

/**
 * Turns a rejected token endpoint response into a RefreshError.
 *
 * A JSON body in the RFC 6749 error shape goes through
 * {@link createOAuth2Error}; anything else becomes the message verbatim, or
 * `HTTP <status>` when the body is empty.
 * @param response - Non-200 response from the token endpoint
 * @public
 */
export function parseErrorResponse(response: HttpResponse): RefreshError {
  let body: unknown;
  try {
    body = JSON.parse(response.data);
  } catch {
    body = undefined;
  }

  const parsed = TokenEndpointErrorSchema.safeParse(body);
  if (parsed.success) {
    return createOAuth2Error(parsed.data, response.status);
  }

  return new RefreshError(
    response.data || `HTTP ${response.status}`,
    response.status >= 500 ? OAuth2ErrorCode.SERVER_ERROR : AuthErrorCode.REFRESH_FAILED,
  );
}
