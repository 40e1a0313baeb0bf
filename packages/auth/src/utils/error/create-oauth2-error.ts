import type { TokenEndpointError } from '@credbridge/schemas';
import {
  OAuth2ErrorCode,
  AuthErrorCode,
  type ErrorCode,
} from '../../errors/authentication-error.js';
import { RefreshError } from '../../errors/credential-errors.js';

const OAUTH2_CODES: ReadonlyMap<string, OAuth2ErrorCode> = new Map<string, OAuth2ErrorCode>(
  Object.values(OAuth2ErrorCode).map((code) => [code, code]),
);

/**
 * Creates a RefreshError from a token endpoint error response.
 *
 * The message is `error: error_description`, or just `error` without a
 * description. Standard RFC 6749 codes carry over to `code`; unknown codes
 * fall back on the HTTP status.
 * @param errorResponse - Parsed error body
 * @param statusCode - HTTP status of the failed request
 * @example
 * ```typescript
 * const error = createOAuth2Error({ error: 'invalid_grant' }, 400);
 * // error.message === 'invalid_grant', error.code === OAuth2ErrorCode.INVALID_GRANT
 * ```
 * @see file:./parse-error-response.ts - Produces the error body
 * @public
 */
export function createOAuth2Error(
  errorResponse: TokenEndpointError,
  statusCode: number,
): RefreshError {
  const message = errorResponse.error_description
    ? `${errorResponse.error}: ${errorResponse.error_description}`
    : errorResponse.error;

  const errorCode: ErrorCode =
    OAUTH2_CODES.get(errorResponse.error) ??
    (statusCode >= 500 ? OAuth2ErrorCode.SERVER_ERROR : AuthErrorCode.REFRESH_FAILED);

  return new RefreshError(message, errorCode);
}
