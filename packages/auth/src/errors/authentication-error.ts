/**
 * Standard OAuth2 error codes as defined in RFC 6749
 */
export enum OAuth2ErrorCode {
  INVALID_REQUEST = 'invalid_request',
  INVALID_CLIENT = 'invalid_client',
  INVALID_GRANT = 'invalid_grant',
  UNAUTHORIZED_CLIENT = 'unauthorized_client',
  UNSUPPORTED_GRANT_TYPE = 'unsupported_grant_type',
  INVALID_SCOPE = 'invalid_scope',
  ACCESS_DENIED = 'access_denied',
  SERVER_ERROR = 'server_error',
  TEMPORARILY_UNAVAILABLE = 'temporarily_unavailable',
}

/**
 * Credential library error codes beyond the OAuth2 set
 */
export enum AuthErrorCode {
  PARSE_ERROR = 'parse_error',
  INVALID_CREDENTIAL_TYPE = 'invalid_credential_type',
  VERIFICATION_FAILED = 'verification_failed',
  REFRESH_FAILED = 'refresh_failed',
  DISCOVERY_FAILED = 'discovery_failed',
  UNSUPPORTED_OPERATION = 'unsupported_operation',
  INVALID_CONFIGURATION = 'invalid_configuration',
  MISSING_TOKEN = 'missing_token',
  UNKNOWN_ERROR = 'unknown_error',
}

export type ErrorCode = OAuth2ErrorCode | AuthErrorCode;

/**
 * Root of every error the credential library raises on purpose.
 * Messages are scrubbed of token-shaped values before they are stored.
 */
export class AuthenticationError extends Error {
  public readonly code: ErrorCode;
  public readonly cause?: Error;

  public constructor(
    message: string,
    code: ErrorCode = AuthErrorCode.UNKNOWN_ERROR,
    cause?: Error,
  ) {
    super(AuthenticationError.sanitizeMessage(message));
    this.name = 'AuthenticationError';
    this.code = code;
    this.cause = cause;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }

  private static sanitizeMessage(message: string): string {
    return message
      // Base64-like runs with at least one digit; paths and URLs stay readable
      .replace(/\b(?=[a-zA-Z+]*[0-9])[a-zA-Z0-9+]{20,}={0,2}/g, '[REDACTED_TOKEN]')
      .replace(/\bBearer\s+[a-zA-Z0-9._-]+/gi, 'Bearer [REDACTED]')
      .replace(/\baccess_token[=:]\s*[^\s&]+/gi, 'access_token=[REDACTED]')
      .replace(/\brefresh_token[=:]\s*[^\s&]+/gi, 'refresh_token=[REDACTED]')
      .replace(/\bclient_secret[=:]\s*[^\s&]+/gi, 'client_secret=[REDACTED]')
      .replace(/\bassertion[=:]\s*[^\s&]+/gi, 'assertion=[REDACTED]');
  }

  /**
   * Raised when a header is stamped before any token has been obtained
   */
  public static missingToken(): AuthenticationError {
    return new AuthenticationError(
      'No access token available; refresh the credentials first',
      AuthErrorCode.MISSING_TOKEN,
    );
  }

  /**
   * Raised when constructor options fail validation
   */
  public static invalidConfiguration(
    message: string,
    cause?: Error,
  ): AuthenticationError {
    return new AuthenticationError(
      message,
      AuthErrorCode.INVALID_CONFIGURATION,
      cause,
    );
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}
