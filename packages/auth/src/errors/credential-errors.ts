import {
  AuthenticationError,
  AuthErrorCode,
  type ErrorCode,
} from './authentication-error.js';

/**
 * Malformed input: bad JSON, base64url, PEM material, or a credentials file
 * missing required fields.
 */
export class ParseError extends AuthenticationError {
  public constructor(message: string, cause?: Error) {
    super(message, AuthErrorCode.PARSE_ERROR, cause);
    this.name = 'ParseError';
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * A credentials file whose `type` is missing or not one we can load.
 */
export class InvalidCredentialTypeError extends AuthenticationError {
  public constructor(message: string) {
    super(message, AuthErrorCode.INVALID_CREDENTIAL_TYPE);
    this.name = 'InvalidCredentialTypeError';
    Object.setPrototypeOf(this, InvalidCredentialTypeError.prototype);
  }
}

/**
 * A JWT that failed structural, signature, time or audience checks.
 */
export class VerificationError extends AuthenticationError {
  public constructor(message: string, cause?: Error) {
    super(message, AuthErrorCode.VERIFICATION_FAILED, cause);
    this.name = 'VerificationError';
    Object.setPrototypeOf(this, VerificationError.prototype);
  }
}

/**
 * Failure to obtain a new access token. `code` carries the OAuth2 error code
 * when the token endpoint returned one.
 */
export class RefreshError extends AuthenticationError {
  public constructor(
    message: string,
    code: ErrorCode = AuthErrorCode.REFRESH_FAILED,
    cause?: Error,
  ) {
    super(message, code, cause);
    this.name = 'RefreshError';
    Object.setPrototypeOf(this, RefreshError.prototype);
  }
}

/**
 * No credential source produced credentials.
 */
export class DiscoveryError extends AuthenticationError {
  public constructor(message: string) {
    super(message, AuthErrorCode.DISCOVERY_FAILED);
    this.name = 'DiscoveryError';
    Object.setPrototypeOf(this, DiscoveryError.prototype);
  }
}

export class UnsupportedOperationError extends AuthenticationError {
  public constructor(message: string) {
    super(message, AuthErrorCode.UNSUPPORTED_OPERATION);
    this.name = 'UnsupportedOperationError';
    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}
