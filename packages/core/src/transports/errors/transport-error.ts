/**
 * Transport-specific error codes for different types of transport failures
 */
export enum TransportErrorCode {
  CONNECTION_FAILED = 'connection_failed',
  REQUEST_TIMEOUT = 'request_timeout',
  INVALID_URL = 'invalid_url',
  HTTP_ERROR = 'http_error',
  AUTHENTICATION_FAILED = 'authentication_failed',
  SERVICE_UNAVAILABLE = 'service_unavailable',
  SERVER_ERROR = 'server_error',
  UNKNOWN_ERROR = 'unknown_error',
}

/**
 * Transport error class that extends base Error with transport-specific error codes.
 * Includes retry indication for retryable vs non-retryable errors.
 *
 * Raised by request functions when the network call itself fails, and by
 * callers that treat a non-success response as a transport failure (the
 * metadata client does).
 */
export class TransportError extends Error {
  public readonly code: TransportErrorCode;
  public readonly isRetryable: boolean;
  public readonly cause?: Error;
  /** HTTP status of the failed response, when there was one */
  public readonly status?: number;
  /** Raw response body of the failed response, when there was one */
  public readonly body?: string;

  public constructor(
    message: string,
    code: TransportErrorCode = TransportErrorCode.UNKNOWN_ERROR,
    isRetryable: boolean = false,
    cause?: Error,
    response?: { status: number; body?: string },
  ) {
    super(message);
    this.name = 'TransportError';
    this.code = code;
    this.isRetryable = isRetryable;
    this.cause = cause;
    this.status = response?.status;
    this.body = response?.body;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  /**
   * Convert the error to a JSON representation (useful for logging/debugging)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      isRetryable: this.isRetryable,
      status: this.status,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  public static connectionFailed(m: string, c?: Error): TransportError {
    return new TransportError(
      `Connection failed: ${m}`,
      TransportErrorCode.CONNECTION_FAILED,
      true,
      c,
    );
  }

  public static requestTimeout(t: number, c?: Error): TransportError {
    return new TransportError(
      `Request timeout after ${t}ms`,
      TransportErrorCode.REQUEST_TIMEOUT,
      true,
      c,
    );
  }

  public static invalidUrl(u: string, c?: Error): TransportError {
    return new TransportError(
      `Invalid URL: ${u}`,
      TransportErrorCode.INVALID_URL,
      false,
      c,
    );
  }

  /**
   * Creates a TransportError for a response whose status the caller could not accept.
   * The response body is kept on the error and appended to the message.
   */
  public static fromHttpStatus(s: number, body?: string, c?: Error): TransportError {
    const msg = body ? `HTTP ${s}: ${body}` : `HTTP ${s}`;
    const retry = (s >= 500 && s < 600) || s === 408 || s === 429;

    let code: TransportErrorCode;
    if (s === 401 || s === 403) code = TransportErrorCode.AUTHENTICATION_FAILED;
    else if (s === 503) code = TransportErrorCode.SERVICE_UNAVAILABLE;
    else if (s === 408) code = TransportErrorCode.REQUEST_TIMEOUT;
    else if (s >= 500) code = TransportErrorCode.SERVER_ERROR;
    else code = TransportErrorCode.HTTP_ERROR;

    return new TransportError(msg, code, retry, c, { status: s, body });
  }
}
