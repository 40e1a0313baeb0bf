import type { HttpHeaders, HttpRequest } from './request.js';
import { TransportError } from './errors/transport-error.js';
import { logEvent } from '../logger.js';

// fetch wraps the URL parser's ERR_INVALID_URL in a TypeError of its own
function isInvalidUrlError(error: Error): boolean {
  const inner = error.cause;
  return inner instanceof Error && 'code' in inner && inner.code === 'ERR_INVALID_URL';
}

/**
 * Builds an {@link HttpRequest} backed by `fetch`.
 *
 * Network failures and timeouts are mapped onto TransportError; HTTP error
 * statuses are returned to the caller untouched.
 * @param fetchImpl - fetch implementation, global fetch by default
 * @public
 */
export function createFetchRequest(fetchImpl: typeof fetch = fetch): HttpRequest {
  return async ({ url, method = 'GET', headers, body, timeout }) => {
    try {
      const response = await fetchImpl(url, {
        method,
        headers,
        body,
        signal: timeout !== undefined ? AbortSignal.timeout(timeout) : undefined,
      });

      const responseHeaders: HttpHeaders = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers: responseHeaders,
        data: await response.text(),
      };
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;

      logEvent('debug', 'transport:request_failed', {
        method,
        url,
        error: cause?.message ?? String(error),
      });

      if (cause && (cause.name === 'TimeoutError' || cause.name === 'AbortError')) {
        throw TransportError.requestTimeout(timeout ?? 0, cause);
      }
      if (cause && isInvalidUrlError(cause)) {
        throw TransportError.invalidUrl(url, cause);
      }
      throw TransportError.connectionFailed(cause?.message ?? String(error), cause);
    }
  };
}
