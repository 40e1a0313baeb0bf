/**
 * The request capability every network-touching part of the library depends on.
 *
 * Any HTTP stack can be plugged in by wrapping it in an {@link HttpRequest}
 * function; {@link createFetchRequest} is the default built on global `fetch`.
 */

/** Header name → value. Response header names are lower-cased. */
export type HttpHeaders = Record<string, string>;

export interface RequestOptions {
  url: string;
  /** HTTP method, defaults to GET */
  method?: string;
  headers?: HttpHeaders;
  body?: string;
  /** Timeout in milliseconds; no timeout when omitted */
  timeout?: number;
}

export interface HttpResponse {
  status: number;
  headers: HttpHeaders;
  /** Response body decoded as UTF-8 */
  data: string;
}

/**
 * Makes one HTTP request.
 * Rejects with a TransportError when the request could not be completed;
 * any HTTP status, including errors, resolves normally.
 */
export type HttpRequest = (options: RequestOptions) => Promise<HttpResponse>;
