import {
  logEvent,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  type RequestOptions,
} from '@credbridge/core';
import type { Credentials } from '../implementations/base-credentials.js';

export const DEFAULT_REFRESH_STATUS_CODES: readonly number[] = [401];
export const DEFAULT_MAX_REFRESH_ATTEMPTS = 2;

export interface AuthorizedHttpOptions {
  /** Statuses that mean the credentials are stale; defaults to `[401]` */
  refreshStatusCodes?: readonly number[];
  /** Refresh-and-retry rounds per call; defaults to 2 */
  maxRefreshAttempts?: number;
}

/**
 * Request function decorator that authorizes every request and, when the
 * server answers with a stale-credential status, refreshes and retries.
 *
 * The attempt counter travels with each call, so one instance can be shared
 * by concurrent callers.
 * @example
 * ```typescript
 * const http = new AuthorizedHttp(credentials, createFetchRequest());
 * const response = await http.request({ url: 'https://storage.googleapis.com/storage/v1/b' });
 * ```
 * @public
 */
export class AuthorizedHttp {
  private readonly refreshStatusCodes: readonly number[];
  private readonly maxRefreshAttempts: number;

  public constructor(
    public readonly credentials: Credentials,
    private readonly http: HttpRequest,
    options: AuthorizedHttpOptions = {},
  ) {
    this.refreshStatusCodes = options.refreshStatusCodes ?? DEFAULT_REFRESH_STATUS_CODES;
    this.maxRefreshAttempts = options.maxRefreshAttempts ?? DEFAULT_MAX_REFRESH_ATTEMPTS;
  }

  /**
   * @param options - Caller's request; its headers are never modified
   * @param refreshAttempt - Refreshes already made for this call
   */
  public async request(options: RequestOptions, refreshAttempt = 0): Promise<HttpResponse> {
    const method = options.method ?? 'GET';
    const headers: HttpHeaders = { ...options.headers };

    await this.credentials.beforeRequest(this.http, method, options.url, headers);
    const response = await this.http({ ...options, method, headers });

    if (
      this.refreshStatusCodes.includes(response.status) &&
      refreshAttempt < this.maxRefreshAttempts
    ) {
      logEvent('info', 'auth:credentials_refresh_retry', {
        status: response.status,
        attempt: refreshAttempt + 1,
        maxAttempts: this.maxRefreshAttempts,
      });
      if (!this.credentials.mintsPerRequest) {
        await this.credentials.refresh(this.http);
      }
      return this.request(options, refreshAttempt + 1);
    }

    return response;
  }

  /**
   * Exposes the decorator as a plain request function.
   */
  public asRequest(): HttpRequest {
    return (options) => this.request(options);
  }
}
