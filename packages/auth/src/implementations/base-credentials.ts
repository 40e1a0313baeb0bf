import { logEvent, type HttpHeaders, type HttpRequest } from '@credbridge/core';
import { AuthenticationError } from '../errors/authentication-error.js';

/**
 * What a credential's token hook returns on success.
 */
export interface AccessToken {
  token: string;
  /** Undefined when the token carries no known lifetime */
  expiry?: Date;
}

/**
 * Base for every credential type.
 *
 * Holds one access token and its expiry. The only transition is
 * {@link Credentials.refresh}: on success the new token is stored, on failure
 * the previous state is left as it was. Subclasses only implement
 * {@link Credentials.fetchAccessToken}.
 * @public
 */
export abstract class Credentials {
  private accessToken?: string;
  private expiresAt?: Date;
  private refreshPromise?: Promise<void>;

  protected constructor(initial: Partial<AccessToken> = {}) {
    this.accessToken = initial.token;
    this.expiresAt = initial.expiry;
  }

  public get token(): string | undefined {
    return this.accessToken;
  }

  public get expiry(): Date | undefined {
    return this.expiresAt;
  }

  /**
   * True once the expiry has passed. Tokens without expiry never expire.
   */
  public get expired(): boolean {
    return this.expiresAt !== undefined && this.expiresAt.getTime() <= Date.now();
  }

  public get valid(): boolean {
    return this.accessToken !== undefined && !this.expired;
  }

  /**
   * True when every request carries a freshly minted token, so a refresh
   * has nothing to replace.
   */
  public get mintsPerRequest(): boolean {
    return false;
  }

  /**
   * Obtains a new access token. Concurrent calls share one fetch.
   * @param request - Used for any network calls the refresh needs
   * @throws {AuthenticationError} When no token could be obtained
   * @public
   */
  public async refresh(request: HttpRequest): Promise<void> {
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.performRefresh(request);

    try {
      await this.refreshPromise;
    } finally {
      this.refreshPromise = undefined;
    }
  }

  /**
   * Writes the `Authorization` header, replacing any existing one.
   * @param headers - Mutated in place
   * @param token - Overrides the stored token
   * @throws {AuthenticationError} When there is no token to apply
   */
  public apply(headers: HttpHeaders, token?: string): void {
    const value = token ?? this.accessToken;
    if (value === undefined) {
      throw AuthenticationError.missingToken();
    }

    for (const name of Object.keys(headers)) {
      if (name.toLowerCase() === 'authorization') {
        delete headers[name];
      }
    }
    headers.Authorization = `Bearer ${value}`;
  }

  /**
   * Prepares an outgoing request: refreshes when the token is not valid,
   * then stamps the header.
   * @param request - Used to refresh
   * @param method - HTTP method of the outgoing request
   * @param url - URL of the outgoing request
   * @param headers - Mutated in place
   */
  public async beforeRequest(
    request: HttpRequest,
    method: string,
    url: string,
    headers: HttpHeaders,
  ): Promise<void> {
    if (!this.valid) {
      logEvent('debug', 'auth:token_refresh', {
        credentials: this.constructor.name,
        reason: this.accessToken === undefined ? 'no_token' : 'expired',
        method,
      });
      await this.refresh(request);
    }
    this.apply(headers);
  }

  private async performRefresh(request: HttpRequest): Promise<void> {
    const { token, expiry } = await this.fetchAccessToken(request);

    this.accessToken = token;
    this.expiresAt = expiry;

    logEvent('info', 'auth:token_acquired', {
      credentials: this.constructor.name,
      expiresAt: expiry?.toISOString(),
    });
  }

  /**
   * Obtains a fresh token. Must not touch the stored state.
   * @throws {AuthenticationError} When no token could be obtained
   */
  protected abstract fetchAccessToken(request: HttpRequest): Promise<AccessToken>;
}
