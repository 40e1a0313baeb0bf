import { ValidationUtils, type HttpRequest } from '@credbridge/core';
import { AuthenticationError } from '../errors/authentication-error.js';
import { RefreshError, UnsupportedOperationError } from '../errors/credential-errors.js';
import { refreshGrant } from '../oauth2/token-endpoint-client.js';
import { ScopeUtils } from '../utils/scope/scope.utils.js';
import { Credentials, type AccessToken } from './base-credentials.js';
import type { ScopedCredentials } from './capabilities.js';

export interface OAuth2CredentialsOptions {
  /** Initial access token, if one is already known */
  token?: string;
  expiry?: Date;
  refreshToken?: string;
  tokenUri?: string;
  clientId?: string;
  clientSecret?: string;
  /** Scopes granted when the refresh token was issued; informative only */
  scopes?: string | readonly string[];
}

/**
 * End-user credentials renewed through the OAuth2 refresh-token grant.
 *
 * Scopes are fixed when the user authorizes, so {@link withScopes} is not
 * supported. The refresh token may be rotated by the endpoint; read
 * {@link refreshToken} after a refresh to persist the latest one.
 * @public
 */
export class OAuth2Credentials extends Credentials implements ScopedCredentials {
  public readonly tokenUri: string | undefined;
  public readonly clientId: string | undefined;
  public readonly clientSecret: string | undefined;
  public readonly scopes: readonly string[] | undefined;
  public readonly requiresScopes = false;
  private currentRefreshToken: string | undefined;

  public constructor(options: OAuth2CredentialsOptions = {}) {
    super({ token: options.token, expiry: options.expiry });

    if (options.tokenUri !== undefined) {
      try {
        ValidationUtils.validateUrl(options.tokenUri, 'OAuth2 credentials token URI');
      } catch (error) {
        throw AuthenticationError.invalidConfiguration(
          error instanceof Error ? error.message : String(error),
          error instanceof Error ? error : undefined,
        );
      }
    }

    this.tokenUri = options.tokenUri;
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.currentRefreshToken = options.refreshToken;
    this.scopes =
      options.scopes === undefined ? undefined : ScopeUtils.normalizeScopeInput(options.scopes);
  }

  public get refreshToken(): string | undefined {
    return this.currentRefreshToken;
  }

  public hasScopes(scopes: string | readonly string[]): boolean {
    return ScopeUtils.hasScopes(this.scopes, scopes);
  }

  public withScopes(_scopes: string | readonly string[]): never {
    throw new UnsupportedOperationError('OAuth2 credentials can not modify their scopes');
  }

  protected async fetchAccessToken(request: HttpRequest): Promise<AccessToken> {
    const { currentRefreshToken, tokenUri, clientId, clientSecret } = this;
    if (!currentRefreshToken || !tokenUri || !clientId || !clientSecret) {
      throw new RefreshError(
        'OAuth2 credentials need refreshToken, tokenUri, clientId and clientSecret to refresh',
      );
    }

    const result = await refreshGrant(
      request,
      tokenUri,
      currentRefreshToken,
      clientId,
      clientSecret,
    );
    this.currentRefreshToken = result.refreshToken;

    return { token: result.accessToken, expiry: result.expiry };
  }
}
