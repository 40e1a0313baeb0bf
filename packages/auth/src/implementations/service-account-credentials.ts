import type { HttpRequest } from '@credbridge/core';
import { RsaSigner, type Signer } from '../crypt/signer.js';
import { RefreshError } from '../errors/credential-errors.js';
import { DEFAULT_TOKEN_LIFETIME_SECS, encode, type JwtPayload } from '../jwt/jwt-codec.js';
import { GOOGLE_OAUTH2_TOKEN_ENDPOINT } from '../oauth2/constants.js';
import { jwtGrant } from '../oauth2/token-endpoint-client.js';
import { ScopeUtils } from '../utils/scope/scope.utils.js';
import { Credentials, type AccessToken } from './base-credentials.js';
import type { ScopedCredentials, SigningCredentials } from './capabilities.js';
import {
  parseServiceAccountKey,
  readServiceAccountKeyFile,
} from './util/service-account-key.js';

export interface ServiceAccountCredentialsOptions {
  serviceAccountEmail: string;
  tokenUri: string;
  scopes?: string | readonly string[];
  /** User to impersonate through domain-wide delegation */
  subject?: string;
  additionalClaims?: JwtPayload;
  /** Assertion lifetime in seconds */
  tokenLifetime?: number;
}

export type ServiceAccountFileOptions = Partial<
  Omit<ServiceAccountCredentialsOptions, 'serviceAccountEmail'>
>;

/**
 * Service account credentials exchanging a signed assertion for an access
 * token through the JWT-bearer grant. Unusable until scoped.
 * @example
 * ```typescript
 * const credentials = ServiceAccountCredentials.fromServiceAccountFile('key.json')
 *   .withScopes(['https://www.googleapis.com/auth/cloud-platform']);
 * ```
 * @public
 */
export class ServiceAccountCredentials
  extends Credentials
  implements ScopedCredentials, SigningCredentials
{
  public readonly serviceAccountEmail: string;
  public readonly tokenUri: string;
  public readonly scopes: readonly string[] | undefined;
  public readonly subject: string | undefined;
  public readonly additionalClaims: Readonly<JwtPayload>;
  public readonly tokenLifetime: number;

  public constructor(
    public readonly signer: Signer,
    private readonly options: ServiceAccountCredentialsOptions,
  ) {
    super();
    this.serviceAccountEmail = options.serviceAccountEmail;
    this.tokenUri = options.tokenUri;
    this.scopes =
      options.scopes === undefined ? undefined : ScopeUtils.normalizeScopeInput(options.scopes);
    this.subject = options.subject;
    this.additionalClaims = { ...options.additionalClaims };
    this.tokenLifetime = options.tokenLifetime ?? DEFAULT_TOKEN_LIFETIME_SECS;
  }

  /**
   * @throws {ParseError} When key fields are missing or the key is unreadable
   */
  public static fromServiceAccountInfo(
    info: unknown,
    options: ServiceAccountFileOptions = {},
  ): ServiceAccountCredentials {
    const key = parseServiceAccountKey(info);
    const signer = RsaSigner.fromString(key.private_key, key.private_key_id);
    return new ServiceAccountCredentials(signer, {
      ...options,
      serviceAccountEmail: key.client_email,
      tokenUri: options.tokenUri ?? key.token_uri ?? GOOGLE_OAUTH2_TOKEN_ENDPOINT,
    });
  }

  public static fromServiceAccountFile(
    filePath: string,
    options: ServiceAccountFileOptions = {},
  ): ServiceAccountCredentials {
    return ServiceAccountCredentials.fromServiceAccountInfo(
      readServiceAccountKeyFile(filePath),
      options,
    );
  }

  public get requiresScopes(): boolean {
    return this.scopes === undefined || this.scopes.length === 0;
  }

  public hasScopes(scopes: string | readonly string[]): boolean {
    return ScopeUtils.hasScopes(this.scopes, scopes);
  }

  public withScopes(scopes: string | readonly string[]): ServiceAccountCredentials {
    return new ServiceAccountCredentials(this.signer, { ...this.options, scopes });
  }

  public withSubject(subject: string): ServiceAccountCredentials {
    return new ServiceAccountCredentials(this.signer, { ...this.options, subject });
  }

  public signBytes(message: string | Buffer): Buffer {
    return this.signer.sign(message);
  }

  /**
   * Builds the signed assertion sent to the token endpoint.
   */
  public makeAuthorizationGrantAssertion(): string {
    const issuedAt = Math.floor(Date.now() / 1000);

    const payload: JwtPayload = {
      iat: issuedAt,
      exp: issuedAt + this.tokenLifetime,
      iss: this.serviceAccountEmail,
      aud: this.tokenUri,
      scope: ScopeUtils.formatScopes(this.scopes ?? []),
      ...this.additionalClaims,
    };
    if (this.subject !== undefined && payload.sub === undefined) {
      payload.sub = this.subject;
    }

    return encode(this.signer, payload);
  }

  protected async fetchAccessToken(request: HttpRequest): Promise<AccessToken> {
    if (this.requiresScopes) {
      throw new RefreshError('Service account credentials need scopes before they can refresh');
    }

    const result = await jwtGrant(request, this.tokenUri, this.makeAuthorizationGrantAssertion());
    return { token: result.accessToken, expiry: result.expiry };
  }
}
