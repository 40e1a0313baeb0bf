import type { HttpHeaders, HttpRequest } from '@credbridge/core';
import type { ServiceAccountKey } from '@credbridge/schemas';
import { RsaSigner, type Signer } from '../crypt/signer.js';
import {
  DEFAULT_TOKEN_LIFETIME_SECS,
  encode,
  type JwtPayload,
} from '../jwt/jwt-codec.js';
import { Credentials, type AccessToken } from './base-credentials.js';
import type { SigningCredentials } from './capabilities.js';
import {
  parseServiceAccountKey,
  readServiceAccountKeyFile,
} from './util/service-account-key.js';

export interface JwtCredentialsOptions {
  /** `iss` claim */
  issuer: string;
  /** `sub` claim, defaults to the issuer */
  subject?: string;
  /** Fixed `aud` claim. Without one, each request gets a one-time token */
  audience?: string;
  /** Merged over the standard claims */
  additionalClaims?: JwtPayload;
  /** Seconds, defaults to {@link DEFAULT_TOKEN_LIFETIME_SECS} */
  tokenLifetime?: number;
}

export type JwtClaimOverrides = Partial<Omit<JwtCredentialsOptions, 'tokenLifetime'>>;

/**
 * Strips query and fragment from a URL, leaving scheme, host and path.
 */
export function audienceFromUrl(url: string): string {
  const [audience] = url.split(/[?#]/, 1);
  return audience;
}

/**
 * Self-signed JWT bearer credentials.
 *
 * With a fixed audience the minted token is cached until it expires. Without
 * one, {@link JwtCredentials.beforeRequest} stamps a fresh token for every
 * request, scoped to the request URL, and never touches the cached state.
 * @example
 * ```typescript
 * const credentials = JwtCredentials.fromServiceAccountFile('key.json', {
 *   audience: 'https://pubsub.googleapis.com/',
 * });
 * await credentials.refresh(request);
 * ```
 * @public
 */
export class JwtCredentials extends Credentials implements SigningCredentials {
  public readonly issuer: string;
  public readonly subject: string;
  public readonly audience: string | undefined;
  public readonly additionalClaims: Readonly<JwtPayload>;
  public readonly tokenLifetime: number;

  public constructor(
    public readonly signer: Signer,
    options: JwtCredentialsOptions,
  ) {
    super();
    this.issuer = options.issuer;
    this.subject = options.subject ?? options.issuer;
    this.audience = options.audience;
    this.additionalClaims = { ...options.additionalClaims };
    this.tokenLifetime = options.tokenLifetime ?? DEFAULT_TOKEN_LIFETIME_SECS;
  }

  /**
   * Builds credentials from parsed service account key material.
   * The issuer and subject default to `client_email`.
   * @throws {ParseError} When key fields are missing or the key is unreadable
   */
  public static fromServiceAccountInfo(
    info: unknown,
    options: Partial<JwtCredentialsOptions> = {},
  ): JwtCredentials {
    const key: ServiceAccountKey = parseServiceAccountKey(info);
    const signer = RsaSigner.fromString(key.private_key, key.private_key_id);
    return new JwtCredentials(signer, {
      ...options,
      issuer: options.issuer ?? key.client_email,
      subject: options.subject ?? key.client_email,
    });
  }

  public static fromServiceAccountFile(
    filePath: string,
    options: Partial<JwtCredentialsOptions> = {},
  ): JwtCredentials {
    return JwtCredentials.fromServiceAccountInfo(readServiceAccountKeyFile(filePath), options);
  }

  /**
   * Returns a copy with the given claims replaced. `additionalClaims` are
   * merged over the current ones.
   */
  public withClaims(overrides: JwtClaimOverrides): JwtCredentials {
    return new JwtCredentials(this.signer, {
      issuer: overrides.issuer ?? this.issuer,
      subject: overrides.subject ?? this.subject,
      audience: overrides.audience ?? this.audience,
      additionalClaims: { ...this.additionalClaims, ...overrides.additionalClaims },
      tokenLifetime: this.tokenLifetime,
    });
  }

  public signBytes(message: string | Buffer): Buffer {
    return this.signer.sign(message);
  }

  public get mintsPerRequest(): boolean {
    return this.audience === undefined;
  }

  public async beforeRequest(
    request: HttpRequest,
    method: string,
    url: string,
    headers: HttpHeaders,
  ): Promise<void> {
    if (this.audience !== undefined) {
      return super.beforeRequest(request, method, url, headers);
    }

    const { token } = this.makeJwt(audienceFromUrl(url));
    this.apply(headers, token);
  }

  protected async fetchAccessToken(): Promise<AccessToken> {
    return this.makeJwt(this.audience);
  }

  private makeJwt(audience: string | undefined): Required<AccessToken> {
    const issuedAt = Math.floor(Date.now() / 1000);
    const expiresAt = issuedAt + this.tokenLifetime;

    const payload: JwtPayload = {
      iss: this.issuer,
      sub: this.subject,
      iat: issuedAt,
      exp: expiresAt,
    };
    if (audience !== undefined) {
      payload.aud = audience;
    }

    return {
      token: encode(this.signer, { ...payload, ...this.additionalClaims }),
      expiry: new Date(expiresAt * 1000),
    };
  }
}
