import type { Signer } from '../crypt/signer.js';
import type { Credentials } from './base-credentials.js';

/**
 * Credentials whose access is limited by OAuth2 scopes.
 * @public
 */
export interface ScopedCredentials {
  readonly scopes: readonly string[] | undefined;
  /** True while the credentials cannot be used until scopes are set */
  readonly requiresScopes: boolean;
  /** @param scopes - A scope list or a space-separated string */
  hasScopes(scopes: string | readonly string[]): boolean;
  /**
   * Returns a copy limited to the given scopes.
   * @throws {UnsupportedOperationError} When scopes are fixed at issuance
   */
  withScopes(scopes: string | readonly string[]): Credentials & ScopedCredentials;
}

/**
 * Credentials holding a private key they can sign arbitrary bytes with.
 * @public
 */
export interface SigningCredentials {
  readonly signer: Signer;
  signBytes(message: string | Buffer): Buffer;
}

export function isScoped(
  credentials: Credentials,
): credentials is Credentials & ScopedCredentials {
  return 'withScopes' in credentials && typeof credentials.withScopes === 'function';
}

export function isSigning(
  credentials: Credentials,
): credentials is Credentials & SigningCredentials {
  return 'signBytes' in credentials && typeof credentials.signBytes === 'function';
}
