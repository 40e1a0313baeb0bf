import { createPrivateKey, sign, type KeyObject } from 'crypto';
import { ParseError } from '../errors/credential-errors.js';

/**
 * Produces RSASSA-PKCS1-v1_5 SHA-256 signatures.
 * @public
 */
export interface Signer {
  /** Identifies the key; used as the JWT `kid` header */
  readonly keyId?: string;
  sign(message: string | Buffer): Buffer;
}

/**
 * Signer backed by a PEM-encoded RSA private key.
 * @example
 * ```typescript
 * const signer = RsaSigner.fromString(info.private_key, info.private_key_id);
 * const signature = signer.sign('payload');
 * ```
 * @public
 */
export class RsaSigner implements Signer {
  private constructor(
    private readonly key: KeyObject,
    public readonly keyId?: string,
  ) {}

  /**
   * @param privateKey - PKCS#1 or PKCS#8 PEM text
   * @param keyId - Optional key identifier
   * @throws {ParseError} When no private key can be read from the input
   */
  public static fromString(privateKey: string, keyId?: string): RsaSigner {
    let key: KeyObject;
    try {
      key = createPrivateKey(privateKey);
    } catch (error) {
      throw new ParseError(
        'No key could be detected in the private key material',
        error instanceof Error ? error : undefined,
      );
    }
    return new RsaSigner(key, keyId);
  }

  public sign(message: string | Buffer): Buffer {
    const data = typeof message === 'string' ? Buffer.from(message, 'utf8') : message;
    return sign('sha256', data, this.key);
  }
}
