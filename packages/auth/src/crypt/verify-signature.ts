import { createPublicKey, verify, type KeyObject } from 'crypto';
import { ParseError } from '../errors/credential-errors.js';

function loadPublicKey(certificate: string): KeyObject {
  try {
    return createPublicKey(certificate);
  } catch (error) {
    throw new ParseError(
      'Certificate is not a PEM-encoded X.509 certificate or public key',
      error instanceof Error ? error : undefined,
    );
  }
}

/**
 * Checks an RSA SHA-256 signature against one or more certificates.
 * @param message - Signed bytes or UTF-8 text
 * @param signature - Raw signature bytes
 * @param certs - PEM X.509 certificates or SPKI public keys
 * @returns true if any certificate verifies the signature
 * @throws {ParseError} When a certificate cannot be loaded
 * @public
 */
export function verifySignature(
  message: string | Buffer,
  signature: Buffer,
  certs: string | readonly string[],
): boolean {
  const data = typeof message === 'string' ? Buffer.from(message, 'utf8') : message;
  const candidates = typeof certs === 'string' ? [certs] : certs;

  return candidates.some((cert) => verify('sha256', data, loadPublicKey(cert), signature));
}
