import { ParseError } from '../../errors/credential-errors.js';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*={0,2}$/;

/**
 * Encodes bytes or UTF-8 text as unpadded base64url (RFC 4648 section 5).
 */
export function base64UrlEncode(value: string | Buffer): string {
  const bytes = typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
  return bytes.toString('base64url');
}

/**
 * Decodes base64url with or without padding.
 * @throws {ParseError} When the input holds characters outside the alphabet
 *   or has an impossible length
 */
export function base64UrlDecode(segment: string): Buffer {
  const unpadded = segment.replace(/=+$/, '');
  if (!BASE64URL_PATTERN.test(segment) || unpadded.length % 4 === 1) {
    throw new ParseError('Segment is not valid base64url');
  }
  return Buffer.from(unpadded, 'base64url');
}
