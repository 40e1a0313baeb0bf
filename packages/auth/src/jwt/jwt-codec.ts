import type { Signer } from '../crypt/signer.js';
import { verifySignature } from '../crypt/verify-signature.js';
import { ParseError, VerificationError } from '../errors/credential-errors.js';
import { base64UrlDecode, base64UrlEncode } from '../utils/encoding/base64url.js';
import { isRecord } from '../utils/file/is-record.js';

/** Seconds of tolerance applied to `iat` and `exp` checks */
export const CLOCK_SKEW_SECS = 300;

/** Lifetime of self-signed tokens unless configured otherwise */
export const DEFAULT_TOKEN_LIFETIME_SECS = 3600;

/** JOSE header; `typ`, `alg` and `kid` are set by {@link encode} */
export type JwtHeader = Record<string, unknown>;

export type JwtPayload = Record<string, unknown>;

/**
 * Certificates for signature checks: one PEM, or PEMs keyed by `kid`.
 */
export type JwtCertificates = string | Readonly<Record<string, string>>;

export interface DecodeOptions {
  certs?: JwtCertificates;
  /** Check signature, time claims and audience; defaults to true */
  verify?: boolean;
  /** Expected `aud` claim; not checked when omitted */
  audience?: string;
}

interface DecodedSegments {
  header: JwtHeader;
  payload: JwtPayload;
  signedSection: string;
  signature: Buffer;
}

function decodeJsonSegment(segment: string, name: string): Record<string, unknown> {
  const bytes = base64UrlDecode(segment);
  let value: unknown;
  try {
    value = JSON.parse(bytes.toString('utf8'));
  } catch (error) {
    throw new ParseError(
      `Can't parse token ${name} segment`,
      error instanceof Error ? error : undefined,
    );
  }
  if (!isRecord(value)) {
    throw new ParseError(`Token ${name} segment is not a JSON object`);
  }
  return value;
}

function splitToken(token: string): [string, string, string] {
  const segments = token.split('.');
  if (segments.length !== 3) {
    throw new VerificationError(
      `Wrong number of segments in token: expected 3, got ${segments.length}`,
    );
  }
  return [segments[0], segments[1], segments[2]];
}

function unverifiedDecode(token: string): DecodedSegments {
  const [headerSegment, payloadSegment, signatureSegment] = splitToken(token);

  return {
    header: decodeJsonSegment(headerSegment, 'header'),
    payload: decodeJsonSegment(payloadSegment, 'payload'),
    signedSection: `${headerSegment}.${payloadSegment}`,
    signature: base64UrlDecode(signatureSegment),
  };
}

function selectCertificates(header: JwtHeader, certs: JwtCertificates): string[] {
  if (typeof certs === 'string') {
    return [certs];
  }

  const keyId = header.kid;
  // An empty kid carries no key id
  if (keyId === undefined || keyId === '') {
    return Object.values(certs);
  }
  if (typeof keyId !== 'string' || !Object.prototype.hasOwnProperty.call(certs, keyId)) {
    throw new VerificationError(`Certificate for key id ${String(keyId)} not found`);
  }
  return [certs[keyId]];
}

function readTimeClaim(payload: JwtPayload, claim: 'iat' | 'exp'): number {
  const value = payload[claim];
  if (value === undefined) {
    throw new VerificationError(`Token does not contain required claim ${claim}`);
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new VerificationError(`Token claim ${claim} is not a number`);
  }
  return value;
}

function verifyTimes(payload: JwtPayload): void {
  const issuedAt = readTimeClaim(payload, 'iat');
  const expiresAt = readTimeClaim(payload, 'exp');
  const now = Math.floor(Date.now() / 1000);

  const earliest = issuedAt - CLOCK_SKEW_SECS;
  if (now < earliest) {
    throw new VerificationError(`Token used too early, ${now} < ${issuedAt}`);
  }

  const latest = expiresAt + CLOCK_SKEW_SECS;
  if (latest < now) {
    throw new VerificationError(`Token expired, ${latest} < ${now}`);
  }
}

/**
 * Encodes and signs a compact JWT.
 *
 * `typ` and `alg` are always `JWT` and `RS256`. The `kid` header is the
 * signer's key id unless `keyId` names another one; `false` or `null` leaves
 * it out.
 * @param signer - Signs `header.payload`
 * @param payload - Claim set
 * @param header - Extra header fields
 * @param keyId - Overrides or suppresses the `kid` header
 * @example
 * ```typescript
 * const token = encode(signer, { iss: 'issuer@example.com', aud: 'https://api.example.com' });
 * ```
 * @public
 */
export function encode(
  signer: Signer,
  payload: JwtPayload,
  header: JwtHeader = {},
  keyId?: string | false | null,
): string {
  const kid = keyId === undefined ? signer.keyId : keyId;
  const fullHeader: JwtHeader = { ...header, typ: 'JWT', alg: 'RS256' };
  if (typeof kid === 'string') {
    fullHeader.kid = kid;
  }

  const signedSection = [
    base64UrlEncode(JSON.stringify(fullHeader)),
    base64UrlEncode(JSON.stringify(payload)),
  ].join('.');
  const signature = signer.sign(signedSection);

  return `${signedSection}.${base64UrlEncode(signature)}`;
}

/**
 * Returns the header of a token without checking its signature.
 * @throws {VerificationError} When the token does not have three segments
 * @throws {ParseError} When the header segment is not base64url JSON
 * @public
 */
export function decodeHeader(token: string): JwtHeader {
  const [headerSegment] = splitToken(token);
  return decodeJsonSegment(headerSegment, 'header');
}

/**
 * Decodes a token and, unless `verify` is false, checks its signature,
 * `iat`/`exp` claims (with {@link CLOCK_SKEW_SECS} tolerance) and audience.
 * @throws {ParseError} When a segment is not base64url JSON
 * @throws {VerificationError} When any check fails
 * @public
 */
export function decode(token: string, options: DecodeOptions = {}): JwtPayload {
  const { header, payload, signedSection, signature } = unverifiedDecode(token);
  const { verify = true, certs, audience } = options;

  if (!verify) {
    return payload;
  }

  if (certs === undefined) {
    throw new VerificationError('No certificates provided to verify token signature');
  }

  const candidates = selectCertificates(header, certs);
  if (!verifySignature(signedSection, signature, candidates)) {
    throw new VerificationError('Could not verify token signature');
  }

  verifyTimes(payload);

  if (audience !== undefined && payload.aud !== audience) {
    throw new VerificationError(
      `Token has wrong audience ${String(payload.aud)}, expected ${audience}`,
    );
  }

  return payload;
}
