import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { RsaSigner } from '../../crypt/signer.js';
import { ParseError, VerificationError } from '../../errors/credential-errors.js';
import { CLOCK_SKEW_SECS, decode, decodeHeader, encode } from '../../jwt/jwt-codec.js';
import { OTHER_TEST_KEYS, TEST_KEYS, readJwt } from '../test-utils.js';

// 2026-01-01T00:00:00Z
const NOW = 1767225600;

describe('JWT codec', () => {
  const signer = RsaSigner.fromString(TEST_KEYS.privateKey, 'test-key-id');

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW * 1000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function validPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
    return { iss: 'issuer', iat: NOW, exp: NOW + 3600, aud: 'https://api.example.com', ...overrides };
  }

  describe('encode', () => {
    it('builds a three-segment token with the signer key id', () => {
      const token = encode(signer, { a: 1 });

      expect(token.split('.')).toHaveLength(3);
      expect(readJwt(token).header).toEqual({ typ: 'JWT', alg: 'RS256', kid: 'test-key-id' });
    });

    it('lets an explicit key id override or suppress the signer key id', () => {
      expect(readJwt(encode(signer, {}, {}, 'other-key')).header.kid).toBe('other-key');
      expect(readJwt(encode(signer, {}, {}, false)).header).toEqual({ typ: 'JWT', alg: 'RS256' });
      expect(readJwt(encode(signer, {}, {}, null)).header).not.toHaveProperty('kid');
    });

    it('keeps extra header fields but forces typ and alg', () => {
      const header = { alg: 'none', x5u: 'https://certs.example.com' };
      const token = encode(signer, {}, header);

      expect(readJwt(token).header).toEqual({
        alg: 'RS256',
        typ: 'JWT',
        x5u: 'https://certs.example.com',
        kid: 'test-key-id',
      });
      expect(header).toEqual({ alg: 'none', x5u: 'https://certs.example.com' });
    });

    it('emits segments without padding', () => {
      expect(encode(signer, { a: 1 })).not.toContain('=');
    });
  });

  describe('decode without verification', () => {
    it('returns the payload exactly', () => {
      const payload = { sub: 'user', nested: { list: [1, 'two', null], flag: true }, n: 1.5 };

      expect(decode(encode(signer, payload), { verify: false })).toEqual(payload);
    });

    it('does not need certificates', () => {
      const token = encode(RsaSigner.fromString(OTHER_TEST_KEYS.privateKey), { a: 1 });

      expect(decode(token, { verify: false })).toEqual({ a: 1 });
    });
  });

  describe('decode with verification', () => {
    it('accepts a token signed by the given certificate', () => {
      const payload = validPayload();

      expect(decode(encode(signer, payload), { certs: TEST_KEYS.publicKey })).toEqual(payload);
    });

    it('selects the certificate matching the kid header', () => {
      const token = encode(signer, validPayload());
      const certs = { 'other-key': OTHER_TEST_KEYS.publicKey, 'test-key-id': TEST_KEYS.publicKey };

      expect(decode(token, { certs })).toEqual(validPayload());
    });

    it('fails when the kid is not in the certificate mapping', () => {
      const token = encode(signer, validPayload());

      expect(() => decode(token, { certs: { 'other-key': TEST_KEYS.publicKey } })).toThrow(
        'Certificate for key id test-key-id not found',
      );
    });

    it('tries every certificate when the token has no kid', () => {
      const token = encode(signer, validPayload(), {}, false);
      const certs = { first: OTHER_TEST_KEYS.publicKey, second: TEST_KEYS.publicKey };

      expect(decode(token, { certs })).toEqual(validPayload());
    });

    it('treats an empty kid like a missing one', () => {
      const token = encode(signer, validPayload(), {}, '');
      const certs = { a: OTHER_TEST_KEYS.publicKey, b: TEST_KEYS.publicKey };

      expect(decodeHeader(token).kid).toBe('');
      expect(decode(token, { certs })).toEqual(validPayload());
    });

    it('fails on a signature from another key', () => {
      const token = encode(RsaSigner.fromString(OTHER_TEST_KEYS.privateKey), validPayload());

      expect(() => decode(token, { certs: TEST_KEYS.publicKey })).toThrow(
        new VerificationError('Could not verify token signature'),
      );
    });

    it('fails when the payload was altered after signing', () => {
      const [header, , signature] = encode(signer, validPayload()).split('.');
      const forged = Buffer.from(JSON.stringify(validPayload({ iss: 'attacker' }))).toString(
        'base64url',
      );

      expect(() => decode(`${header}.${forged}.${signature}`, { certs: TEST_KEYS.publicKey })).toThrow(
        VerificationError,
      );
    });

    it('fails without certificates', () => {
      expect(() => decode(encode(signer, validPayload()))).toThrow(VerificationError);
    });

    it.each(['iat', 'exp'])('fails when %s is missing', (claim) => {
      const payload = validPayload();
      delete payload[claim];

      expect(() => decode(encode(signer, payload), { certs: TEST_KEYS.publicKey })).toThrow(
        `Token does not contain required claim ${claim}`,
      );
    });

    it('fails when a time claim is not a number', () => {
      const token = encode(signer, validPayload({ exp: 'tomorrow' }));

      expect(() => decode(token, { certs: TEST_KEYS.publicKey })).toThrow(
        'Token claim exp is not a number',
      );
    });

    it('tolerates clock skew on iat', () => {
      const early = encode(signer, validPayload({ iat: NOW + CLOCK_SKEW_SECS }));
      const tooEarly = encode(signer, validPayload({ iat: NOW + CLOCK_SKEW_SECS + 1 }));

      expect(decode(early, { certs: TEST_KEYS.publicKey })).toHaveProperty('iat', NOW + 300);
      expect(() => decode(tooEarly, { certs: TEST_KEYS.publicKey })).toThrow(
        `Token used too early, ${NOW} < ${NOW + 301}`,
      );
    });

    it('tolerates clock skew on exp', () => {
      const late = encode(signer, validPayload({ exp: NOW - CLOCK_SKEW_SECS }));
      const expired = encode(signer, validPayload({ exp: NOW - CLOCK_SKEW_SECS - 1 }));

      expect(decode(late, { certs: TEST_KEYS.publicKey })).toHaveProperty('exp', NOW - 300);
      expect(() => decode(expired, { certs: TEST_KEYS.publicKey })).toThrow(
        `Token expired, ${NOW - 1} < ${NOW}`,
      );
    });

    it('checks the audience when one is expected', () => {
      const token = encode(signer, validPayload());

      expect(
        decode(token, { certs: TEST_KEYS.publicKey, audience: 'https://api.example.com' }),
      ).toEqual(validPayload());
      expect(() =>
        decode(token, { certs: TEST_KEYS.publicKey, audience: 'https://other.example.com' }),
      ).toThrow(
        'Token has wrong audience https://api.example.com, expected https://other.example.com',
      );
    });
  });

  describe('segment handling', () => {
    it('rejects a token with four segments', () => {
      const token = `${encode(signer, validPayload())}.extra`;

      expect(() => decode(token, { verify: false })).toThrow(VerificationError);
      expect(() => decode(token, { certs: TEST_KEYS.publicKey })).toThrow(
        'Wrong number of segments in token: expected 3, got 4',
      );
    });

    it('rejects a token with two segments', () => {
      expect(() => decode('abc.def', { verify: false })).toThrow(VerificationError);
    });

    it('raises ParseError for segments that are not base64url JSON', () => {
      const [, payload, signature] = encode(signer, { a: 1 }).split('.');

      expect(() => decode(`***.${payload}.${signature}`, { verify: false })).toThrow(ParseError);
      expect(() =>
        decode(`${Buffer.from('not json').toString('base64url')}.${payload}.${signature}`, {
          verify: false,
        }),
      ).toThrow("Can't parse token header segment");
      expect(() =>
        decode(`${Buffer.from('[1]').toString('base64url')}.${payload}.${signature}`, {
          verify: false,
        }),
      ).toThrow('Token header segment is not a JSON object');
    });
  });

  describe('decodeHeader', () => {
    it('returns the header without checking the signature', () => {
      const token = encode(RsaSigner.fromString(OTHER_TEST_KEYS.privateKey, 'k1'), { a: 1 });

      expect(decodeHeader(token)).toEqual({ typ: 'JWT', alg: 'RS256', kid: 'k1' });
    });

    it('requires three segments', () => {
      expect(() => decodeHeader('only.two')).toThrow(VerificationError);
    });
  });
});
