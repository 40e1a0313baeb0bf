import { generateKeyPairSync } from 'crypto';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { HttpRequest, HttpResponse } from '@credbridge/core';
import { Credentials, type AccessToken } from '../implementations/base-credentials.js';

export interface TestKeyPair {
  privateKey: string;
  publicKey: string;
}

export function generateTestKeyPair(): TestKeyPair {
  return generateKeyPairSync('rsa', {
    modulusLength: 2048,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
  });
}

// Shared across suites; key generation is slow
export const TEST_KEYS = generateTestKeyPair();
export const OTHER_TEST_KEYS = generateTestKeyPair();

export const TEST_SERVICE_ACCOUNT_EMAIL = 'test-sa@test-project.iam.example.com';
export const TEST_TOKEN_URI = 'https://oauth2.example.com/token';

export function createServiceAccountInfo(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    type: 'service_account',
    project_id: 'test-project',
    private_key_id: 'test-key-id',
    private_key: TEST_KEYS.privateKey,
    client_email: TEST_SERVICE_ACCOUNT_EMAIL,
    client_id: '1234',
    token_uri: TEST_TOKEN_URI,
    ...overrides,
  };
}

export function createAuthorizedUserInfo(
  overrides: Record<string, unknown> = {},
): Record<string, unknown> {
  return {
    type: 'authorized_user',
    refresh_token: 'r',
    client_id: 'c',
    client_secret: 's',
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    status,
    headers: { 'content-type': 'application/json' },
    data: JSON.stringify(body),
  };
}

export function textResponse(data: string, status = 200): HttpResponse {
  return { status, headers: { 'content-type': 'text/plain' }, data };
}

/**
 * In-process stand-in for the request capability.
 */
export function createMockRequest() {
  return vi.fn<HttpRequest>();
}

/**
 * Decodes the form body of the nth call of a mock request.
 */
export function formBodyOf(
  request: ReturnType<typeof createMockRequest>,
  call = 0,
): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(request.mock.calls[call][0].body ?? ''));
}

export function createTempDir(): string {
  return mkdtempSync(path.join(tmpdir(), 'credbridge-'));
}

export function writeJson(dir: string, name: string, value: unknown): string {
  const filePath = path.join(dir, name);
  writeFileSync(filePath, JSON.stringify(value));
  return filePath;
}

/**
 * Splits a compact JWT into its decoded header and payload.
 */
export function readJwt(token: string): {
  header: Record<string, unknown>;
  payload: Record<string, unknown>;
} {
  const [header, payload] = token.split('.');
  return {
    header: JSON.parse(Buffer.from(header, 'base64url').toString('utf8')),
    payload: JSON.parse(Buffer.from(payload, 'base64url').toString('utf8')),
  };
}

/**
 * Credentials whose token hook is a mock; hands out `token-1`, `token-2`, ...
 * unless told otherwise.
 */
export class StubCredentials extends Credentials {
  public readonly fetchToken = vi.fn<(request: HttpRequest) => Promise<AccessToken>>();
  private issued = 0;

  public constructor(initial: Partial<AccessToken> = {}) {
    super(initial);
    this.fetchToken.mockImplementation(async () => {
      this.issued += 1;
      return { token: `token-${this.issued}` };
    });
  }

  protected fetchAccessToken(request: HttpRequest): Promise<AccessToken> {
    return this.fetchToken(request);
  }
}
