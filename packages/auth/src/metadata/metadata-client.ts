import {
  logEvent,
  TransportError,
  type HttpHeaders,
  type HttpRequest,
} from '@credbridge/core';
import { MetadataTokenResponseSchema } from '@credbridge/schemas';
import { ParseError } from '../errors/credential-errors.js';
import { parseJson } from '../utils/file/parse-json.js';
import { isRecord } from '../utils/file/is-record.js';

export const DEFAULT_METADATA_HOST = 'metadata.google.internal';
export const DEFAULT_METADATA_IP = '169.254.169.254';
export const DEFAULT_PING_TIMEOUT_MS = 3000;

export const METADATA_HEADERS: Readonly<HttpHeaders> = { 'metadata-flavor': 'Google' };

/**
 * Where the metadata service lives. Defaults match a Compute Engine
 * instance; `GCE_METADATA_HOST` / `GCE_METADATA_IP` feed the overrides.
 */
export interface MetadataOptions {
  host?: string;
  ip?: string;
}

export interface PingOptions extends MetadataOptions {
  /** Milliseconds, defaults to {@link DEFAULT_PING_TIMEOUT_MS} */
  timeout?: number;
}

export interface ServiceAccountToken {
  token: string;
  expiry: Date;
}

export function metadataRoot(options: MetadataOptions = {}): string {
  return `http://${options.host ?? DEFAULT_METADATA_HOST}/computeMetadata/v1/`;
}

export function metadataIpRoot(options: MetadataOptions = {}): string {
  return `http://${options.ip ?? DEFAULT_METADATA_IP}`;
}

function isJsonContentType(contentType: string | undefined): boolean {
  return contentType?.split(';')[0].trim().toLowerCase() === 'application/json';
}

/**
 * Checks whether the metadata service answers. Never throws.
 * @returns true when the IP root responds with a 2xx status
 * @public
 */
export async function ping(request: HttpRequest, options: PingOptions = {}): Promise<boolean> {
  const url = metadataIpRoot(options);
  try {
    const response = await request({
      url,
      method: 'GET',
      headers: { ...METADATA_HEADERS },
      timeout: options.timeout ?? DEFAULT_PING_TIMEOUT_MS,
    });
    const reachable = response.status >= 200 && response.status < 300;
    if (!reachable) {
      logEvent('debug', 'metadata:ping_failed', { url, status: response.status });
    }
    return reachable;
  } catch (error) {
    logEvent('debug', 'metadata:ping_failed', {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

/**
 * Fetches a metadata path.
 * @param path - Relative to the metadata root, e.g. `project/project-id`
 * @returns Parsed JSON when the service answers `application/json`, else text
 * @throws {TransportError} On a non-2xx status, carrying the body
 * @throws {ParseError} When a JSON body does not parse
 * @public
 */
export async function get(
  request: HttpRequest,
  path: string,
  options: MetadataOptions = {},
): Promise<unknown> {
  const url = `${metadataRoot(options)}${path}`;
  const response = await request({ url, method: 'GET', headers: { ...METADATA_HEADERS } });

  if (response.status < 200 || response.status >= 300) {
    logEvent('debug', 'metadata:request_failed', { url, status: response.status });
    throw TransportError.fromHttpStatus(response.status, response.data);
  }

  if (isJsonContentType(response.headers['content-type'])) {
    return parseJson(response.data, `Metadata response for ${path}`);
  }
  return response.data;
}

/**
 * @returns The project id of the instance
 * @public
 */
export async function getProjectId(
  request: HttpRequest,
  options: MetadataOptions = {},
): Promise<string> {
  const projectId = await get(request, 'project/project-id', options);
  if (typeof projectId !== 'string') {
    throw new ParseError('Metadata project id is not a plain string');
  }
  return projectId;
}

/**
 * Recursive listing of a service account's metadata: email, aliases, scopes.
 * @public
 */
export async function getServiceAccountInfo(
  request: HttpRequest,
  serviceAccount = 'default',
  options: MetadataOptions = {},
): Promise<Record<string, unknown>> {
  const info = await get(
    request,
    `instance/service-accounts/${serviceAccount}/?recursive=true`,
    options,
  );
  if (!isRecord(info)) {
    throw new ParseError('Metadata service account info is not a JSON object');
  }
  return info;
}

/**
 * Fetches a short-lived access token for an attached service account.
 * @public
 */
export async function getServiceAccountToken(
  request: HttpRequest,
  serviceAccount = 'default',
  options: MetadataOptions = {},
): Promise<ServiceAccountToken> {
  const body = await get(request, `instance/service-accounts/${serviceAccount}/token`, options);
  const parsed = MetadataTokenResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ParseError(
      `Metadata token response is invalid: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join(', ')}`,
    );
  }

  return {
    token: parsed.data.access_token,
    expiry: new Date(Date.now() + parsed.data.expires_in * 1000),
  };
}
