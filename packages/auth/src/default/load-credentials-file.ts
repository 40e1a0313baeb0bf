import {
  AuthorizedUserInfoSchema,
  CREDENTIAL_FILE_TYPES,
  CredentialFileTypeSchema,
  ServiceAccountInfoSchema,
} from '@credbridge/schemas';
import type { z } from 'zod';
import { InvalidCredentialTypeError, ParseError } from '../errors/credential-errors.js';
import type { Credentials } from '../implementations/base-credentials.js';
import { JwtCredentials } from '../implementations/jwt-credentials.js';
import { OAuth2Credentials } from '../implementations/oauth2-credentials.js';
import { GOOGLE_OAUTH2_TOKEN_ENDPOINT } from '../oauth2/constants.js';
import { isRecord } from '../utils/file/is-record.js';
import { readJsonFile } from '../utils/file/parse-json.js';

/**
 * Credentials picked by discovery, with the project they belong to if known.
 * @public
 */
export interface CredentialsResult {
  credentials: Credentials;
  projectId: string | undefined;
}

function missingFields(filePath: string, error: z.ZodError): ParseError {
  const fields = error.issues.map((issue) => issue.path.join('.') || 'body').join(', ');
  return new ParseError(`The file ${filePath} is missing required fields: ${fields}`);
}

/**
 * Loads credentials from a JSON credentials file.
 *
 * `authorized_user` files become {@link OAuth2Credentials} against the
 * fixed token endpoint, without a project. `service_account` files become
 * {@link JwtCredentials} signed with the embedded key, with the file's
 * `project_id`.
 * @throws {ParseError} When the file is not JSON or misses required fields
 * @throws {InvalidCredentialTypeError} When `type` is missing or unknown
 * @public
 */
export function loadCredentialsFromFile(filePath: string): CredentialsResult {
  const info = readJsonFile(filePath);
  const type = isRecord(info) ? info.type : undefined;

  const credentialType = CredentialFileTypeSchema.safeParse(type);
  if (!credentialType.success) {
    throw new InvalidCredentialTypeError(
      `The file ${filePath} does not have a valid type. Type is ${String(type)}, ` +
        `expected one of ${CREDENTIAL_FILE_TYPES.join(', ')}.`,
    );
  }

  if (credentialType.data === 'authorized_user') {
    const parsed = AuthorizedUserInfoSchema.safeParse(info);
    if (!parsed.success) {
      throw missingFields(filePath, parsed.error);
    }
    return {
      credentials: new OAuth2Credentials({
        refreshToken: parsed.data.refresh_token,
        tokenUri: GOOGLE_OAUTH2_TOKEN_ENDPOINT,
        clientId: parsed.data.client_id,
        clientSecret: parsed.data.client_secret,
      }),
      projectId: undefined,
    };
  }

  const parsed = ServiceAccountInfoSchema.safeParse(info);
  if (!parsed.success) {
    throw missingFields(filePath, parsed.error);
  }
  return {
    credentials: JwtCredentials.fromServiceAccountInfo(parsed.data),
    projectId: parsed.data.project_id,
  };
}
