import { ServiceAccountKeySchema, type ServiceAccountKey } from '@credbridge/schemas';
import { ParseError } from '../../errors/credential-errors.js';
import { readJsonFile } from '../../utils/file/parse-json.js';

/**
 * Validates service account key material.
 * @param info - Parsed key file
 * @param source - Names the input in error messages
 * @throws {ParseError} Listing every missing or malformed field
 */
export function parseServiceAccountKey(
  info: unknown,
  source = 'Service account info',
): ServiceAccountKey {
  const parsed = ServiceAccountKeySchema.safeParse(info);
  if (!parsed.success) {
    throw new ParseError(
      `${source} is missing required fields: ${parsed.error.issues
        .map((issue) => issue.path.join('.') || 'body')
        .join(', ')}`,
    );
  }
  return parsed.data;
}

export function readServiceAccountKeyFile(filePath: string): ServiceAccountKey {
  return parseServiceAccountKey(readJsonFile(filePath), `File ${filePath}`);
}
