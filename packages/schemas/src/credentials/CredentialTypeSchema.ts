import { z } from 'zod';

/**
 * Values accepted in the `type` field of a credentials file.
 * @public
 */
export const CREDENTIAL_FILE_TYPES = ['authorized_user', 'service_account'] as const;

export const CredentialFileTypeSchema = z.enum(CREDENTIAL_FILE_TYPES);

export type CredentialFileType = z.infer<typeof CredentialFileTypeSchema>;
