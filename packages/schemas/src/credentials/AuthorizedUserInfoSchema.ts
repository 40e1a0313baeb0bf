import { z } from 'zod';

/**
 * Stored end-user credentials, as written by the SDK's
 * `auth application-default login` into `application_default_credentials.json`.
 *
 * @public
 */
export const AuthorizedUserInfoSchema = z
  .object({
    type: z.literal('authorized_user'),
    client_id: z.string().min(1),
    client_secret: z.string().min(1),
    refresh_token: z.string().min(1),
    quota_project_id: z.string().optional(),
  })
  .passthrough();

export type AuthorizedUserInfo = z.infer<typeof AuthorizedUserInfoSchema>;
