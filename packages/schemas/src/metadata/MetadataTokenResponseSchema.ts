import { z } from 'zod';

/**
 * Body of `instance/service-accounts/<account>/token` on the metadata server.
 * @public
 */
export const MetadataTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().nonnegative(),
  token_type: z.string().optional(),
});

export type MetadataTokenResponse = z.infer<typeof MetadataTokenResponseSchema>;
