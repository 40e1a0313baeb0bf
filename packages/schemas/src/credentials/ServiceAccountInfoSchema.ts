import { z } from 'zod';

/**
 * Key material of a service account, without the file's `type` marker.
 *
 * `private_key` is a PEM-encoded PKCS#8 RSA key; `private_key_id` becomes the
 * `kid` header of every JWT signed with it.
 *
 * @public
 */
export const ServiceAccountKeySchema = z
  .object({
    client_email: z.string().min(1),
    private_key_id: z.string().min(1),
    private_key: z.string().min(1),
    project_id: z.string().optional(),
    client_id: z.string().optional(),
    token_uri: z.string().url().optional(),
  })
  .passthrough();

export type ServiceAccountKey = z.infer<typeof ServiceAccountKeySchema>;

/**
 * Service account key file as downloaded from the cloud console.
 * @public
 */
export const ServiceAccountInfoSchema = ServiceAccountKeySchema.extend({
  type: z.literal('service_account'),
});

export type ServiceAccountInfo = z.infer<typeof ServiceAccountInfoSchema>;
