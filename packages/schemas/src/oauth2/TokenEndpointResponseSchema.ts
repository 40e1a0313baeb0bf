import { z } from 'zod';

/**
 * Successful token endpoint response (RFC 6749 section 5.1).
 *
 * Unknown fields are kept so callers can read provider extensions such as
 * `id_token` from the raw response.
 * @public
 */
export const TokenEndpointResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().optional(),
    expires_in: z.number().nonnegative().optional(),
    refresh_token: z.string().optional(),
    scope: z.string().optional(),
    id_token: z.string().optional(),
  })
  .passthrough();

export type TokenEndpointResponse = z.infer<typeof TokenEndpointResponseSchema>;

/**
 * Token endpoint error response (RFC 6749 section 5.2).
 * @public
 */
export const TokenEndpointErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
  error_uri: z.string().optional(),
});

export type TokenEndpointError = z.infer<typeof TokenEndpointErrorSchema>;
