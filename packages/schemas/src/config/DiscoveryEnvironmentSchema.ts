import { z } from 'zod';

// Empty variables are treated as unset
const optionalEnv = z.preprocess(
  (value: unknown) => (value === '' ? undefined : value),
  z.string().optional(),
);

/**
 * Environment variables read by default credential discovery.
 *
 * Parses a raw environment record (usually `process.env`) into a typed,
 * camel-cased configuration object.
 *
 * @example
 * ```typescript
 * const env = DiscoveryEnvironmentSchema.parse(process.env);
 * env.credentialsFile; // GOOGLE_APPLICATION_CREDENTIALS
 * env.projectId;       // GCLOUD_PROJECT
 * ```
 * @public
 */
export const DiscoveryEnvironmentSchema = z
  .object({
    GOOGLE_APPLICATION_CREDENTIALS: optionalEnv,
    GCLOUD_PROJECT: optionalEnv,
    CLOUDSDK_CONFIG: optionalEnv,
    APPDATA: optionalEnv,
    SystemDrive: optionalEnv,
    GCE_METADATA_HOST: optionalEnv,
    GCE_METADATA_IP: optionalEnv,
  })
  .transform((env) => ({
    credentialsFile: env.GOOGLE_APPLICATION_CREDENTIALS,
    projectId: env.GCLOUD_PROJECT,
    sdkConfigDir: env.CLOUDSDK_CONFIG,
    appData: env.APPDATA,
    systemDrive: env.SystemDrive,
    metadataHost: env.GCE_METADATA_HOST,
    metadataIp: env.GCE_METADATA_IP,
  }));

export type DiscoveryEnvironment = z.output<typeof DiscoveryEnvironmentSchema>;
