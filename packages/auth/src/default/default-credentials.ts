import { existsSync } from 'fs';
import { homedir } from 'os';
import {
  createFetchRequest,
  logEvent,
  TransportError,
  type HttpRequest,
} from '@credbridge/core';
import { DiscoveryEnvironmentSchema, type DiscoveryEnvironment } from '@credbridge/schemas';
import { DiscoveryError, ParseError } from '../errors/credential-errors.js';
import { ComputeEngineCredentials } from '../implementations/compute-engine-credentials.js';
import { getProjectId, ping, type MetadataOptions } from '../metadata/metadata-client.js';
import { HELP_MESSAGE } from './constants.js';
import { loadCredentialsFromFile, type CredentialsResult } from './load-credentials-file.js';
import { getSdkConfigPath, getSdkCredentialsPath, readSdkProjectId } from './sdk-config.js';

export interface DefaultCredentialsOptions {
  /** Defaults to `process.env` */
  env?: Record<string, string | undefined>;
  /** Defaults to `process.platform` */
  platform?: NodeJS.Platform;
  /** Defaults to `os.homedir()` */
  homeDir?: string;
  /** Used for metadata probes; defaults to a fetch-backed request */
  request?: HttpRequest;
}

interface DiscoveryContext {
  env: DiscoveryEnvironment;
  platform: NodeJS.Platform;
  homeDir: string;
  request: HttpRequest;
}

type DiscoveryStep = (context: DiscoveryContext) => Promise<CredentialsResult | undefined>;

async function fromExplicitEnvironment({
  env,
}: DiscoveryContext): Promise<CredentialsResult | undefined> {
  if (!env.credentialsFile) {
    return undefined;
  }
  return loadCredentialsFromFile(env.credentialsFile);
}

async function fromSdkConfig({
  env,
  platform,
  homeDir,
}: DiscoveryContext): Promise<CredentialsResult | undefined> {
  const configDir = getSdkConfigPath(env, platform, homeDir);
  const credentialsFile = getSdkCredentialsPath(configDir, platform);
  if (!existsSync(credentialsFile)) {
    return undefined;
  }

  const result = loadCredentialsFromFile(credentialsFile);
  return {
    credentials: result.credentials,
    projectId: result.projectId ?? readSdkProjectId(configDir, platform),
  };
}

// App-hosting built-in identity has no Node.js runtime to query.
async function fromAppHosting(): Promise<CredentialsResult | undefined> {
  return undefined;
}

async function fromMetadataServer({
  env,
  request,
}: DiscoveryContext): Promise<CredentialsResult | undefined> {
  const metadata: MetadataOptions = { host: env.metadataHost, ip: env.metadataIp };
  if (!(await ping(request, metadata))) {
    return undefined;
  }

  let projectId: string | undefined;
  try {
    projectId = await getProjectId(request, metadata);
  } catch (error) {
    if (!(error instanceof TransportError || error instanceof ParseError)) {
      throw error;
    }
    logEvent('warn', 'discovery:project_id_unavailable', { error: error.message });
  }

  return { credentials: new ComputeEngineCredentials({ metadata }), projectId };
}

const DISCOVERY_STEPS: ReadonlyArray<readonly [string, DiscoveryStep]> = [
  ['explicit_environment', fromExplicitEnvironment],
  ['sdk_config', fromSdkConfig],
  ['app_hosting', fromAppHosting],
  ['metadata_server', fromMetadataServer],
];

/**
 * Finds the credentials available to the current process.
 *
 * Tries, in order: the file named by `GOOGLE_APPLICATION_CREDENTIALS`, the
 * SDK's stored user credentials, and the metadata service. `GCLOUD_PROJECT`
 * overrides the project id of whichever source matched.
 * @throws {DiscoveryError} When no source yields credentials
 * @throws {ParseError} When a credentials file that was found is malformed
 * @throws {InvalidCredentialTypeError} When such a file has an unknown type
 * @example
 * ```typescript
 * const { credentials, projectId } = await resolveDefaultCredentials();
 * const http = new AuthorizedHttp(credentials, createFetchRequest());
 * ```
 * @public
 */
export async function resolveDefaultCredentials(
  options: DefaultCredentialsOptions = {},
): Promise<CredentialsResult> {
  const context: DiscoveryContext = {
    env: DiscoveryEnvironmentSchema.parse(options.env ?? process.env),
    platform: options.platform ?? process.platform,
    homeDir: options.homeDir ?? homedir(),
    request: options.request ?? createFetchRequest(),
  };

  for (const [source, step] of DISCOVERY_STEPS) {
    const result = await step(context);
    if (!result) {
      logEvent('debug', 'discovery:source_skipped', { source });
      continue;
    }

    const projectId = context.env.projectId ?? result.projectId;
    logEvent('info', 'discovery:credentials_found', {
      source,
      credentials: result.credentials.constructor.name,
      projectId,
    });
    return { credentials: result.credentials, projectId };
  }

  logEvent('warn', 'discovery:no_credentials', {});
  throw new DiscoveryError(HELP_MESSAGE);
}
