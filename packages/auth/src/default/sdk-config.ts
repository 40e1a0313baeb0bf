import { existsSync, readFileSync } from 'fs';
import path from 'path';
import { logEvent } from '@credbridge/core';
import type { DiscoveryEnvironment } from '@credbridge/schemas';
import { parseIni } from '../utils/ini/parse-ini.js';
import {
  SDK_ACTIVE_CONFIG_PATH,
  SDK_CONFIG_DIRECTORY,
  SDK_CREDENTIALS_FILENAME,
} from './constants.js';

/**
 * Locates the SDK configuration directory.
 *
 * `CLOUDSDK_CONFIG` wins; otherwise `%APPDATA%\gcloud` on Windows (or
 * `%SystemDrive%\gcloud`, drive `C:` by default, without APPDATA) and
 * `~/.config/gcloud` elsewhere.
 * @internal
 */
export function getSdkConfigPath(
  env: DiscoveryEnvironment,
  platform: NodeJS.Platform,
  homeDir: string,
): string {
  if (env.sdkConfigDir) {
    return env.sdkConfigDir;
  }

  if (platform === 'win32') {
    if (env.appData) {
      return path.win32.join(env.appData, SDK_CONFIG_DIRECTORY);
    }
    return path.win32.join(env.systemDrive ?? 'C:', '\\', SDK_CONFIG_DIRECTORY);
  }

  return path.join(homeDir, '.config', SDK_CONFIG_DIRECTORY);
}

export function getSdkCredentialsPath(configDir: string, platform: NodeJS.Platform): string {
  const join = platform === 'win32' ? path.win32.join : path.join;
  return join(configDir, SDK_CREDENTIALS_FILENAME);
}

/**
 * Reads `[core] project` from the SDK's active configuration file.
 * @returns undefined when the file, section or option is missing, or the file
 *   cannot be read
 * @internal
 */
export function readSdkProjectId(
  configDir: string,
  platform: NodeJS.Platform,
): string | undefined {
  const join = platform === 'win32' ? path.win32.join : path.join;
  const configFile = join(configDir, ...SDK_ACTIVE_CONFIG_PATH);

  if (!existsSync(configFile)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(configFile, 'utf8');
  } catch (error) {
    logEvent('debug', 'discovery:sdk_config_unreadable', {
      configFile,
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }

  return parseIni(content).core?.project || undefined;
}
