import { logError, TransportError, type HttpRequest } from '@credbridge/core';
import { ParseError, RefreshError } from '../errors/credential-errors.js';
import { AuthErrorCode } from '../errors/authentication-error.js';
import {
  getServiceAccountToken,
  type MetadataOptions,
} from '../metadata/metadata-client.js';
import { Credentials, type AccessToken } from './base-credentials.js';

export interface ComputeEngineCredentialsOptions {
  /** Attached service account; defaults to `default` */
  serviceAccountEmail?: string;
  metadata?: MetadataOptions;
}

/**
 * Credentials of the service account attached to the current instance,
 * fetched from the metadata service on every refresh.
 * @public
 */
export class ComputeEngineCredentials extends Credentials {
  public readonly serviceAccountEmail: string;
  private readonly metadata: MetadataOptions;

  public constructor(options: ComputeEngineCredentialsOptions = {}) {
    super();
    this.serviceAccountEmail = options.serviceAccountEmail ?? 'default';
    this.metadata = { ...options.metadata };
  }

  protected async fetchAccessToken(request: HttpRequest): Promise<AccessToken> {
    try {
      return await getServiceAccountToken(request, this.serviceAccountEmail, this.metadata);
    } catch (error) {
      if (error instanceof TransportError || error instanceof ParseError) {
        logError('metadata-token', error, { serviceAccount: this.serviceAccountEmail });
        throw new RefreshError(
          `Could not fetch an access token from the metadata service: ${error.message}`,
          AuthErrorCode.REFRESH_FAILED,
          error,
        );
      }
      throw error;
    }
  }
}
