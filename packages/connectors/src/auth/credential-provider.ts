/**
 * Credential providers
 *
 * Bearer tokens for the Healthcare and Cloud Storage REST APIs. Token refresh
 * is handled by google-auth-library; the harness only asks for a token before
 * each request.
 *
 * @module @dicom-it/connectors/auth
 */

import { GoogleAuth } from 'google-auth-library';
import { AuthenticationError, errorMessage, type ILogger, NoOpLogger } from '@dicom-it/core';

export const CLOUD_PLATFORM_SCOPES = ['https://www.googleapis.com/auth/cloud-platform'];

/**
 * Source of OAuth2 access tokens
 */
export interface CredentialProvider {
  readonly name: string;
  getAccessToken(): Promise<string>;
}

export interface GoogleCredentialOptions {
  projectId?: string;
  scopes?: string[];
  /** Service account key file; Application Default Credentials otherwise */
  keyFilename?: string;
}

/**
 * Application Default Credentials (or a key file) through GoogleAuth
 */
export class GoogleCredentialProvider implements CredentialProvider {
  readonly name = 'google-auth';

  private readonly auth: GoogleAuth;

  constructor(
    options: GoogleCredentialOptions = {},
    private readonly logger: ILogger = new NoOpLogger()
  ) {
    this.auth = new GoogleAuth({
      projectId: options.projectId,
      keyFilename: options.keyFilename,
      scopes: options.scopes ?? CLOUD_PLATFORM_SCOPES,
    });
  }

  async getAccessToken(): Promise<string> {
    let token: string | null | undefined;
    try {
      token = await this.auth.getAccessToken();
    } catch (error) {
      this.logger.error('Failed to obtain access token', { error: errorMessage(error) });
      throw new AuthenticationError(`Failed to obtain access token: ${errorMessage(error)}`, error);
    }

    if (!token) {
      throw new AuthenticationError('No access token returned');
    }
    return token;
  }
}

/**
 * Fixed token, for tests and pre-issued credentials
 */
export class StaticTokenProvider implements CredentialProvider {
  readonly name = 'static';

  constructor(private readonly token: string) {}

  async getAccessToken(): Promise<string> {
    return this.token;
  }
}

/**
 * Authorization header for a provider
 */
export async function authorizationHeaders(
  credentials: CredentialProvider
): Promise<Record<string, string>> {
  const token = await credentials.getAccessToken();
  return { Authorization: `Bearer ${token}` };
}
