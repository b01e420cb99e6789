/**
 * Authenticated JSON object retrieval from Cloud Storage
 *
 * Uses the JSON API media download (`?alt=media`) so the same bearer token
 * serves every collaborator.
 *
 * @module @dicom-it/connectors/storage/gcs-object-fetcher
 */

import type { AxiosInstance } from 'axios';
import { FetchError, type ILogger, NoOpLogger } from '@dicom-it/core';
import { authorizationHeaders, type CredentialProvider } from '../auth/credential-provider.js';
import { bodyText, createHttpClient, isSuccessStatus } from '../http/http-client.js';

export const DEFAULT_STORAGE_BASE_URL = 'https://storage.googleapis.com/storage/v1';

/**
 * Authenticated object fetch contract
 */
export interface ObjectFetcher {
  /** @throws {FetchError} On a non-2xx status or a body that is not JSON */
  fetchJson(bucket: string, objectPath: string): Promise<unknown>;
}

export interface GcsObjectFetcherOptions {
  credentials: CredentialProvider;
  baseUrl?: string;
  http?: AxiosInstance;
  logger?: ILogger;
}

export class GcsObjectFetcher implements ObjectFetcher {
  private readonly credentials: CredentialProvider;
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: ILogger;

  constructor(options: GcsObjectFetcherOptions) {
    this.credentials = options.credentials;
    this.baseUrl = options.baseUrl ?? DEFAULT_STORAGE_BASE_URL;
    this.http = options.http ?? createHttpClient();
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: 'gcs-fetcher' });
  }

  objectUrl(bucket: string, objectPath: string): string {
    return `${this.baseUrl}/b/${encodeURIComponent(bucket)}/o/${encodeURIComponent(objectPath)}`;
  }

  async fetchJson(bucket: string, objectPath: string): Promise<unknown> {
    const uri = `gs://${bucket}/${objectPath}`;
    const response = await this.http.get(this.objectUrl(bucket, objectPath), {
      params: { alt: 'media' },
      responseType: 'text',
      headers: await authorizationHeaders(this.credentials),
    });

    const body = bodyText(response.data);
    if (!isSuccessStatus(response.status)) {
      throw new FetchError(`Failed to fetch ${uri}: HTTP ${response.status}`, objectPath, response.status, body);
    }

    let document: unknown;
    try {
      document = JSON.parse(body);
    } catch (error) {
      throw new FetchError(`${uri} is not valid JSON`, objectPath, response.status, body.slice(0, 500), error);
    }

    this.logger.debug('Fetched object', { uri, bytes: body.length });
    return document;
  }
}
