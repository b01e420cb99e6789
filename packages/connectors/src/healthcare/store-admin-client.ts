/**
 * DICOM store management
 *
 * Creates and deletes DICOM stores through the Cloud Healthcare API. Any
 * non-2xx answer is fatal; there are no retries.
 *
 * @module @dicom-it/connectors/healthcare/store-admin-client
 */

import type { AxiosInstance } from 'axios';
import {
  type ILogger,
  NoOpLogger,
  ResourceCreationError,
  ResourceDeletionError,
  type StoreCoordinates,
} from '@dicom-it/core';
import { authorizationHeaders, type CredentialProvider } from '../auth/credential-provider.js';
import { bodyText, createHttpClient, isSuccessStatus } from '../http/http-client.js';
import { DEFAULT_HEALTHCARE_BASE_URL, dicomStoreUrl, dicomStoresUrl } from './paths.js';

/**
 * Store-management contract
 */
export interface StoreAdmin {
  /** @throws {ResourceCreationError} On a non-2xx status */
  createStore(coordinates: StoreCoordinates, storeId: string): Promise<number>;
  /** @throws {ResourceDeletionError} On a non-2xx status */
  deleteStore(coordinates: StoreCoordinates, storeId: string): Promise<number>;
}

export interface HealthcareClientOptions {
  credentials: CredentialProvider;
  baseUrl?: string;
  http?: AxiosInstance;
  logger?: ILogger;
}

export class HealthcareStoreAdminClient implements StoreAdmin {
  private readonly credentials: CredentialProvider;
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: ILogger;

  constructor(options: HealthcareClientOptions) {
    this.credentials = options.credentials;
    this.baseUrl = options.baseUrl ?? DEFAULT_HEALTHCARE_BASE_URL;
    this.http = options.http ?? createHttpClient();
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: 'store-admin' });
  }

  async createStore(coordinates: StoreCoordinates, storeId: string): Promise<number> {
    const response = await this.http.post(dicomStoresUrl(this.baseUrl, coordinates), undefined, {
      params: { dicomStoreId: storeId },
      headers: await authorizationHeaders(this.credentials),
    });

    if (!isSuccessStatus(response.status)) {
      this.logger.error('DICOM store creation failed', { storeId, status: response.status });
      throw new ResourceCreationError(storeId, response.status, bodyText(response.data));
    }

    this.logger.info('DICOM store created', { storeId, dataset: coordinates.dataset });
    return response.status;
  }

  async deleteStore(coordinates: StoreCoordinates, storeId: string): Promise<number> {
    const response = await this.http.delete(dicomStoreUrl(this.baseUrl, coordinates, storeId), {
      headers: await authorizationHeaders(this.credentials),
    });

    if (!isSuccessStatus(response.status)) {
      this.logger.error('DICOM store deletion failed', { storeId, status: response.status });
      throw new ResourceDeletionError(storeId, response.status, bodyText(response.data));
    }

    this.logger.info('DICOM store deleted', { storeId });
    return response.status;
  }
}
