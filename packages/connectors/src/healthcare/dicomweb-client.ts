/**
 * DICOMweb client
 *
 * QIDO-RS search and STOW-RS store against a Cloud Healthcare DICOM store.
 *
 * @module @dicom-it/connectors/healthcare/dicomweb-client
 */

import type { AxiosInstance } from 'axios';
import {
  type DicomRecord,
  type ILogger,
  NoOpLogger,
  type SearchParams,
  type SearchRequest,
  type StoreCoordinates,
  UpstreamError,
} from '@dicom-it/core';
import { authorizationHeaders, type CredentialProvider } from '../auth/credential-provider.js';
import { bodyText, createHttpClient } from '../http/http-client.js';
import { DEFAULT_HEALTHCARE_BASE_URL, dicomWebUrl } from './paths.js';
import type { HealthcareClientOptions } from './store-admin-client.js';

/**
 * Page size used when the caller does not set `limit`
 */
export const QIDO_PAGE_SIZE = 5000;

export interface SearchResponse {
  records: DicomRecord[];
  status: number;
}

export interface StoreResponse {
  status: number;
  body: string;
}

/**
 * Direct search contract
 */
export interface DicomSearcher {
  search(request: SearchRequest): Promise<SearchResponse>;
}

/**
 * Instance upload contract
 */
export interface DicomStorer {
  storeInstance(coordinates: StoreCoordinates, storeId: string, bytes: Buffer): Promise<StoreResponse>;
}

export class DicomWebClient implements DicomSearcher, DicomStorer {
  private readonly credentials: CredentialProvider;
  private readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: ILogger;

  constructor(options: HealthcareClientOptions) {
    this.credentials = options.credentials;
    this.baseUrl = options.baseUrl ?? DEFAULT_HEALTHCARE_BASE_URL;
    this.http = options.http ?? createHttpClient();
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: 'dicomweb' });
  }

  /**
   * QIDO-RS search.
   *
   * With a caller-supplied `limit` exactly one page is requested. Otherwise
   * pages of QIDO_PAGE_SIZE are fetched until a short (or 204) page. A
   * non-200 page ends the search with no records and that status.
   */
  async search(request: SearchRequest): Promise<SearchResponse> {
    const url = dicomWebUrl(this.baseUrl, request, request.storeId, request.searchType);
    const params: SearchParams = { ...request.params };

    if (params.limit !== undefined) {
      const page = await this.fetchPage(url, params);
      return { records: page.records, status: page.status };
    }

    const records: DicomRecord[] = [];
    let offset = Number(params.offset ?? 0);
    for (;;) {
      const page = await this.fetchPage(url, { ...params, limit: QIDO_PAGE_SIZE, offset });

      if (page.status === 204) {
        return { records, status: records.length > 0 ? 200 : 204 };
      }
      if (page.status !== 200) {
        return { records: [], status: page.status };
      }

      records.push(...page.records);
      if (page.records.length < QIDO_PAGE_SIZE) {
        this.logger.debug('QIDO search complete', {
          storeId: request.storeId,
          searchType: request.searchType,
          count: records.length,
        });
        return { records, status: 200 };
      }
      offset += page.records.length;
    }
  }

  /**
   * STOW-RS upload of one Part 10 file
   */
  async storeInstance(coordinates: StoreCoordinates, storeId: string, bytes: Buffer): Promise<StoreResponse> {
    const response = await this.http.post(dicomWebUrl(this.baseUrl, coordinates, storeId, 'studies'), bytes, {
      headers: {
        ...(await authorizationHeaders(this.credentials)),
        'Content-Type': 'application/dicom',
        Accept: 'application/dicom+json',
      },
    });

    return { status: response.status, body: bodyText(response.data) };
  }

  private async fetchPage(url: string, params: SearchParams): Promise<SearchResponse> {
    const response = await this.http.get(url, {
      params,
      headers: {
        ...(await authorizationHeaders(this.credentials)),
        Accept: 'application/dicom+json',
      },
    });

    if (response.status !== 200) {
      this.logger.warn('QIDO search returned non-200', { url, status: response.status });
      return { records: [], status: response.status };
    }

    return { records: parseRecords(response.data, response.status), status: response.status };
  }
}

function isRecord(value: unknown): value is DicomRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * QIDO-RS answers with a JSON array of instance objects
 */
function parseRecords(data: unknown, status: number): DicomRecord[] {
  let parsed = data;
  if (typeof data === 'string') {
    try {
      parsed = data.length === 0 ? [] : JSON.parse(data);
    } catch {
      throw new UpstreamError(`QIDO response is not JSON: ${bodyText(data).slice(0, 200)}`, status, data);
    }
  }

  if (!Array.isArray(parsed) || !parsed.every(isRecord)) {
    throw new UpstreamError('QIDO response is not an array of records', status, bodyText(data));
  }
  return parsed;
}
