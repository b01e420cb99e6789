/**
 * Shared HTTP plumbing for the REST collaborators
 *
 * Clients inspect status codes themselves, so axios is configured to resolve
 * on every status.
 *
 * @module @dicom-it/connectors/http
 */

import axios, { type AxiosInstance } from 'axios';

export interface HttpClientOptions {
  /** Request timeout in milliseconds (0 = none) */
  timeout?: number;
  headers?: Record<string, string>;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeout ?? 0,
    headers: options.headers,
    validateStatus: () => true,
    maxBodyLength: Infinity,
    maxContentLength: Infinity,
  });
}

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * Response body as text, whatever axios decoded it into
 */
export function bodyText(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return JSON.stringify(data);
}
