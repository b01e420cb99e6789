/**
 * Cloud Healthcare API resource paths
 */

import type { StoreCoordinates } from '@dicom-it/core';

export const DEFAULT_HEALTHCARE_BASE_URL = 'https://healthcare.googleapis.com/v1';

export function dicomStoresUrl(baseUrl: string, coordinates: StoreCoordinates): string {
  const { project, region, dataset } = coordinates;
  return (
    `${baseUrl}/projects/${encodeURIComponent(project)}` +
    `/locations/${encodeURIComponent(region)}` +
    `/datasets/${encodeURIComponent(dataset)}/dicomStores`
  );
}

export function dicomStoreUrl(baseUrl: string, coordinates: StoreCoordinates, storeId: string): string {
  return `${dicomStoresUrl(baseUrl, coordinates)}/${encodeURIComponent(storeId)}`;
}

export function dicomWebUrl(
  baseUrl: string,
  coordinates: StoreCoordinates,
  storeId: string,
  path: string
): string {
  return `${dicomStoreUrl(baseUrl, coordinates, storeId)}/dicomWeb/${path}`;
}
