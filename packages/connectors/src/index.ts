// Credentials
export {
  CLOUD_PLATFORM_SCOPES,
  GoogleCredentialProvider,
  StaticTokenProvider,
  authorizationHeaders,
} from './auth/credential-provider.js';
export type { CredentialProvider, GoogleCredentialOptions } from './auth/credential-provider.js';

// HTTP
export { createHttpClient, isSuccessStatus, bodyText } from './http/http-client.js';
export type { HttpClientOptions } from './http/http-client.js';

// Cloud Healthcare API
export * from './healthcare/paths.js';
export { HealthcareStoreAdminClient } from './healthcare/store-admin-client.js';
export type { StoreAdmin, HealthcareClientOptions } from './healthcare/store-admin-client.js';
export { DicomWebClient, QIDO_PAGE_SIZE } from './healthcare/dicomweb-client.js';
export type {
  DicomSearcher,
  DicomStorer,
  SearchResponse,
  StoreResponse,
} from './healthcare/dicomweb-client.js';

// Cloud Storage
export { GcsObjectFetcher, DEFAULT_STORAGE_BASE_URL } from './storage/gcs-object-fetcher.js';
export type { ObjectFetcher, GcsObjectFetcherOptions } from './storage/gcs-object-fetcher.js';
export { GcsFileMatcher, parseGsUri, collectMatches } from './storage/gcs-file-matcher.js';
export type {
  FileMatcher,
  MatchedFile,
  GsUri,
  StorageLike,
  StorageBucketLike,
  StorageFileLike,
} from './storage/gcs-file-matcher.js';
