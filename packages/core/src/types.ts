/**
 * DICOM IO harness data model
 *
 * @module @dicom-it/core/types
 */

/**
 * One instance's metadata, keyed by DICOM tag (e.g. "0020000D")
 */
export type DicomRecord = Record<string, unknown>;

/**
 * QIDO-RS search level
 */
export type SearchType = 'studies' | 'series' | 'instances';

export const SEARCH_TYPES: readonly SearchType[] = ['studies', 'series', 'instances'];

/**
 * QIDO-RS query parameters (match attributes, limit, offset, includefield)
 */
export type SearchParams = Record<string, string | number>;

/**
 * Location of a DICOM store's parent dataset
 */
export interface StoreCoordinates {
  project: string;
  region: string;
  dataset: string;
}

/**
 * A search against one DICOM store. Absent `params` means a comprehensive
 * search; present means a refined one.
 */
export interface SearchRequest extends StoreCoordinates {
  storeId: string;
  searchType: SearchType;
  params?: SearchParams;
}

/**
 * Output of the search work unit, one per request
 */
export interface SearchResult {
  result: DicomRecord[];
  status: number;
  input: SearchRequest;
  success: boolean;
}

/**
 * Output of the upload work unit, one per source file
 */
export interface UploadOutcome {
  success: boolean;
  status: number;
  message: string;
  /** Source object path */
  input: string;
}

/**
 * A store created for the lifetime of a single scenario
 */
export interface DisposableStore {
  coordinates: StoreCoordinates;
  storeId: string;
  createdAt: Date;
}
