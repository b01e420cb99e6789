import { vi } from 'vitest';
import { type DicomRecord, type SearchRequest, loadHarnessConfig } from '@dicom-it/core';
import type { DicomSearcher, DicomStorer, FileMatcher, MatchedFile, SearchResponse } from '@dicom-it/connectors';
import type { GroundTruth, GroundTruthSource } from '../../ground-truth/ground-truth-fetcher.js';

export const config = loadHarnessConfig({
  DICOM_IT_PROJECT: 'test-project',
  DICOM_IT_BUCKET: 'test-bucket',
  DICOM_IT_DATASET: 'test-dataset',
});

/**
 * Instance record carrying a Retrieve URL that depends on `store`
 */
export function instance(index: number, store: string, study = 'study_000000001'): DicomRecord {
  return {
    '0020000D': { vr: 'UI', Value: [study] },
    '00080018': { vr: 'UI', Value: [`instance_${index}`] },
    '00081190': { vr: 'UR', Value: [`https://dicom.test/${store}/instances/${index}`] },
  };
}

export function instances(count: number, store: string): DicomRecord[] {
  return Array.from({ length: count }, (_, index) => instance(index, store));
}

export function groundTruthSource(groundTruth: GroundTruth) {
  const loadGroundTruth = vi.fn(async () => groundTruth);
  const source: GroundTruthSource = { loadGroundTruth };
  return { source, loadGroundTruth };
}

export function searcherOf(respond: (request: SearchRequest) => SearchResponse) {
  const search = vi.fn(async (request: SearchRequest) => respond(request));
  const searcher: DicomSearcher = { search };
  return { searcher, search };
}

export function storerOf(status = 200) {
  const storeInstance = vi.fn(async () => ({ status, body: status === 200 ? '{}' : 'rejected' }));
  const storer: DicomStorer = { storeInstance };
  return { storer, storeInstance };
}

export function sourceFiles(count: number): MatchedFile[] {
  return Array.from({ length: count }, (_, index) => ({
    path: `gs://test-bucket/healthcare/dicom/io_test_files/${index}.dcm`,
    read: async () => Buffer.from(`DICM${index}`),
  }));
}

export function matcherOf(files: MatchedFile[]) {
  const match = vi.fn(async function* (_pattern: string): AsyncGenerator<MatchedFile> {
    yield* files;
  });
  const matcher: FileMatcher = { match };
  return { matcher, match };
}
