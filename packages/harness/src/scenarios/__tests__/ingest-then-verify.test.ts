import { describe, it, expect, vi } from 'vitest';
import type { StoreCoordinates } from '@dicom-it/core';
import type { DicomStorer, FileMatcher, MatchedFile, StoreAdmin } from '@dicom-it/connectors';
import { LocalWorkloadRunner } from '@dicom-it/engine';
import { DisposableStoreManager } from '../../lifecycle/disposable-store-manager.js';
import { runIngestThenVerify } from '../ingest-then-verify.js';
import {
  config,
  groundTruthSource,
  instances,
  matcherOf,
  searcherOf,
  sourceFiles,
  storerOf,
} from './fixtures.js';

const truth = instances(18, 'truth');

interface Setup {
  files?: number;
  uploadStatus?: number;
  searchStatus?: number;
  stored?: ReturnType<typeof instances>;
}

function setup(options: Setup = {}) {
  const admin = {
    createStore: vi.fn(async (_coordinates: StoreCoordinates, _storeId: string) => 200),
    deleteStore: vi.fn(async (_coordinates: StoreCoordinates, _storeId: string) => 200),
  } satisfies StoreAdmin;
  const stores = new DisposableStoreManager(admin, { storePrefix: 'DICOM_store_' });
  const { storer, storeInstance } = storerOf(options.uploadStatus);
  const { matcher, match } = matcherOf(sourceFiles(options.files ?? 18));
  const { searcher, search } = searcherOf(() => ({
    records: options.stored ?? instances(18, 'disposable').reverse(),
    status: options.searchStatus ?? 200,
  }));
  const { source } = groundTruthSource({ all: truth, refined: [] });

  return {
    deps: {
      config,
      runner: new LocalWorkloadRunner({ maxConcurrency: 4 }),
      searcher,
      storer,
      files: matcher,
      stores,
      groundTruth: source,
    },
    admin,
    storeInstance,
    match,
    search,
  };
}

describe('runIngestThenVerify', () => {
  it('should upload every file and match the stored records as a multiset', async () => {
    const { deps, admin, storeInstance, match, search } = setup();

    const report = await runIngestThenVerify(deps);

    const storeId = admin.createStore.mock.calls[0][1];
    expect(report.state).toBe('done');
    expect(report.storeId).toBe(storeId);
    expect(report.transitions.map((t) => t.to)).toEqual(['upload', 'verify', 'done']);
    expect(report.comparisons).toEqual([{ label: 'store third assert', mode: 'unordered', size: 18 }]);
    expect(match).toHaveBeenCalledWith('gs://test-bucket/healthcare/dicom/io_test_files/*');
    expect(storeInstance).toHaveBeenCalledTimes(18);
    expect(search).toHaveBeenCalledWith({
      project: 'test-project',
      region: 'us-central1',
      dataset: 'test-dataset',
      storeId,
      searchType: 'instances',
    });
    expect(admin.deleteStore).toHaveBeenCalledTimes(1);
    expect(admin.deleteStore).toHaveBeenCalledWith(
      { project: 'test-project', region: 'us-central1', dataset: 'test-dataset' },
      storeId
    );
  });

  it('should fail closed when no files match', async () => {
    const { deps, admin, storeInstance, search } = setup({ files: 0 });

    const failure = runIngestThenVerify(deps);

    await expect(failure).rejects.toMatchObject({
      label: 'store first assert',
      message: 'store first assert: expected 18 outcome(s), got 0',
    });
    expect(storeInstance).not.toHaveBeenCalled();
    expect(search).not.toHaveBeenCalled();
    expect(admin.deleteStore).toHaveBeenCalledTimes(1);
  });

  it('should fail when an upload is rejected', async () => {
    const { deps, admin, search } = setup({ uploadStatus: 409 });

    await expect(runIngestThenVerify(deps)).rejects.toMatchObject({ label: 'store first assert' });
    expect(search).not.toHaveBeenCalled();
    expect(admin.deleteStore).toHaveBeenCalledTimes(1);
  });

  it('should fail when the direct search is not 200', async () => {
    const { deps, admin } = setup({ searchStatus: 403 });

    await expect(runIngestThenVerify(deps)).rejects.toMatchObject({
      label: 'store second assert',
      message: 'store second assert: expected search status 200, got 403',
    });
    expect(admin.deleteStore).toHaveBeenCalledTimes(1);
  });

  it('should fail when a stored record is missing', async () => {
    const { deps, admin } = setup({ stored: instances(17, 'disposable') });

    await expect(runIngestThenVerify(deps)).rejects.toMatchObject({ label: 'store third assert' });
    expect(admin.deleteStore).toHaveBeenCalledTimes(1);
  });

  it('should finish started uploads before deleting the store when listing fails', async () => {
    const { deps, admin } = setup();
    const events: string[] = [];
    const [first] = sourceFiles(1);
    const files: FileMatcher = {
      match: async function* (_pattern: string): AsyncGenerator<MatchedFile> {
        yield first;
        throw new Error('listing failed mid-stream');
      },
    };
    const storer: DicomStorer = {
      storeInstance: async () => {
        events.push('upload-start');
        await new Promise((resolve) => setTimeout(resolve, 20));
        events.push('upload-end');
        return { status: 200, body: '{}' };
      },
    };
    admin.deleteStore.mockImplementation(async () => {
      events.push('delete');
      return 200;
    });

    await expect(runIngestThenVerify({ ...deps, files, storer })).rejects.toThrow('listing failed mid-stream');
    expect(events).toEqual(['upload-start', 'upload-end', 'delete']);
  });

  it('should compare in order when asked to', async () => {
    const { deps } = setup();

    await expect(runIngestThenVerify(deps, { orderSensitive: true })).rejects.toMatchObject({
      label: 'store third assert',
    });
  });
});
