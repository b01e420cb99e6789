import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError, FetchError, loadHarnessConfig } from '@dicom-it/core';
import type { ObjectFetcher } from '@dicom-it/connectors';
import { GroundTruthFetcher, deepFreeze } from '../ground-truth-fetcher.js';

const config = loadHarnessConfig({ DICOM_IT_PROJECT: 'test-project', DICOM_IT_BUCKET: 'test-bucket' });

function fakeObjects(documents: Record<string, unknown>) {
  const fetchJson = vi.fn(async (_bucket: string, objectPath: string) => documents[objectPath]);
  const objects: ObjectFetcher = { fetchJson };
  return { objects, fetchJson };
}

describe('GroundTruthFetcher', () => {
  it('should load both documents from the metadata directory', async () => {
    const { objects, fetchJson } = fakeObjects({
      'healthcare/dicom/io_test_metadata/Dicom_io_it_test_data.json': [{ '00080018': 'a' }, { '00080018': 'b' }],
      'healthcare/dicom/io_test_metadata/Dicom_io_it_test_refined_data.json': [{ '00080018': 'a' }],
    });
    const fetcher = new GroundTruthFetcher(objects, { bucket: 'test-bucket' });

    const groundTruth = await fetcher.loadGroundTruth(config);

    expect(groundTruth).toEqual({
      all: [{ '00080018': 'a' }, { '00080018': 'b' }],
      refined: [{ '00080018': 'a' }],
    });
    expect(fetchJson).toHaveBeenCalledWith('test-bucket', 'healthcare/dicom/io_test_metadata/Dicom_io_it_test_data.json');
    expect(fetchJson).toHaveBeenCalledTimes(2);
  });

  it('should freeze the records it returns', async () => {
    const { objects } = fakeObjects({ 'doc.json': [{ '00081190': { vr: 'UR', Value: ['https://example.test'] } }] });
    const fetcher = new GroundTruthFetcher(objects, { bucket: 'test-bucket' });

    const records = await fetcher.fetchRecords('doc.json');

    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0]['00081190'])).toBe(true);
  });

  it('should reject documents that are not arrays of records', async () => {
    const { objects } = fakeObjects({ 'doc.json': { result: [] } });
    const fetcher = new GroundTruthFetcher(objects, { bucket: 'test-bucket' });

    await expect(fetcher.fetchRecords('doc.json')).rejects.toBeInstanceOf(FetchError);
  });

  it('should propagate fetch failures', async () => {
    const objects: ObjectFetcher = {
      fetchJson: async () => {
        throw new FetchError('Failed to fetch gs://test-bucket/doc.json: HTTP 404', 'doc.json', 404, 'Not Found');
      },
    };
    const fetcher = new GroundTruthFetcher(objects, { bucket: 'test-bucket' });

    await expect(fetcher.fetch('doc.json')).rejects.toMatchObject({ status: 404, objectPath: 'doc.json' });
  });

  it('should require a bucket', async () => {
    const { objects, fetchJson } = fakeObjects({});
    const fetcher = new GroundTruthFetcher(objects);

    await expect(fetcher.fetch('doc.json')).rejects.toBeInstanceOf(ConfigurationError);
    expect(fetchJson).not.toHaveBeenCalled();
  });
});

describe('deepFreeze', () => {
  it('should freeze nested arrays and objects', () => {
    const value = deepFreeze({ list: [{ nested: true }] });

    expect(Object.isFrozen(value.list)).toBe(true);
    expect(Object.isFrozen(value.list[0])).toBe(true);
  });
});
