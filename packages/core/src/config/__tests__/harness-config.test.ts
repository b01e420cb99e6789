import { describe, it, expect } from 'vitest';
import {
  loadHarnessConfig,
  metadataPath,
  sourceFilesPattern,
  storeCoordinates,
} from '../harness-config.js';
import { ConfigurationError } from '../../errors/index.js';

describe('loadHarnessConfig', () => {
  it('should apply defaults', () => {
    const config = loadHarnessConfig({});

    expect(config.project).toBeUndefined();
    expect(config.region).toBe('us-central1');
    expect(config.dataset).toBe('dicom-io-integration-testing');
    expect(config.persistentStoreId).toBe('dicom_it_persistent_store');
    expect(config.expectedInstanceCount).toBe(18);
    expect(config.storePrefix).toBe('DICOM_store_');
    expect([...config.volatileTags]).toEqual(['00081190']);
    expect(config.integration).toBe(false);
    expect(config.maxConcurrency).toBe(4);
  });

  it('should read overrides', () => {
    const config = loadHarnessConfig({
      DICOM_IT_PROJECT: 'test-project',
      DICOM_IT_BUCKET: 'test-bucket',
      DICOM_IT_REGION: 'europe-west4',
      DICOM_IT_EXPECTED_INSTANCES: '3',
      DICOM_IT_VOLATILE_TAGS: '00081190, 00080020',
      DICOM_IT_INTEGRATION: 'true',
      DICOM_IT_HEALTHCARE_URL: 'http://localhost:8080/v1/',
    });

    expect(config.project).toBe('test-project');
    expect(config.bucket).toBe('test-bucket');
    expect(config.region).toBe('europe-west4');
    expect(config.expectedInstanceCount).toBe(3);
    expect([...config.volatileTags]).toEqual(['00081190', '00080020']);
    expect(config.integration).toBe(true);
    expect(config.healthcareBaseUrl).toBe('http://localhost:8080/v1');
  });

  it('should fall back to GOOGLE_CLOUD_PROJECT', () => {
    expect(loadHarnessConfig({ GOOGLE_CLOUD_PROJECT: 'adc-project' }).project).toBe('adc-project');
  });

  it('should treat anything but 1/true/yes as integration off', () => {
    expect(loadHarnessConfig({ DICOM_IT_INTEGRATION: '0' }).integration).toBe(false);
    expect(loadHarnessConfig({ DICOM_IT_INTEGRATION: '1' }).integration).toBe(true);
  });

  it('should reject malformed values with field names', () => {
    try {
      loadHarnessConfig({ DICOM_IT_EXPECTED_INSTANCES: 'many', DICOM_IT_VOLATILE_TAGS: 'retrieve-url' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map((issue) => issue.field).sort()).toEqual([
          'DICOM_IT_EXPECTED_INSTANCES',
          'DICOM_IT_VOLATILE_TAGS.0',
        ]);
      }
    }
  });

  it.each(['', '0'])('should reject an expected instance count of %j', (value) => {
    expect(() => loadHarnessConfig({ DICOM_IT_EXPECTED_INSTANCES: value })).toThrow(
      /^Invalid harness configuration: DICOM_IT_EXPECTED_INSTANCES \(/
    );
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(loadHarnessConfig({}))).toBe(true);
  });
});

describe('derived values', () => {
  const config = loadHarnessConfig({ DICOM_IT_PROJECT: 'test-project', DICOM_IT_BUCKET: 'test-bucket' });

  it('should build the ground-truth path', () => {
    expect(metadataPath(config, config.metadataAllName)).toBe(
      'healthcare/dicom/io_test_metadata/Dicom_io_it_test_data.json'
    );
  });

  it('should build the source glob', () => {
    expect(sourceFilesPattern(config)).toBe('gs://test-bucket/healthcare/dicom/io_test_files/*');
  });

  it('should build store coordinates', () => {
    expect(storeCoordinates(config)).toEqual({
      project: 'test-project',
      region: 'us-central1',
      dataset: 'dicom-io-integration-testing',
    });
  });

  it('should require a project for coordinates', () => {
    expect(() => storeCoordinates(loadHarnessConfig({}))).toThrow(ConfigurationError);
  });

  it('should require a bucket for the source glob', () => {
    expect(() => sourceFilesPattern(loadHarnessConfig({}))).toThrow('No bucket configured');
  });
});
