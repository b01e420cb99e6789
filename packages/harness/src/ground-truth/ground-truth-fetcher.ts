/**
 * Ground-Truth Fetcher
 *
 * Reads the expected-result documents from Cloud Storage. Each document is
 * a JSON array of DICOM JSON records.
 *
 * @module @dicom-it/harness/ground-truth
 */

import { z } from 'zod';
import {
  type DicomRecord,
  type HarnessConfig,
  type ILogger,
  ConfigurationError,
  FetchError,
  NoOpLogger,
  metadataPath,
} from '@dicom-it/core';
import type { ObjectFetcher } from '@dicom-it/connectors';

const RecordsDocumentSchema = z.array(z.record(z.unknown()));

export interface GroundTruth {
  /** Expected result of the comprehensive search */
  all: readonly DicomRecord[];
  /** Expected result of the refined search */
  refined: readonly DicomRecord[];
}

export interface GroundTruthSource {
  loadGroundTruth(config: HarnessConfig): Promise<GroundTruth>;
}

export interface GroundTruthFetcherOptions {
  bucket?: string;
  logger?: ILogger;
}

/**
 * Freeze a value and everything reachable from it
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class GroundTruthFetcher implements GroundTruthSource {
  private readonly bucket?: string;
  private readonly logger: ILogger;

  constructor(
    private readonly objects: ObjectFetcher,
    options: GroundTruthFetcherOptions = {}
  ) {
    this.bucket = options.bucket;
    this.logger = (options.logger ?? new NoOpLogger()).child({ component: 'ground-truth' });
  }

  /**
   * Parsed JSON document at a bucket-relative path
   *
   * @throws {FetchError} On a non-2xx status or invalid JSON
   */
  async fetch(objectPath: string): Promise<unknown> {
    if (!this.bucket) {
      throw new ConfigurationError('No bucket configured (set DICOM_IT_BUCKET)', [
        { field: 'DICOM_IT_BUCKET', message: 'Required' },
      ]);
    }
    return this.objects.fetchJson(this.bucket, objectPath);
  }

  /**
   * Document validated as an array of records, deeply frozen
   */
  async fetchRecords(objectPath: string): Promise<readonly DicomRecord[]> {
    const document = await this.fetch(objectPath);
    const parsed = RecordsDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new FetchError(
        `gs://${this.bucket}/${objectPath} is not an array of DICOM records`,
        objectPath,
        200,
        parsed.error.message
      );
    }

    this.logger.debug('Ground truth loaded', { objectPath, count: parsed.data.length });
    return deepFreeze(parsed.data);
  }

  async loadGroundTruth(config: HarnessConfig): Promise<GroundTruth> {
    const all = await this.fetchRecords(metadataPath(config, config.metadataAllName));
    const refined = await this.fetchRecords(metadataPath(config, config.metadataRefinedName));
    return { all, refined };
  }
}
