/**
 * Harness Configuration
 *
 * An immutable value parsed once from the environment and threaded into
 * every collaborator and scenario. Nothing reads `process.env` after this.
 *
 * @module @dicom-it/core/config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_VOLATILE_TAGS } from '../normalize/normalizer.js';
import type { StoreCoordinates } from '../types.js';

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ['1', 'true', 'yes'].includes(value.toLowerCase()));

const tagList = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? [...DEFAULT_VOLATILE_TAGS]
      : value.split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0)
  )
  .pipe(z.array(z.string().regex(/^[0-9A-Fa-f]{8}$/, 'DICOM tags are 8 hex digits')));

/**
 * Environment variables understood by the harness
 */
export const HarnessEnvSchema = z.object({
  DICOM_IT_PROJECT: z.string().min(1).optional(),
  GOOGLE_CLOUD_PROJECT: z.string().min(1).optional(),
  DICOM_IT_REGION: z.string().min(1).default('us-central1'),
  DICOM_IT_DATASET: z.string().min(1).default('dicom-io-integration-testing'),
  DICOM_IT_PERSISTENT_STORE: z.string().min(1).default('dicom_it_persistent_store'),
  DICOM_IT_BUCKET: z.string().min(1).optional(),
  DICOM_IT_DICOM_DIR: z.string().min(1).default('healthcare/dicom'),
  DICOM_IT_METADATA_ALL: z.string().min(1).default('Dicom_io_it_test_data.json'),
  DICOM_IT_METADATA_REFINED: z.string().min(1).default('Dicom_io_it_test_refined_data.json'),
  DICOM_IT_REFINED_STUDY: z.string().min(1).default('study_000000001'),
  DICOM_IT_EXPECTED_INSTANCES: z.coerce.number().int().positive().default(18),
  DICOM_IT_STORE_PREFIX: z.string().min(1).default('DICOM_store_'),
  DICOM_IT_VOLATILE_TAGS: tagList,
  DICOM_IT_INTEGRATION: booleanFlag,
  DICOM_IT_HEALTHCARE_URL: z.string().url().default('https://healthcare.googleapis.com/v1'),
  DICOM_IT_STORAGE_URL: z.string().url().default('https://storage.googleapis.com/storage/v1'),
  DICOM_IT_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

/**
 * Parsed harness configuration
 */
export interface HarnessConfig {
  readonly project?: string;
  readonly region: string;
  readonly dataset: string;
  readonly persistentStoreId: string;
  readonly bucket?: string;
  readonly dicomDir: string;
  readonly metadataAllName: string;
  readonly metadataRefinedName: string;
  readonly refinedStudyUid: string;
  readonly expectedInstanceCount: number;
  readonly storePrefix: string;
  readonly volatileTags: ReadonlySet<string>;
  readonly integration: boolean;
  readonly healthcareBaseUrl: string;
  readonly storageBaseUrl: string;
  readonly maxConcurrency: number;
}

/**
 * Parse configuration from an environment map
 *
 * @throws {ConfigurationError} If any variable is invalid
 */
export function loadHarnessConfig(env: Record<string, string | undefined> = process.env): HarnessConfig {
  const parsed = HarnessEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid harness configuration: ${issues.map((i) => `${i.field} (${i.message})`).join(', ')}`,
      issues
    );
  }

  const vars = parsed.data;
  return Object.freeze({
    project: vars.DICOM_IT_PROJECT ?? vars.GOOGLE_CLOUD_PROJECT,
    region: vars.DICOM_IT_REGION,
    dataset: vars.DICOM_IT_DATASET,
    persistentStoreId: vars.DICOM_IT_PERSISTENT_STORE,
    bucket: vars.DICOM_IT_BUCKET,
    dicomDir: vars.DICOM_IT_DICOM_DIR.replace(/^\/+|\/+$/g, ''),
    metadataAllName: vars.DICOM_IT_METADATA_ALL,
    metadataRefinedName: vars.DICOM_IT_METADATA_REFINED,
    refinedStudyUid: vars.DICOM_IT_REFINED_STUDY,
    expectedInstanceCount: vars.DICOM_IT_EXPECTED_INSTANCES,
    storePrefix: vars.DICOM_IT_STORE_PREFIX,
    volatileTags: new Set(vars.DICOM_IT_VOLATILE_TAGS),
    integration: vars.DICOM_IT_INTEGRATION,
    healthcareBaseUrl: vars.DICOM_IT_HEALTHCARE_URL.replace(/\/+$/, ''),
    storageBaseUrl: vars.DICOM_IT_STORAGE_URL.replace(/\/+$/, ''),
    maxConcurrency: vars.DICOM_IT_MAX_CONCURRENCY,
  });
}

// =============================================================================
// Derived values
// =============================================================================

/**
 * Bucket-relative directory holding the ground-truth documents
 */
export function metadataDir(config: HarnessConfig): string {
  return `${config.dicomDir}/io_test_metadata/`;
}

/**
 * Bucket-relative path of a ground-truth document
 */
export function metadataPath(config: HarnessConfig, name: string): string {
  return `${metadataDir(config)}${name}`;
}

/**
 * Glob over the source DICOM files
 */
export function sourceFilesPattern(config: HarnessConfig): string {
  return `gs://${requireBucket(config)}/${config.dicomDir}/io_test_files/*`;
}

/**
 * Dataset coordinates for the configured project
 */
export function storeCoordinates(config: HarnessConfig): StoreCoordinates {
  return {
    project: requireProject(config),
    region: config.region,
    dataset: config.dataset,
  };
}

export function requireProject(config: HarnessConfig): string {
  if (!config.project) {
    throw new ConfigurationError('No project configured (set DICOM_IT_PROJECT or GOOGLE_CLOUD_PROJECT)', [
      { field: 'DICOM_IT_PROJECT', message: 'Required' },
    ]);
  }
  return config.project;
}

export function requireBucket(config: HarnessConfig): string {
  if (!config.bucket) {
    throw new ConfigurationError('No bucket configured (set DICOM_IT_BUCKET)', [
      { field: 'DICOM_IT_BUCKET', message: 'Required' },
    ]);
  }
  return config.bucket;
}
