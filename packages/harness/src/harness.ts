/**
 * Harness factory
 *
 * Wires the live collaborators for one configuration. Scenario drivers and
 * the CLI take everything they need from here.
 *
 * @module @dicom-it/harness
 */

import { type HarnessConfig, type ILogger, NoOpLogger } from '@dicom-it/core';
import {
  type CredentialProvider,
  type StorageLike,
  DicomWebClient,
  GcsFileMatcher,
  GcsObjectFetcher,
  GoogleCredentialProvider,
  HealthcareStoreAdminClient,
} from '@dicom-it/connectors';
import { LocalWorkloadRunner } from '@dicom-it/engine';
import type { AxiosInstance } from 'axios';
import { GroundTruthFetcher } from './ground-truth/ground-truth-fetcher.js';
import { DisposableStoreManager } from './lifecycle/disposable-store-manager.js';
import { type ProbeResult, probeCapabilities } from './probe/capability-probe.js';
import { runIngestThenVerify } from './scenarios/ingest-then-verify.js';
import { runSearchAndCompare } from './scenarios/search-and-compare.js';
import type { ScenarioOptions, ScenarioReport } from './scenarios/types.js';

export interface HarnessOptions {
  logger?: ILogger;
  /** Defaults to Application Default Credentials */
  credentials?: CredentialProvider;
  /** HTTP client shared by the REST collaborators */
  http?: AxiosInstance;
  /** Cloud Storage client used to enumerate source files */
  storage?: StorageLike;
}

export interface Harness {
  readonly config: HarnessConfig;
  readonly logger: ILogger;
  readonly credentials: CredentialProvider;
  readonly stores: DisposableStoreManager;
  readonly dicomWeb: DicomWebClient;
  readonly groundTruth: GroundTruthFetcher;
  readonly files: GcsFileMatcher;
  readonly runner: LocalWorkloadRunner;
  probe(): Promise<ProbeResult>;
  runSearchAndCompare(options?: ScenarioOptions): Promise<ScenarioReport>;
  runIngestThenVerify(options?: ScenarioOptions): Promise<ScenarioReport>;
}

export function createHarness(config: HarnessConfig, options: HarnessOptions = {}): Harness {
  const logger = options.logger ?? new NoOpLogger();
  const credentials =
    options.credentials ?? new GoogleCredentialProvider({ projectId: config.project }, logger);

  const clientOptions = {
    credentials,
    baseUrl: config.healthcareBaseUrl,
    http: options.http,
    logger,
  };

  const stores = new DisposableStoreManager(new HealthcareStoreAdminClient(clientOptions), {
    storePrefix: config.storePrefix,
    logger,
  });
  const dicomWeb = new DicomWebClient(clientOptions);
  const groundTruth = new GroundTruthFetcher(
    new GcsObjectFetcher({ credentials, baseUrl: config.storageBaseUrl, http: options.http, logger }),
    { bucket: config.bucket, logger }
  );
  const files = new GcsFileMatcher(options.storage, logger);
  const runner = new LocalWorkloadRunner({ maxConcurrency: config.maxConcurrency }, logger);

  const deps = { config, runner, searcher: dicomWeb, groundTruth, stores, logger };

  return {
    config,
    logger,
    credentials,
    stores,
    dicomWeb,
    groundTruth,
    files,
    runner,
    probe: () => probeCapabilities(config, { credentials }),
    runSearchAndCompare: (scenarioOptions) => runSearchAndCompare(deps, scenarioOptions),
    runIngestThenVerify: (scenarioOptions) =>
      runIngestThenVerify({ ...deps, storer: dicomWeb, files }, scenarioOptions),
  };
}
