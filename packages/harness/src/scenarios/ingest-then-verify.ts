/**
 * Ingest-then-verify scenario
 *
 * Uploads every source file into a disposable store, then reads the store
 * back with a direct search and compares the records with ground truth.
 *
 * ```
 * init -> upload -> verify -> done
 * ```
 *
 * @module @dicom-it/harness/scenarios
 */

import {
  type DisposableStore,
  AssertionFailure,
  NoOpLogger,
  ScenarioStateMachine,
  assertAllSucceeded,
  assertCollectionsEqual,
  assertOutcomeCount,
  createNormalizer,
  errorMessage,
  sourceFilesPattern,
  storeCoordinates,
} from '@dicom-it/core';
import type { DicomStorer, FileMatcher } from '@dicom-it/connectors';
import { uploadUnit } from '@dicom-it/engine';
import type { DisposableStoreManager } from '../lifecycle/disposable-store-manager.js';
import { type ScenarioDeps, type ScenarioOptions, type ScenarioReport, summarize } from './types.js';

export interface IngestScenarioDeps extends ScenarioDeps {
  storer: DicomStorer;
  files: FileMatcher;
  stores: DisposableStoreManager;
}

/**
 * Upload and verify against a store the caller owns
 */
export async function verifyIngestion(
  deps: Omit<IngestScenarioDeps, 'stores'>,
  store: DisposableStore,
  options: ScenarioOptions = {}
): Promise<ScenarioReport> {
  const { config, runner, searcher, storer, files } = deps;
  const orderSensitive = options.orderSensitive ?? false;
  const logger = (deps.logger ?? new NoOpLogger()).child({ scenario: 'ingest', storeId: store.storeId });
  const machine = new ScenarioStateMachine('ingest');
  const normalizer = createNormalizer(config.volatileTags);
  const startedAt = Date.now();

  try {
    // Ground truth is read before any upload
    const groundTruth = await deps.groundTruth.loadGroundTruth(config);

    machine.transition('upload');
    const outcomes = await runner.runAndCollect(
      files.match(sourceFilesPattern(config)),
      uploadUnit(storer, { coordinates: store.coordinates, storeId: store.storeId }),
      { label: 'upload' }
    );
    assertOutcomeCount(outcomes, config.expectedInstanceCount, 'store first assert');
    assertAllSucceeded(outcomes, 'store first assert');

    machine.transition('verify');
    const response = await searcher.search({
      ...store.coordinates,
      storeId: store.storeId,
      searchType: 'instances',
    });
    if (response.status !== 200) {
      throw new AssertionFailure(
        'store second assert',
        `expected search status 200, got ${response.status}`,
        response.status,
        200
      );
    }

    const result = assertCollectionsEqual(
      normalizer.records(response.records),
      normalizer.records(groundTruth.all),
      { orderSensitive, label: 'store third assert' }
    );
    machine.transition('done');

    const durationMs = Date.now() - startedAt;
    logger.info('Scenario passed', { instances: outcomes.length, durationMs });
    return {
      scenario: 'ingest',
      state: machine.state,
      transitions: machine.transitions,
      comparisons: [summarize('store third assert', result)],
      storeId: store.storeId,
      durationMs,
    };
  } catch (error) {
    logger.error('Scenario failed', { state: machine.state, error: errorMessage(error) });
    machine.fail();
    throw error;
  }
}

/**
 * Run the scenario inside a freshly created store that is always deleted
 */
export function runIngestThenVerify(
  deps: IngestScenarioDeps,
  options: ScenarioOptions = {}
): Promise<ScenarioReport> {
  return deps.stores.use(storeCoordinates(deps.config), (store) => verifyIngestion(deps, store, options));
}
