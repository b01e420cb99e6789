/**
 * Search-and-compare scenario
 *
 * Searches the persistent store twice (every instance, then one study with
 * an explicit page) and compares each result container with its ground
 * truth after normalization. Like every scenario it owns a disposable store
 * for its whole run; the searches themselves only read the persistent store.
 *
 * ```
 * init -> compare_all -> compare_refined -> done
 * ```
 *
 * @module @dicom-it/harness/scenarios
 */

import {
  type ComparisonResult,
  type DicomRecord,
  type DisposableStore,
  type HarnessConfig,
  type Normalizer,
  type SearchRequest,
  type SearchResult,
  type SearchType,
  NoOpLogger,
  ScenarioStateMachine,
  assertCollectionsEqual,
  assertOutcomeCount,
  createNormalizer,
  errorMessage,
  storeCoordinates,
} from '@dicom-it/core';
import { searchUnit } from '@dicom-it/engine';
import type { DisposableStoreManager } from '../lifecycle/disposable-store-manager.js';
import { type ScenarioDeps, type ScenarioOptions, type ScenarioReport, type ComparisonSummary, summarize } from './types.js';

export const REFINED_SEARCH_LIMIT = 500;

export interface SearchScenarioDeps extends ScenarioDeps {
  stores: DisposableStoreManager;
}

export interface SearchRequests {
  all: SearchRequest;
  refined: SearchRequest;
}

/**
 * Shape a SearchResult must have for a search to pass
 */
export interface ExpectedSearchResult {
  result: readonly DicomRecord[];
  status: number;
  input: SearchRequest;
  success: boolean;
}

export function buildSearchRequests(config: HarnessConfig): SearchRequests {
  const searchType: SearchType = 'instances';
  const base = { ...storeCoordinates(config), storeId: config.persistentStoreId, searchType };
  return {
    all: { ...base },
    refined: {
      ...base,
      params: {
        StudyInstanceUID: config.refinedStudyUid,
        limit: REFINED_SEARCH_LIMIT,
        offset: 0,
      },
    },
  };
}

export function expectedSearchResult(request: SearchRequest, records: readonly DicomRecord[]): ExpectedSearchResult {
  return { result: records, status: 200, input: request, success: true };
}

/**
 * Ordered: the whole container as a one-element sequence. Unordered: the
 * envelope must still match exactly, the records as a multiset.
 */
export function compareSearchResult(
  actual: SearchResult,
  expected: ExpectedSearchResult,
  normalizer: Normalizer,
  options: { orderSensitive: boolean; label: string }
): ComparisonResult {
  const normalizedActual = normalizer.collection(actual);
  const normalizedExpected = normalizer.collection(expected);

  if (options.orderSensitive) {
    return assertCollectionsEqual([normalizedActual], [normalizedExpected], options);
  }

  const { result: actualRecords, ...actualEnvelope } = normalizedActual;
  const { result: expectedRecords, ...expectedEnvelope } = normalizedExpected;
  assertCollectionsEqual([actualEnvelope], [expectedEnvelope], { orderSensitive: true, label: options.label });
  return assertCollectionsEqual(actualRecords, expectedRecords, options);
}

/**
 * Search and compare while the caller holds the scenario's store
 */
export async function verifySearches(
  deps: ScenarioDeps,
  store: DisposableStore,
  options: ScenarioOptions = {}
): Promise<ScenarioReport> {
  const { config, runner, searcher } = deps;
  const orderSensitive = options.orderSensitive ?? true;
  const logger = (deps.logger ?? new NoOpLogger()).child({ scenario: 'search', storeId: store.storeId });
  const machine = new ScenarioStateMachine('search');
  const normalizer = createNormalizer(config.volatileTags);
  const comparisons: ComparisonSummary[] = [];
  const startedAt = Date.now();

  const searchAndCompare = async (
    request: SearchRequest,
    groundTruth: readonly DicomRecord[],
    label: string
  ): Promise<void> => {
    const results = await runner.runAndCollect([request], searchUnit(searcher), { label });
    assertOutcomeCount(results, 1, label);
    const result = compareSearchResult(results[0], expectedSearchResult(request, groundTruth), normalizer, {
      orderSensitive,
      label,
    });
    comparisons.push(summarize(label, result));
  };

  try {
    const groundTruth = await deps.groundTruth.loadGroundTruth(config);
    const requests = buildSearchRequests(config);

    machine.transition('compare_all');
    await searchAndCompare(requests.all, groundTruth.all, 'all search assert');

    machine.transition('compare_refined');
    await searchAndCompare(requests.refined, groundTruth.refined, 'refine search assert');

    machine.transition('done');
  } catch (error) {
    logger.error('Scenario failed', { state: machine.state, error: errorMessage(error) });
    machine.fail();
    throw error;
  }

  const durationMs = Date.now() - startedAt;
  logger.info('Scenario passed', { comparisons: comparisons.length, durationMs });
  return {
    scenario: 'search',
    state: machine.state,
    transitions: machine.transitions,
    comparisons,
    storeId: store.storeId,
    durationMs,
  };
}

/**
 * Run the scenario inside a freshly created store that is always deleted
 */
export function runSearchAndCompare(
  deps: SearchScenarioDeps,
  options: ScenarioOptions = {}
): Promise<ScenarioReport> {
  return deps.stores.use(storeCoordinates(deps.config), (store) => verifySearches(deps, store, options));
}
