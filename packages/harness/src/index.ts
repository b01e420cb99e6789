/**
 * DICOM IO harness
 *
 * Resource lifecycle, ground truth, scenario drivers and the capability
 * probe.
 *
 * @module @dicom-it/harness
 */

export { DisposableStoreManager } from './lifecycle/disposable-store-manager.js';
export type { DisposableStoreManagerOptions } from './lifecycle/disposable-store-manager.js';

export { GroundTruthFetcher, deepFreeze } from './ground-truth/ground-truth-fetcher.js';
export type { GroundTruth, GroundTruthSource, GroundTruthFetcherOptions } from './ground-truth/ground-truth-fetcher.js';

export type {
  ComparisonSummary,
  ScenarioDeps,
  ScenarioOptions,
  ScenarioReport,
} from './scenarios/types.js';
export {
  REFINED_SEARCH_LIMIT,
  buildSearchRequests,
  compareSearchResult,
  expectedSearchResult,
  runSearchAndCompare,
  verifySearches,
} from './scenarios/search-and-compare.js';
export type { ExpectedSearchResult, SearchRequests, SearchScenarioDeps } from './scenarios/search-and-compare.js';
export { runIngestThenVerify, verifyIngestion } from './scenarios/ingest-then-verify.js';
export type { IngestScenarioDeps } from './scenarios/ingest-then-verify.js';

export { probeCapabilities } from './probe/capability-probe.js';
export type { ProbeDecision, ProbeDeps, ProbeResult } from './probe/capability-probe.js';

export { createHarness } from './harness.js';
export type { Harness, HarnessOptions } from './harness.js';
