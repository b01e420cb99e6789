/**
 * Scenario driver contracts
 *
 * @module @dicom-it/harness/scenarios
 */

import type {
  ComparisonMode,
  ComparisonResult,
  HarnessConfig,
  ILogger,
  ScenarioKind,
  ScenarioState,
  TransitionRecord,
} from '@dicom-it/core';
import type { DicomSearcher } from '@dicom-it/connectors';
import type { WorkloadExecutor } from '@dicom-it/engine';
import type { GroundTruthSource } from '../ground-truth/ground-truth-fetcher.js';

/**
 * One passed comparison
 */
export interface ComparisonSummary {
  label: string;
  mode: ComparisonMode;
  size: number;
}

/**
 * Outcome of a scenario that reached `done`
 */
export interface ScenarioReport {
  scenario: ScenarioKind;
  state: ScenarioState;
  transitions: readonly TransitionRecord[];
  comparisons: ComparisonSummary[];
  /** Disposable store the scenario owned */
  storeId: string;
  durationMs: number;
}

/**
 * Collaborators shared by both drivers
 */
export interface ScenarioDeps {
  config: HarnessConfig;
  runner: WorkloadExecutor;
  searcher: DicomSearcher;
  groundTruth: GroundTruthSource;
  logger?: ILogger;
}

export interface ScenarioOptions {
  /**
   * Compare result sequences in order. Search defaults to true, ingest to
   * false.
   */
  orderSensitive?: boolean;
}

export function summarize(label: string, result: ComparisonResult): ComparisonSummary {
  return { label, mode: result.mode, size: result.equal ? result.size : 0 };
}
