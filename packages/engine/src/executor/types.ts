/**
 * Workload execution contract
 *
 * @module @dicom-it/engine/executor
 */

import type { ILogger } from '@dicom-it/core';

/**
 * Context handed to every unit invocation
 */
export interface ExecutionContext {
  /** Identifier of the `runAndCollect` call */
  runId: string;
  /** Position of the item in the input sequence */
  itemIndex: number;
  logger: ILogger;
}

/**
 * One unit of work: maps an input element to exactly one output
 */
export type WorkUnit<I, O> = (item: I, context: ExecutionContext) => Promise<O>;

export interface RunOptions {
  /** Label used in logs */
  label?: string;
}

/**
 * Runs a unit over every item and blocks until all outputs are available
 */
export interface WorkloadExecutor {
  runAndCollect<I, O>(
    items: Iterable<I> | AsyncIterable<I>,
    unit: WorkUnit<I, O>,
    options?: RunOptions
  ): Promise<O[]>;
}

/**
 * Runner configuration
 */
export interface RunnerConfig {
  /** Maximum units in flight (default: 4) */
  maxConcurrency: number;
  /** Called after each unit settles */
  onProgress?: (completed: number, label: string) => void;
}

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  maxConcurrency: 4,
};
