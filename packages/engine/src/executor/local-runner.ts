/**
 * Local Workload Runner
 *
 * Runs a work unit over a (possibly lazy) sequence of items inside this
 * process with bounded concurrency, then returns outputs in input order.
 * The first unit failure, or a failing item source, fails the whole run
 * once in-flight units settle.
 *
 * @module @dicom-it/engine/executor
 */

import { randomUUID } from 'node:crypto';
import { type ILogger, NoOpLogger, errorMessage } from '@dicom-it/core';
import type { RunOptions, RunnerConfig, WorkUnit, WorkloadExecutor } from './types.js';
import { DEFAULT_RUNNER_CONFIG } from './types.js';

export class LocalWorkloadRunner implements WorkloadExecutor {
  private readonly config: RunnerConfig;
  private readonly logger: ILogger;

  constructor(config: Partial<RunnerConfig> = {}, logger?: ILogger) {
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxConcurrency) || this.config.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be a positive integer, got ${this.config.maxConcurrency}`);
    }
    this.logger = (logger ?? new NoOpLogger()).child({ component: 'runner' });
  }

  async runAndCollect<I, O>(
    items: Iterable<I> | AsyncIterable<I>,
    unit: WorkUnit<I, O>,
    options: RunOptions = {}
  ): Promise<O[]> {
    const runId = randomUUID();
    const label = options.label ?? 'workload';
    const logger = this.logger.child({ runId, label });
    const startedAt = Date.now();

    const outputs: O[] = [];
    const running = new Set<Promise<void>>();
    let submitted = 0;
    let completed = 0;
    const failures: unknown[] = [];

    try {
      for await (const item of items) {
        if (failures.length > 0) {
          break;
        }

        const itemIndex = submitted++;
        const task: Promise<void> = unit(item, { runId, itemIndex, logger })
          .then(
            (output) => {
              outputs[itemIndex] = output;
            },
            (error: unknown) => {
              logger.error('Work unit failed', { itemIndex, error: errorMessage(error) });
              failures.push(error);
            }
          )
          .finally(() => {
            running.delete(task);
            completed++;
            this.config.onProgress?.(completed, label);
          });
        running.add(task);

        if (running.size >= this.config.maxConcurrency) {
          await Promise.race(running);
        }
      }
    } finally {
      // Units already started finish even when the item source throws
      await Promise.allSettled(running);
    }

    if (failures.length > 0) {
      throw failures[0];
    }

    logger.info('Workload complete', { items: submitted, durationMs: Date.now() - startedAt });
    return outputs;
  }
}
