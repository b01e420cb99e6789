/**
 * Shared command plumbing
 *
 * @module @dicom-it/cli/context
 */

import { type HarnessConfig, createLogger, loadHarnessConfig } from '@dicom-it/core';
import { type Harness, type HarnessOptions, createHarness } from '@dicom-it/harness';

/**
 * What a command runs against. Tests replace the environment and the
 * harness collaborators; the binary uses the process defaults.
 */
export interface CliContext {
  env?: Record<string, string | undefined>;
  harness?: HarnessOptions;
}

export function resolveConfig(context: CliContext = {}): HarnessConfig {
  return loadHarnessConfig(context.env ?? process.env);
}

/**
 * Build a harness; logs go to stderr so stdout stays machine-readable
 */
export function openHarness(context: CliContext = {}, config = resolveConfig(context)): Harness {
  const logger =
    context.harness?.logger ??
    createLogger({ component: 'cli' }, context.env ?? process.env, (line) => console.error(line));
  return createHarness(config, { ...context.harness, logger });
}
