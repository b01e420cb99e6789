/**
 * Store Commands
 *
 * Manual create and delete of DICOM stores in the configured dataset, for
 * cleaning up after an interrupted run.
 *
 * @module @dicom-it/cli/commands/store
 */

import chalk from 'chalk';
import { type DisposableStore, storeCoordinates } from '@dicom-it/core';
import { type CliContext, openHarness, resolveConfig } from '../context.js';

export interface StoreCreateOptions {
  prefix?: string;
  json?: boolean;
}

export async function storeCreateCommand(
  options: StoreCreateOptions,
  context: CliContext = {}
): Promise<DisposableStore> {
  const config = resolveConfig(context);
  const harness = openHarness(context, {
    ...config,
    storePrefix: options.prefix ?? config.storePrefix,
  });

  const store = await harness.stores.acquire(storeCoordinates(config));

  if (options.json) {
    console.log(JSON.stringify({ storeId: store.storeId, createdAt: store.createdAt.toISOString() }));
  } else {
    console.log(chalk.green('✓ Created'), store.storeId);
  }
  return store;
}

export async function storeDeleteCommand(storeId: string, context: CliContext = {}): Promise<void> {
  const harness = openHarness(context);

  await harness.stores.delete(storeCoordinates(harness.config), storeId);
  console.log(chalk.green('✓ Deleted'), storeId);
}
