#!/usr/bin/env node

/**
 * DICOM IO Integration CLI
 *
 * Verifies DICOM search and ingestion against a live Cloud Healthcare
 * dataset.
 *
 * Commands:
 *   dicom-it probe                  Can live scenarios run here?
 *   dicom-it run [--scenario s]     Run search, ingest or all scenarios
 *   dicom-it store create           Create a disposable DICOM store
 *   dicom-it store delete <id>      Delete a DICOM store
 *   dicom-it search <storeId>       QIDO-RS search, printed as JSON
 *
 * Configuration comes from DICOM_IT_* environment variables.
 */

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '@dicom-it/core';
import { probeCommand } from './commands/probe.js';
import { SCENARIO_SELECTIONS, runCommand } from './commands/run.js';
import { storeCreateCommand, storeDeleteCommand } from './commands/store.js';
import { searchCommand } from './commands/search.js';

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

const program = new Command();

program
  .name('dicom-it')
  .description('DICOM IO integration harness for the Cloud Healthcare API')
  .version('0.1.0');

// Probe command - decide whether live scenarios can run
program
  .command('probe')
  .description('Check configuration and credentials for live scenarios')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await probeCommand(options);
    } catch (error) {
      fail(error);
    }
  });

// Run command - execute scenarios
program
  .command('run')
  .description('Run verification scenarios against the configured dataset')
  .addOption(
    new Option('-s, --scenario <scenario>', 'Scenario to run').choices([...SCENARIO_SELECTIONS]).default('all')
  )
  .option('--ordered', 'Compare results in order')
  .option('--unordered', 'Compare results as multisets')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      const orderSensitive = options.ordered ? true : options.unordered ? false : undefined;
      const summary = await runCommand({ scenario: options.scenario, json: options.json, orderSensitive });
      if (!summary.passed) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

// Store commands - manual lifecycle
const store = program.command('store').description('Create or delete DICOM stores');

store
  .command('create')
  .description('Create a uniquely named DICOM store')
  .option('--prefix <prefix>', 'Store id prefix (default: DICOM_IT_STORE_PREFIX)')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    try {
      await storeCreateCommand(options);
    } catch (error) {
      fail(error);
    }
  });

store
  .command('delete <storeId>')
  .description('Delete a DICOM store')
  .action(async (storeId) => {
    try {
      await storeDeleteCommand(storeId);
    } catch (error) {
      fail(error);
    }
  });

// Search command - inspect a store
program
  .command('search <storeId>')
  .description('Search a DICOM store and print the records as JSON')
  .option('-t, --type <type>', 'studies, series or instances', 'instances')
  .option('-p, --param <key=value>', 'QIDO-RS query parameter (repeatable)', collect, [])
  .option('--raw', 'Keep volatile tags')
  .action(async (storeId, options) => {
    try {
      await searchCommand(storeId, options);
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
