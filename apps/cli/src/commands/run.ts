/**
 * Run Command
 *
 * Runs the verification scenarios one after another and prints a summary.
 * A failed scenario does not stop the next one.
 *
 * @module @dicom-it/cli/commands/run
 */

import chalk from 'chalk';
import ora from 'ora';
import { ConfigurationError, errorMessage } from '@dicom-it/core';
import type { ScenarioReport } from '@dicom-it/harness';
import { type CliContext, openHarness } from '../context.js';

export type ScenarioSelection = 'search' | 'ingest' | 'all';

export const SCENARIO_SELECTIONS: readonly ScenarioSelection[] = ['search', 'ingest', 'all'];

export interface RunOptions {
  scenario?: string;
  json?: boolean;
  /** Override the per-scenario comparison order */
  orderSensitive?: boolean;
}

export type ScenarioOutcome =
  | { scenario: 'search' | 'ingest'; status: 'passed'; report: ScenarioReport }
  | { scenario: 'search' | 'ingest'; status: 'failed'; error: string };

export interface RunSummary {
  passed: boolean;
  outcomes: ScenarioOutcome[];
}

function isScenarioSelection(value: string): value is ScenarioSelection {
  return SCENARIO_SELECTIONS.some((selection) => selection === value);
}

export async function runCommand(options: RunOptions, context: CliContext = {}): Promise<RunSummary> {
  const selection = options.scenario ?? 'all';
  if (!isScenarioSelection(selection)) {
    throw new ConfigurationError(`Unknown scenario "${selection}" (expected ${SCENARIO_SELECTIONS.join(', ')})`, [
      { field: 'scenario', message: 'Invalid value' },
    ]);
  }

  const harness = openHarness(context);
  const scenarioOptions = { orderSensitive: options.orderSensitive };
  const drivers = {
    search: () => harness.runSearchAndCompare(scenarioOptions),
    ingest: () => harness.runIngestThenVerify(scenarioOptions),
  };
  const selected: Array<'search' | 'ingest'> = selection === 'all' ? ['search', 'ingest'] : [selection];

  const spinner = ora({ isSilent: options.json });
  const outcomes: ScenarioOutcome[] = [];
  for (const scenario of selected) {
    spinner.start(`Running ${scenario} scenario...`);
    try {
      const report = await drivers[scenario]();
      spinner.succeed(`${scenario} passed (${report.durationMs}ms)`);
      outcomes.push({ scenario, status: 'passed', report });
    } catch (error) {
      spinner.fail(`${scenario} failed`);
      outcomes.push({ scenario, status: 'failed', error: errorMessage(error) });
    }
  }

  const summary = { passed: outcomes.every((outcome) => outcome.status === 'passed'), outcomes };
  printSummary(summary, options);
  return summary;
}

function printSummary(summary: RunSummary, options: RunOptions): void {
  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }

  for (const outcome of summary.outcomes) {
    console.log(chalk.bold(outcome.scenario));
    if (outcome.status === 'passed') {
      for (const comparison of outcome.report.comparisons) {
        console.log(chalk.dim(`  ${comparison.label}: ${comparison.mode}, ${comparison.size} element(s)`));
      }
    } else {
      console.log(chalk.red(`  ${outcome.error}`));
    }
  }

  const failed = summary.outcomes.filter((outcome) => outcome.status === 'failed').length;
  console.log();
  console.log(
    failed === 0
      ? chalk.green(`${summary.outcomes.length} scenario(s) passed`)
      : chalk.red(`${failed} of ${summary.outcomes.length} scenario(s) failed`)
  );
}
