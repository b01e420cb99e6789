/**
 * Probe Command
 *
 * Reports whether live scenarios can run in this environment.
 *
 * @module @dicom-it/cli/commands/probe
 */

import chalk from 'chalk';
import type { ProbeResult } from '@dicom-it/harness';
import { type CliContext, openHarness } from '../context.js';

export interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(options: ProbeOptions, context: CliContext = {}): Promise<ProbeResult> {
  const result = await openHarness(context).probe();

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return result;
  }

  if (result.decision === 'run') {
    console.log(chalk.green('✓ Live scenarios can run'));
  } else {
    console.log(chalk.yellow('○ Live scenarios will be skipped:'));
    for (const reason of result.reasons) {
      console.log(chalk.dim(`  - ${reason}`));
    }
  }
  return result;
}
