/**
 * Compare Command
 *
 * Read-only report of how far the destination is from mirroring the source.
 * Exits 1 when encodes are missing or orphans are present.
 */

import ora from 'ora';
import { compareTrees, formatReport, reportExitCode } from '@transcode-mirror/report';
import { resolveTreeConfig, type TreeCommandOptions, type TreeConfig } from '../config/index.js';
import { openTrees, type TreeContext } from '../lib/context.js';
import { fail, writeOutput } from '../lib/failure.js';

export async function compareCommand(options: TreeCommandOptions): Promise<void> {
  let config: TreeConfig;
  let context: TreeContext;
  try {
    config = resolveTreeConfig(options);
    context = await openTrees(config);
  } catch (error) {
    fail(error);
  }

  const spinner = ora('Comparing source and destination...').start();

  try {
    const report = await compareTrees(context);
    spinner.stop();

    writeOutput(formatReport(report, config.format, { showSkipped: config.showSkipped }));
    process.exitCode = reportExitCode(report);
  } catch (error) {
    fail(error, spinner, 'Comparison failed');
  }
}
