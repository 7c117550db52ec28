/**
 * Command definitions for the transcode-mirror CLI
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { REPORT_FORMATS } from '@transcode-mirror/report';
import { compareCommand } from './commands/compare.js';
import { planCommand } from './commands/plan.js';
import { classifyCommand } from './commands/classify.js';

function withTreeOptions(command: Command): Command {
  return command
    .option('-s, --source <folder>', 'Source folder (env: SOURCE_FOLDER)')
    .option('-d, --dest <folder>', 'Destination folder (env: DEST_FOLDER)')
    .option('-i, --ignore <patterns>', 'Comma-separated regular expressions to ignore (env: IGNORE_PATTERNS)')
    .option('--no-probe', 'Classify by file name only, without running ffprobe')
    .option('--ffprobe <path>', 'ffprobe executable (env: FFPROBE_PATH)');
}

export const program = new Command();

program
  .name('transcode-mirror')
  .description('Inspect a transcode mirror without changing it')
  .version('1.0.0');

withTreeOptions(
  program
    .command('compare')
    .description('Compare source and destination and report missing or orphaned encodes')
    .option('-f, --format <format>', `Output format (${REPORT_FORMATS.join(', ')}) (env: OUTPUT_FORMAT)`)
    .option('--show-skipped', 'Include sources skipped as already low resolution (env: SHOW_SKIPPED)')
).action(compareCommand);

withTreeOptions(
  program
    .command('plan')
    .description('List the actions the monitor would take right now')
    .option('--json', 'Output in JSON format')
).action(planCommand);

program
  .command('classify <file>')
  .description('Show whether a source file would be encoded or skipped')
  .option('--no-hints', 'Ignore resolution markers in the file name')
  .option('--ffprobe <path>', 'ffprobe executable (env: FFPROBE_PATH)')
  .option('--json', 'Output in JSON format')
  .action(classifyCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.error('Run', chalk.cyan('transcode-mirror --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});
