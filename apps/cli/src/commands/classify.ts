/**
 * Classify Command
 *
 * Shows how a single source file would be treated. Exits 1 when the file
 * cannot be probed.
 */

import ora from 'ora';
import chalk from 'chalk';
import { FFProbe, ResolutionClassifier, type ClassificationResult } from '@transcode-mirror/media';
import { fail } from '../lib/failure.js';
import { printHeader, printJson, printKeyValue } from '../lib/output.js';

interface ClassifyOptions {
  hints?: boolean;
  ffprobe?: string;
  json?: boolean;
}

const verdictColors: Record<ClassificationResult['verdict'], (text: string) => string> = {
  NeedsEncode: chalk.blue,
  AlreadyLowRes: chalk.green,
  ProbeFailed: chalk.red,
};

export async function classifyCommand(file: string, options: ClassifyOptions): Promise<void> {
  const classifier = new ResolutionClassifier({
    probe: new FFProbe(options.ffprobe ?? process.env['FFPROBE_PATH'] ?? 'ffprobe'),
    useFilenameHints: options.hints ?? true,
  });

  const spinner = ora(`Classifying ${file}...`).start();

  let result: ClassificationResult;
  try {
    result = await classifier.classify(file);
    spinner.stop();
  } catch (error) {
    fail(error, spinner, 'Classification failed');
  }

  if (options.json) {
    printJson({ file, ...result });
  } else {
    printHeader(file);
    printKeyValue('Verdict', verdictColors[result.verdict](result.verdict));
    printKeyValue('Decided by', result.basis);
    if (result.dimensions) {
      printKeyValue('Dimensions', `${result.dimensions.width}x${result.dimensions.height}`);
    }
    if (result.normalizedHeight !== undefined) {
      printKeyValue('Normalized height', `${result.normalizedHeight}p`);
    }
    if (result.error) {
      printKeyValue('Error', chalk.red(result.error));
    }
  }

  if (result.verdict === 'ProbeFailed') {
    process.exitCode = 1;
  }
}
