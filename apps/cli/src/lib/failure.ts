/**
 * Reports a command failure and exits non-zero
 */

import type { Ora } from 'ora';
import { ConfigurationError } from '@transcode-mirror/core';
import { errorMessage } from '@transcode-mirror/utils';
import { printError } from './output.js';

export function fail(error: unknown, spinner?: Ora, label?: string): never {
  if (spinner) {
    spinner.fail(label);
  }
  if (error instanceof ConfigurationError) {
    for (const issue of error.issues) {
      printError(issue);
    }
  } else {
    printError(errorMessage(error));
  }
  process.exit(1);
}

/** Writes command output to stdout, ending it with a newline. */
export function writeOutput(output: string): void {
  process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
}
