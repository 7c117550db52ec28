/**
 * Plan Command
 *
 * Lists the encodes, deletes and skips the monitor would issue right now.
 */

import ora from 'ora';
import chalk from 'chalk';
import type { ActionKind } from '@transcode-mirror/core';
import { planActions, type ActionPlan } from '@transcode-mirror/report';
import { resolveTreeConfig, type TreeCommandOptions } from '../config/index.js';
import { openTrees, type TreeContext } from '../lib/context.js';
import { fail } from '../lib/failure.js';
import { printHeader, printJson, printSuccess, printWarning } from '../lib/output.js';

interface PlanOptions extends TreeCommandOptions {
  json?: boolean;
}

const kindColors: Record<ActionKind, (text: string) => string> = {
  Encode: chalk.blue,
  Delete: chalk.red,
  Skip: chalk.gray,
  Noop: chalk.gray,
};

export function formatPlanLines(plan: ActionPlan): string[] {
  return plan.actions.map(action => {
    const target = action.kind === 'Delete' ? action.destinationPath : action.sourcePath;
    const arrow = action.kind === 'Encode' ? ` -> ${action.destinationPath ?? ''}` : '';
    return `${action.kind.padEnd(6)} ${target ?? action.identity}${arrow}`;
  });
}

export async function planCommand(options: PlanOptions): Promise<void> {
  let context: TreeContext;
  try {
    context = await openTrees(resolveTreeConfig(options));
  } catch (error) {
    fail(error);
  }

  const spinner = ora('Planning actions...').start();

  let plan: ActionPlan;
  try {
    plan = await planActions(context);
    spinner.stop();
  } catch (error) {
    fail(error, spinner, 'Planning failed');
  }

  if (options.json) {
    printJson({
      actions: plan.actions.map(({ identity, kind, sourcePath, destinationPath }) => ({
        identity,
        kind,
        sourcePath,
        destinationPath,
      })),
      problems: plan.problems,
    });
    return;
  }

  for (const problem of plan.problems) {
    printWarning(`${problem.path ?? problem.identity}: ${problem.error}`);
  }

  if (plan.actions.length === 0) {
    printSuccess('Nothing to do');
    return;
  }

  printHeader(`Planned actions (${plan.actions.length})`);
  const lines = formatPlanLines(plan);
  plan.actions.forEach((action, i) => {
    console.log(`  ${kindColors[action.kind](lines[i] ?? '')}`);
  });
}
