/**
 * Dry-run planner: the actions the monitor would issue for the trees as
 * they are now, without executing any of them.
 */

import type { ActionRecord } from '@transcode-mirror/core';
import { ReconciliationEngine, Sequencer, takeSnapshot, type ItemProblem } from '@transcode-mirror/sync';
import type { CompareOptions } from './comparator.js';

export interface ActionPlan {
  actions: ActionRecord[];
  problems: ItemProblem[];
}

export async function planActions(options: CompareOptions): Promise<ActionPlan> {
  const { mapper, classifier, minDestinationBytes } = options;
  const sequencer = new Sequencer();
  const engine = new ReconciliationEngine({ mapper, classifier, sequencer, minDestinationBytes });
  const actions: ActionRecord[] = [];
  engine.on('action', (record: ActionRecord) => actions.push(record));

  engine.applyScan(await takeSnapshot(mapper, sequencer));
  await engine.whenIdle();

  actions.sort((a, b) => (a.identity < b.identity ? -1 : a.identity > b.identity ? 1 : 0));
  return { actions, problems: engine.problems() };
}
