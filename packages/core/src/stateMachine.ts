/**
 * Reconciliation Decision Table
 *
 * Maps the presence of a media item on each side (S = source, D = destination)
 * plus its resolution verdict to a classification and a required action.
 *
 *   S  D  condition                 classification   action
 *   Y  N  no verdict yet            Unclassified     Classify
 *   Y  N  NeedsEncode               NeedsEncode      Encode
 *   Y  N  AlreadyLowRes             AlreadyLowRes    Skip
 *   Y  N  ProbeFailed               ProbeFailed      Noop (reported)
 *   Y  Y  dest mtime >= source      Encoded          Noop
 *   Y  Y  dest mtime <  source      Encoded (stale)  Encode
 *   Y  Y  stale, AlreadyLowRes      Encoded (stale)  Noop
 *   Y  Y  dest below minimum size   as if D = N, except AlreadyLowRes -> Delete
 *   N  Y                            Orphaned         Delete
 *   N  N                            -                Remove from index
 *
 * The live engine and the offline comparator both go through `decide`, so
 * they cannot drift apart.
 */

import type {
  ActionKind,
  Classification,
  ClassificationCounts,
  FileObservation,
  ResolutionVerdict,
} from './types/media.js';

export type DecisionAction = ActionKind | 'Classify' | 'Remove';

export interface Decision {
  classification: Classification;
  action: DecisionAction;
  stale: boolean;
}

type Side = Pick<FileObservation, 'mtimeMs' | 'size'>;

export interface DecisionInput {
  source?: Side;
  destination?: Side;
  verdict?: ResolutionVerdict;
  /** A destination smaller than this is a truncated encode, not an output */
  minDestinationBytes?: number;
}

/**
 * Derive classification and action for one media item
 */
export function decide({ source, destination, verdict, minDestinationBytes = 0 }: DecisionInput): Decision {
  const truncated = destination !== undefined && destination.size < minDestinationBytes;

  if (source && destination && !truncated) {
    const stale = destination.mtimeMs < source.mtimeMs;
    return {
      classification: 'Encoded',
      action: stale && verdict !== 'AlreadyLowRes' ? 'Encode' : 'Noop',
      stale,
    };
  }

  if (source) {
    switch (verdict) {
      case undefined:
        return { classification: 'Unclassified', action: 'Classify', stale: false };
      case 'NeedsEncode':
        return { classification: 'NeedsEncode', action: 'Encode', stale: false };
      case 'AlreadyLowRes':
        return { classification: 'AlreadyLowRes', action: destination ? 'Delete' : 'Skip', stale: false };
      case 'ProbeFailed':
        return { classification: 'ProbeFailed', action: 'Noop', stale: false };
    }
  }

  if (destination) {
    return { classification: 'Orphaned', action: 'Delete', stale: false };
  }

  return { classification: 'Unclassified', action: 'Remove', stale: false };
}

/**
 * Actions that are dispatched to the executor
 */
export function isDispatchable(action: DecisionAction): action is 'Encode' | 'Delete' | 'Skip' {
  return action === 'Encode' || action === 'Delete' || action === 'Skip';
}

export function emptyClassificationCounts(): ClassificationCounts {
  return {
    Unclassified: 0,
    NeedsEncode: 0,
    AlreadyLowRes: 0,
    Encoded: 0,
    Orphaned: 0,
    ProbeFailed: 0,
  };
}

/**
 * Tally classifications; both the live engine and the comparator report these
 */
export function countClassifications(
  items: Iterable<{ classification: Classification }>
): ClassificationCounts {
  const counts = emptyClassificationCounts();
  for (const item of items) {
    counts[item.classification]++;
  }
  return counts;
}
