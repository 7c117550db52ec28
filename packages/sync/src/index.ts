/**
 * @transcode-mirror/sync
 *
 * Keeps the destination tree a downscaled mirror of the source tree.
 *
 * Responsibilities:
 * - Map source paths to destination paths and identities
 * - Observe both trees (live watcher, corrective scans)
 * - Reconcile observations into actions
 * - Execute actions on a bounded worker pool
 */

export * from './watcher/index.js';

export {
  ReconciliationEngine,
  DEFAULT_CLASSIFY_CONCURRENCY,
  type ReconciliationEngineOptions,
  type SourceClassifier,
  type ProbeFailure,
  type ActionFailure,
  type ItemProblem,
} from './engine/reconciler.js';

export { ClassificationCache, type CachedVerdict } from './engine/classificationCache.js';
export { Sequencer } from './engine/sequencer.js';

export {
  ActionExecutor,
  DEFAULT_MIN_OUTPUT_BYTES,
  type ActionExecutorOptions,
} from './executor/actionExecutor.js';

export { VersionSymlinks } from './executor/versionSymlinks.js';

export { takeSnapshot, type SnapshotOptions } from './snapshot.js';
