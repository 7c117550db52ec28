/**
 * Corrective scan of both trees
 */

import type { FileObservation, TreeSnapshot } from '@transcode-mirror/core';
import { createLogger, statOrNull } from '@transcode-mirror/utils';
import type { Sequencer } from './engine/sequencer.js';
import type { PathMapper } from './watcher/pathMapper.js';
import { scanTree } from './watcher/scanner.js';

const logger = createLogger({ module: 'snapshot' });

export interface SnapshotOptions {
  /** Sources modified within this window are deferred instead of observed */
  stabilityThresholdMs?: number;
  now?: number;
}

/**
 * Enumerate source and destination. An unreadable source root throws
 * FilesystemError so that no destination file is mistaken for an orphan; a
 * destination root that does not exist yet is empty.
 */
export async function takeSnapshot(
  mapper: PathMapper,
  sequencer: Sequencer,
  options: SnapshotOptions = {}
): Promise<TreeSnapshot> {
  const startedAt = sequencer.next();
  const started = Date.now();
  const { stabilityThresholdMs = 0, now = started } = options;

  const source: FileObservation[] = [];
  const deferred: string[] = [];
  for (const file of await scanTree(mapper.sourceRoot, rel => mapper.isCandidateSource(rel), sequencer)) {
    if (stabilityThresholdMs > 0 && now - file.mtimeMs < stabilityThresholdMs) {
      deferred.push(file.relativePath);
    } else {
      source.push(file);
    }
  }
  const destination = (await statOrNull(mapper.destinationRoot))
    ? await scanTree(mapper.destinationRoot, rel => mapper.isCandidateDestination(rel), sequencer)
    : [];

  logger.info(
    { source: source.length, destination: destination.length, deferred: deferred.length, durationMs: Date.now() - started },
    'Trees scanned'
  );
  return { startedAt, source, destination, deferred };
}
