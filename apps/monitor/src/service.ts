/**
 * Monitor Service
 *
 * Wires the pieces of the mirror together:
 *
 *   FolderWatcher ──event──▶ ReconciliationEngine ──action──▶ ActionExecutor
 *                                   ▲                               │
 *                                   └───────────settled─────────────┘
 *
 * A corrective scan of both trees runs at startup and on a fixed interval;
 * the watcher only makes changes show up sooner.
 */

import type { Logger } from 'pino';
import type { ActionOutcome, ActionRecord } from '@transcode-mirror/core';
import type { Encoder } from '@transcode-mirror/processing';
import {
  ActionExecutor,
  FolderWatcher,
  PathMapper,
  ReconciliationEngine,
  VersionSymlinks,
  takeSnapshot,
  type ActionFailure,
  type ProbeFailure,
  type SourceClassifier,
  type WatchEvent,
} from '@transcode-mirror/sync';
import { errorMessage, formatDuration } from '@transcode-mirror/utils';
import type { MonitorConfig } from './config/index.js';

export interface MonitorDependencies {
  classifier: SourceClassifier;
  encoder: Encoder;
  logger: Logger;
}

export class MonitorService {
  readonly mapper: PathMapper;
  readonly engine: ReconciliationEngine;
  readonly executor: ActionExecutor;
  private readonly symlinks: VersionSymlinks;
  private readonly watcher: FolderWatcher;
  private readonly logger: Logger;
  private scanTimer: NodeJS.Timeout | null = null;
  private followUpTimer: NodeJS.Timeout | null = null;
  private currentScan: Promise<boolean> | null = null;
  private stopping = false;

  constructor(private readonly config: MonitorConfig, deps: MonitorDependencies) {
    this.logger = deps.logger;

    this.mapper = new PathMapper({
      sourceRoot: config.sourceFolder,
      destinationRoot: config.destinationFolder,
      versionSuffix: config.symlinks.versionSuffix,
      symlinkTargetPrefix: config.symlinks.targetPrefix,
      ignorePatterns: config.ignorePatterns,
    });

    this.engine = new ReconciliationEngine({
      mapper: this.mapper,
      classifier: deps.classifier,
      classifyConcurrency: config.probeConcurrency,
      minDestinationBytes: config.minOutputBytes,
    });
    this.symlinks = new VersionSymlinks(this.mapper);

    this.executor = new ActionExecutor({
      mapper: this.mapper,
      encoder: deps.encoder,
      encodeOptions: config.encoding,
      cache: this.engine.cache,
      sequencer: this.engine.sequencer,
      symlinks: this.symlinks,
      isCurrent: record => this.engine.isCurrent(record),
      concurrency: config.maxWorkers,
      maxAttempts: config.encodeMaxAttempts,
      retryDelayMs: config.encodeRetryDelayMs,
      minOutputBytes: config.minOutputBytes,
    });

    this.watcher = new FolderWatcher({
      root: this.mapper.sourceRoot,
      accept: relativePath => this.mapper.isCandidateSource(relativePath),
      stabilityThresholdMs: config.stabilityThresholdMs,
    });

    this.wire();
  }

  /**
   * Recover, scan, then start watching. Resolves once the watcher runs.
   */
  async start(): Promise<void> {
    this.logger.info(
      {
        source: this.mapper.sourceRoot,
        destination: this.mapper.destinationRoot,
        sameFolder: this.mapper.sameFolder,
        encoding: this.config.encoding,
        workers: this.config.maxWorkers,
        symlinks: this.symlinks.enabled,
      },
      'Starting monitor'
    );

    const recovered = await this.executor.recoverTemporaryArtifacts();
    if (recovered > 0) {
      this.logger.info({ recovered }, 'Removed leftovers of interrupted encodes');
    }

    await this.scan();

    this.watcher.start();
    this.scanTimer = setInterval(() => {
      void this.scan();
    }, this.config.cleanupIntervalMs);

    this.logger.info({ interval: formatDuration(this.config.cleanupIntervalMs) }, 'Monitor started');
  }

  /**
   * Run a corrective scan. A scan already running is joined rather than
   * started twice. Resolves false when the scan failed.
   */
  scan(): Promise<boolean> {
    if (!this.currentScan) {
      this.currentScan = this.runScan().finally(() => {
        this.currentScan = null;
      });
    }
    return this.currentScan;
  }

  /**
   * Resolves when no classification or action is outstanding
   */
  async settled(): Promise<void> {
    await this.engine.whenIdle();
    while (this.executor.pending > 0) {
      await this.executor.drain();
      await this.engine.whenIdle();
    }
  }

  /**
   * Stop watching and scheduling, then let running actions finish
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;

    if (this.scanTimer) {
      clearInterval(this.scanTimer);
      this.scanTimer = null;
    }
    if (this.followUpTimer) {
      clearTimeout(this.followUpTimer);
      this.followUpTimer = null;
    }
    if (this.watcher.running) {
      this.watcher.stop();
    }

    await this.currentScan;
    this.executor.stop();
    await this.executor.drain();
    this.logger.info({ counts: this.engine.classificationCounts() }, 'Monitor stopped');
  }

  private wire(): void {
    this.watcher.on('event', (event: WatchEvent) => {
      this.logger.debug({ type: event.type, path: event.relativePath }, 'Source change');
      this.engine.handleEvent({
        type: event.type,
        side: 'source',
        relativePath: event.relativePath,
        size: event.size,
        mtimeMs: event.mtimeMs,
      });
    });

    this.watcher.on('error', ({ path, error }: { path: string; error: unknown }) => {
      this.logger.error({ path, error: errorMessage(error) }, 'Watcher error');
    });

    this.engine.on('action', (record: ActionRecord) => {
      if (this.stopping) {
        this.logger.info({ identity: record.identity, kind: record.kind }, 'Shutting down, action not started');
        return;
      }
      this.executor.submit(record);
    });

    this.engine.on('probe-failed', (failure: ProbeFailure) => {
      this.logger.warn({ path: failure.path, error: failure.error }, 'Source could not be probed');
    });

    this.engine.on('failure', (failure: ActionFailure) => {
      this.logger.error(failure, 'Action failed, retried after the next scan');
    });

    this.executor.on('settled', (outcome: ActionOutcome) => {
      this.engine.settle(outcome);
    });
  }

  private async runScan(): Promise<boolean> {
    const started = Date.now();
    try {
      const snapshot = await takeSnapshot(this.mapper, this.engine.sequencer, {
        stabilityThresholdMs: this.config.stabilityThresholdMs,
      });
      this.engine.applyScan(snapshot);
      this.scheduleFollowUp(snapshot.deferred?.length ?? 0);

      const removedLinks = await this.symlinks.cleanupOrphaned();
      this.logger.info(
        {
          counts: this.engine.classificationCounts(),
          removedLinks,
          durationMs: Date.now() - started,
        },
        'Corrective scan finished'
      );
      return true;
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Corrective scan failed, retrying next period');
      return false;
    }
  }

  /** Sources still being written get another look once they can be stable */
  private scheduleFollowUp(deferred: number): void {
    if (deferred === 0 || this.stopping || this.followUpTimer) return;

    this.logger.info(
      { deferred, retryIn: formatDuration(this.config.stabilityThresholdMs) },
      'Sources still changing, scanning again later'
    );
    this.followUpTimer = setTimeout(() => {
      this.followUpTimer = null;
      void this.scan();
    }, this.config.stabilityThresholdMs);
  }
}
