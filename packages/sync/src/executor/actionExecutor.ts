/**
 * Action Executor
 *
 * Applies ActionRecords to the filesystem on a bounded worker pool. Actions
 * for the same identity run one after another; distinct identities run
 * concurrently up to the pool size. Every record ends in exactly one
 * `settled` event carrying its ActionOutcome.
 *
 * Encodes are written to `<destination>.tmp` and renamed into place only
 * after the output passes the size check, so an interrupted encode never
 * leaves a truncated destination file.
 */

import { EventEmitter } from 'node:events';
import { rename, stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import PQueue from 'p-queue';
import {
  EncodeError,
  FilesystemError,
  isTransientError,
  type ActionOutcome,
  type ActionRecord,
  type EncodeOptions,
  type FileObservation,
  type FilesystemOperation,
} from '@transcode-mirror/core';
import type { Encoder } from '@transcode-mirror/processing';
import {
  createLogger,
  ensureDir,
  errorMessage,
  formatBytes,
  removeIfExists,
  retry,
  statOrNull,
} from '@transcode-mirror/utils';
import type { ClassificationCache } from '../engine/classificationCache.js';
import type { Sequencer } from '../engine/sequencer.js';
import { TEMP_SUFFIX, type PathMapper } from '../watcher/pathMapper.js';
import { scanTree } from '../watcher/scanner.js';
import type { VersionSymlinks } from './versionSymlinks.js';

const logger = createLogger({ module: 'action-executor' });

export const DEFAULT_MIN_OUTPUT_BYTES = 1024;

export interface ActionExecutorOptions {
  mapper: PathMapper;
  encoder: Encoder;
  encodeOptions: EncodeOptions;
  cache: ClassificationCache;
  sequencer: Sequencer;
  symlinks?: VersionSymlinks;
  /** Asked before a queued record starts; false abandons it */
  isCurrent?: (record: ActionRecord) => boolean;
  concurrency?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  minOutputBytes?: number;
}

async function fsStep<T>(operation: FilesystemOperation, path: string, step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (error) {
    throw new FilesystemError(operation, path, error);
  }
}

export class ActionExecutor extends EventEmitter {
  private readonly options: Required<Omit<ActionExecutorOptions, 'symlinks' | 'isCurrent'>>;
  private readonly symlinks?: VersionSymlinks;
  private readonly isCurrent?: (record: ActionRecord) => boolean;
  private readonly queue: PQueue;
  /** Tail of the action chain per identity */
  private readonly chains = new Map<string, Promise<void>>();
  private stopping = false;

  constructor(options: ActionExecutorOptions) {
    super();
    this.options = {
      mapper: options.mapper,
      encoder: options.encoder,
      encodeOptions: options.encodeOptions,
      cache: options.cache,
      sequencer: options.sequencer,
      concurrency: options.concurrency ?? 1,
      maxAttempts: options.maxAttempts ?? 3,
      retryDelayMs: options.retryDelayMs ?? 5000,
      minOutputBytes: options.minOutputBytes ?? DEFAULT_MIN_OUTPUT_BYTES,
    };
    this.symlinks = options.symlinks;
    this.isCurrent = options.isCurrent;
    this.queue = new PQueue({ concurrency: this.options.concurrency });
  }

  /**
   * Queue a record behind any earlier record for the same identity
   */
  submit(record: ActionRecord): void {
    if (record.kind === 'Noop') {
      logger.warn({ identity: record.identity }, 'Noop records are not executed');
      return;
    }

    const previous = this.chains.get(record.identity) ?? Promise.resolve();
    const next = previous
      .then(() => this.queue.add(() => this.run(record)))
      .then(() => undefined)
      .catch((error: unknown) => {
        logger.error({ identity: record.identity, error: errorMessage(error) }, 'Executor chain failed');
      })
      .finally(() => {
        if (this.chains.get(record.identity) === next) {
          this.chains.delete(record.identity);
        }
      });

    this.chains.set(record.identity, next);
  }

  /**
   * Resolves when every submitted record has settled
   */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(this.chains.values());
    }
  }

  /**
   * Abandon every record that has not started yet. Running actions finish;
   * `drain` resolves once they have settled.
   */
  stop(): void {
    if (this.stopping) return;
    this.stopping = true;
    logger.info({ pending: this.chains.size }, 'Executor stopping');
  }

  get pending(): number {
    return this.chains.size;
  }

  /**
   * Delete `*.mkv.tmp` leftovers from interrupted encodes. Only safe while
   * nothing is in flight, i.e. at startup.
   */
  async recoverTemporaryArtifacts(): Promise<number> {
    const { mapper, sequencer } = this.options;
    const leftovers = await scanTree(
      mapper.destinationRoot,
      rel => mapper.isTemporary(rel),
      sequencer
    );

    for (const leftover of leftovers) {
      const path = mapper.destinationAbsolute(leftover.relativePath);
      await fsStep('delete', path, () => removeIfExists(path));
      logger.info({ path, size: formatBytes(leftover.size) }, 'Removed leftover temporary file');
    }
    return leftovers.length;
  }

  private async run(record: ActionRecord): Promise<void> {
    if (this.stopping) {
      logger.debug({ identity: record.identity, kind: record.kind }, 'Shutting down, action not started');
      this.settle(record, { status: 'abandoned' });
      return;
    }
    if (this.isCurrent && !this.isCurrent(record)) {
      logger.info({ identity: record.identity, kind: record.kind, attempt: record.attempt }, 'Superseded action dropped');
      this.settle(record, { status: 'abandoned' });
      return;
    }

    let result: Pick<ActionOutcome, 'status' | 'destination' | 'error'>;
    try {
      const destination = await retry(
        () => this.perform(record),
        {
          maxAttempts: this.options.maxAttempts,
          initialDelay: this.options.retryDelayMs,
          retryIf: isTransientError,
          onRetry: (error, attempt, delay) => {
            logger.warn(
              { identity: record.identity, kind: record.kind, attempt, delay, error: errorMessage(error) },
              'Transient failure, retrying'
            );
          },
        }
      );
      result = { status: 'succeeded', destination };
    } catch (error) {
      logger.error({ identity: record.identity, kind: record.kind, error: errorMessage(error) }, 'Action failed');
      result = { status: 'failed', error: errorMessage(error) };
    }

    this.settle(record, result);
  }

  private settle(record: ActionRecord, result: Pick<ActionOutcome, 'status' | 'destination' | 'error'>): void {
    const outcome: ActionOutcome = {
      identity: record.identity,
      attempt: record.attempt,
      kind: record.kind,
      ...result,
    };
    this.emit('settled', outcome);
  }

  private async perform(record: ActionRecord): Promise<FileObservation | null | undefined> {
    switch (record.kind) {
      case 'Encode':
        return this.encode(record);
      case 'Delete':
        return this.delete(record);
      case 'Skip':
        return this.skip(record);
      case 'Noop':
        return undefined;
    }
  }

  private async encode(record: ActionRecord): Promise<FileObservation> {
    const { mapper, encoder, encodeOptions, minOutputBytes, sequencer } = this.options;
    if (!record.sourcePath || !record.destinationPath) {
      throw new EncodeError(record.identity, 'record has no source or destination path');
    }

    const sourcePath = mapper.sourceAbsolute(record.sourcePath);
    const finalPath = mapper.destinationAbsolute(record.destinationPath);
    const tempPath = `${finalPath}${TEMP_SUFFIX}`;

    await fsStep('delete', tempPath, () => removeIfExists(tempPath));
    await fsStep('mkdir', dirname(finalPath), () => ensureDir(dirname(finalPath)));

    try {
      await encoder.encode(sourcePath, tempPath, encodeOptions);

      const output = await fsStep('stat', tempPath, () => statOrNull(tempPath));
      if (!output) {
        throw new EncodeError(sourcePath, 'encoder produced no output file');
      }
      if (output.size < minOutputBytes) {
        throw new EncodeError(
          sourcePath,
          `output is ${output.size} bytes, below the ${minOutputBytes} byte minimum`
        );
      }

      await fsStep('rename', finalPath, () => rename(tempPath, finalPath));
    } catch (error) {
      await removeIfExists(tempPath).catch((cleanupError: unknown) => {
        logger.warn({ tempPath, error: errorMessage(cleanupError) }, 'Could not remove temporary file');
      });
      throw error;
    }

    if (this.symlinks?.enabled) {
      await this.symlinks.create(record.identity, record.destinationPath).catch((error: unknown) => {
        logger.warn({ identity: record.identity, error: errorMessage(error) }, 'Version symlink not created');
      });
    }

    const stats = await fsStep('stat', finalPath, () => stat(finalPath));
    logger.info(
      { identity: record.identity, destination: record.destinationPath, size: formatBytes(stats.size) },
      'Encode published'
    );

    return {
      relativePath: record.destinationPath,
      size: stats.size,
      mtimeMs: stats.mtimeMs,
      sequence: sequencer.next(),
    };
  }

  private async delete(record: ActionRecord): Promise<null> {
    const { mapper } = this.options;
    if (record.destinationPath) {
      const finalPath = mapper.destinationAbsolute(record.destinationPath);
      for (const path of [finalPath, `${finalPath}${TEMP_SUFFIX}`]) {
        const removed = await fsStep('delete', path, () => removeIfExists(path));
        if (removed) {
          logger.info({ identity: record.identity, path }, 'Deleted');
        }
      }
    }

    await this.symlinks?.remove(record.identity);
    return null;
  }

  private async skip(record: ActionRecord): Promise<undefined> {
    if (record.fingerprint) {
      this.options.cache.set(record.identity, record.fingerprint, 'AlreadyLowRes');
    }
    logger.debug({ identity: record.identity }, 'Skipped low resolution source');
    return undefined;
  }
}
