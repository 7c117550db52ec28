/**
 * Reconciliation Engine
 *
 * Owns the in-memory index of media items and derives the action each one
 * needs from the shared decision table. Every mutation happens synchronously
 * inside one method call; classification is the only suspension and comes
 * back through `resolveClassification`, which drops results for a source
 * that changed in the meantime.
 *
 * Inputs:
 * - `handleEvent` for live watcher events
 * - `applyScan` for corrective full scans (last writer wins by sequence)
 * - `settle` for executor outcomes
 *
 * Events:
 * - `action` (ActionRecord): work for the executor
 * - `probe-failed` ({ identity, path, error })
 * - `failure` ({ identity, kind, error })
 */

import { EventEmitter } from 'node:events';
import PQueue from 'p-queue';
import {
  countClassifications,
  decide,
  fingerprintOf,
  type ActionKind,
  type ActionOutcome,
  type ActionRecord,
  type ClassificationCounts,
  type Decision,
  type FileObservation,
  type MediaItem,
  type ResolutionVerdict,
  type TreeEvent,
  type TreeSide,
  type TreeSnapshot,
} from '@transcode-mirror/core';
import type { ClassificationResult } from '@transcode-mirror/media';
import { createLogger, errorMessage } from '@transcode-mirror/utils';
import type { PathMapper } from '../watcher/pathMapper.js';
import { ClassificationCache } from './classificationCache.js';
import { Sequencer } from './sequencer.js';

const logger = createLogger({ module: 'reconciliation-engine' });

export const DEFAULT_CLASSIFY_CONCURRENCY = 4;

/** Anything that can classify a source file; the media package's ResolutionClassifier fits */
export interface SourceClassifier {
  classify(filePath: string): Promise<ClassificationResult>;
}

export interface ReconciliationEngineOptions {
  mapper: PathMapper;
  classifier: SourceClassifier;
  cache?: ClassificationCache;
  sequencer?: Sequencer;
  /** Classifications (ffprobe runs) allowed at once */
  classifyConcurrency?: number;
  /** A destination smaller than this does not count as encoded */
  minDestinationBytes?: number;
}

export interface ProbeFailure {
  identity: string;
  path: string;
  error: string;
}

export interface ActionFailure {
  identity: string;
  kind: ActionKind;
  error: string;
}

export interface ItemProblem {
  identity: string;
  classification: MediaItem['classification'];
  path?: string;
  error: string;
}

export class ReconciliationEngine extends EventEmitter {
  readonly cache: ClassificationCache;
  readonly sequencer: Sequencer;
  private readonly mapper: PathMapper;
  private readonly classifier: SourceClassifier;
  private readonly classifyQueue: PQueue;
  private readonly minDestinationBytes: number;
  private readonly index = new Map<string, MediaItem>();
  /** identity -> fingerprint being classified */
  private readonly classifying = new Map<string, string>();
  private idleWaiters: (() => void)[] = [];

  constructor(options: ReconciliationEngineOptions) {
    super();
    this.mapper = options.mapper;
    this.classifier = options.classifier;
    this.cache = options.cache ?? new ClassificationCache();
    this.sequencer = options.sequencer ?? new Sequencer();
    this.classifyQueue = new PQueue({ concurrency: options.classifyConcurrency ?? DEFAULT_CLASSIFY_CONCURRENCY });
    this.minDestinationBytes = options.minDestinationBytes ?? 0;
  }

  /**
   * Incremental path: one live observation
   */
  handleEvent(event: TreeEvent): void {
    const sequence = event.sequence ?? this.sequencer.next();
    this.sequencer.observe(sequence);
    const identity = this.identityOf(event.side, event.relativePath);

    if (event.type === 'added') {
      if (event.size === undefined || event.mtimeMs === undefined) {
        logger.warn({ event }, 'Added event without file stats ignored');
        return;
      }
      const item = this.getOrCreate(identity);
      this.observePresence(item, event.side, {
        relativePath: event.relativePath,
        size: event.size,
        mtimeMs: event.mtimeMs,
        sequence,
      });
      this.derive(item);
      return;
    }

    const item = this.index.get(identity);
    if (!item) return;
    this.observeAbsence(item, event.side, sequence, event.relativePath);
    this.derive(item);
  }

  /**
   * Corrective path: merge a full enumeration of both trees. Presence keeps
   * the sequence it was stat'ed with; absence is dated to the scan start, so
   * anything seen live after the scan began survives. Identities with a
   * deferred source are left exactly as they were.
   */
  applyScan(snapshot: TreeSnapshot): void {
    this.sequencer.observe(snapshot.startedAt);
    const deferred = new Set((snapshot.deferred ?? []).map(rel => this.identityOf('source', rel)));
    const seen: Record<TreeSide, Map<string, FileObservation>> = {
      source: this.groupByIdentity('source', snapshot.source),
      destination: this.groupByIdentity('destination', snapshot.destination),
    };

    for (const side of ['source', 'destination'] as const) {
      for (const [identity, observation] of seen[side]) {
        this.sequencer.observe(observation.sequence);
        if (deferred.has(identity)) continue;
        this.observePresence(this.getOrCreate(identity), side, observation);
      }
    }

    const forgotten = this.cache.forgetFailures();

    for (const item of [...this.index.values()]) {
      if (deferred.has(item.identity)) continue;

      for (const side of ['source', 'destination'] as const) {
        if (item[side] && !seen[side].has(item.identity)) {
          this.observeAbsence(item, side, snapshot.startedAt);
        }
      }

      item.blocked = undefined;
      if (item.verdict?.result === 'ProbeFailed') {
        item.verdict = undefined;
      }
      this.derive(item);
    }

    logger.info(
      {
        source: snapshot.source.length,
        destination: snapshot.destination.length,
        items: this.index.size,
        deferred: deferred.size,
        probeRetries: forgotten,
      },
      'Scan applied'
    );
  }

  /**
   * Consume an executor outcome. Outcomes for an attempt that is no longer
   * in flight are ignored.
   */
  settle(outcome: ActionOutcome): void {
    const item = this.index.get(outcome.identity);
    const record = item?.inFlight;
    if (!item || !record || record.attempt !== outcome.attempt) {
      logger.debug({ outcome }, 'Outcome for a superseded attempt ignored');
      return;
    }

    item.inFlight = undefined;

    switch (outcome.status) {
      case 'succeeded':
        item.lastError = undefined;
        if (outcome.destination) {
          this.sequencer.observe(outcome.destination.sequence);
          this.observePresence(item, 'destination', outcome.destination);
        } else if (outcome.destination === null && item.destination) {
          this.observeAbsence(item, 'destination', this.sequencer.next());
        }
        if (record.kind === 'Skip') {
          item.skippedFingerprint = record.fingerprint;
        }
        break;

      case 'failed': {
        const error = outcome.error ?? 'unknown error';
        item.blocked = record.kind;
        item.lastError = error;
        logger.warn({ identity: item.identity, kind: record.kind, error }, 'Action failed; blocked until next scan');
        this.emit('failure', { identity: item.identity, kind: record.kind, error } satisfies ActionFailure);
        break;
      }

      case 'abandoned':
        logger.debug({ identity: item.identity, kind: record.kind }, 'Action abandoned');
        break;
    }

    this.derive(item);
  }

  /**
   * Whether a record still describes what its item needs
   */
  isCurrent(record: ActionRecord): boolean {
    const item = this.index.get(record.identity);
    if (!item || item.inFlight?.attempt !== record.attempt) return false;

    const decision = this.decisionFor(item);
    if (decision.action !== record.kind) return false;
    if (record.kind === 'Delete') return true;
    return item.source !== undefined && fingerprintOf(item.source) === record.fingerprint;
  }

  /**
   * Resolves once no classification is outstanding
   */
  whenIdle(): Promise<void> {
    if (this.classifying.size === 0) return Promise.resolve();
    return new Promise(resolve => this.idleWaiters.push(resolve));
  }

  items(): MediaItem[] {
    return [...this.index.values()];
  }

  getItem(identity: string): MediaItem | undefined {
    return this.index.get(identity);
  }

  classificationCounts(): ClassificationCounts {
    return countClassifications(this.index.values());
  }

  /**
   * Items that cannot make progress without attention
   */
  problems(): ItemProblem[] {
    const problems: ItemProblem[] = [];
    for (const item of this.index.values()) {
      const error = item.classification === 'ProbeFailed'
        ? item.verdict?.detail ?? item.lastError ?? 'probe failed'
        : item.lastError;
      if (error !== undefined) {
        problems.push({
          identity: item.identity,
          classification: item.classification,
          path: item.source?.relativePath ?? item.destination?.relativePath,
          error,
        });
      }
    }
    return problems;
  }

  // Private methods

  private identityOf(side: TreeSide, relativePath: string): string {
    return side === 'source'
      ? this.mapper.identityOfSource(relativePath)
      : this.mapper.identityOfDestination(relativePath);
  }

  private groupByIdentity(side: TreeSide, observations: FileObservation[]): Map<string, FileObservation> {
    const grouped = new Map<string, FileObservation>();
    for (const observation of observations) {
      const identity = this.identityOf(side, observation.relativePath);
      const existing = grouped.get(identity);
      if (existing && existing.relativePath < observation.relativePath) {
        logger.warn(
          { identity, kept: existing.relativePath, ignored: observation.relativePath },
          'Two files map to the same identity'
        );
        continue;
      }
      grouped.set(identity, observation);
    }
    return grouped;
  }

  private getOrCreate(identity: string): MediaItem {
    let item = this.index.get(identity);
    if (!item) {
      item = {
        identity,
        classification: 'Unclassified',
        stale: false,
        attempt: 0,
        sourceRemovedAt: 0,
        destinationRemovedAt: 0,
      };
      this.index.set(identity, item);
    }
    return item;
  }

  private observePresence(item: MediaItem, side: TreeSide, observation: FileObservation): void {
    const removedAt = side === 'source' ? item.sourceRemovedAt : item.destinationRemovedAt;
    const current = item[side];
    if (observation.sequence < removedAt || (current && current.sequence > observation.sequence)) {
      return;
    }
    item[side] = observation;
  }

  private observeAbsence(item: MediaItem, side: TreeSide, sequence: number, relativePath?: string): void {
    const current = item[side];
    if (current && current.sequence > sequence) return;
    if (current && relativePath !== undefined && current.relativePath !== relativePath) return;

    item[side] = undefined;
    if (side === 'source') {
      item.sourceRemovedAt = Math.max(item.sourceRemovedAt, sequence);
    } else {
      item.destinationRemovedAt = Math.max(item.destinationRemovedAt, sequence);
    }
  }

  /**
   * Verdict for the current source content, from the item or the cache
   */
  private currentVerdict(item: MediaItem): ResolutionVerdict | undefined {
    if (!item.source) return undefined;

    const fingerprint = fingerprintOf(item.source);
    if (item.verdict?.fingerprint === fingerprint) {
      return item.verdict.result;
    }

    const cached = this.cache.get(item.identity, fingerprint);
    item.verdict = cached ? { ...cached } : undefined;
    return cached?.result;
  }

  private decisionFor(item: MediaItem): Decision {
    return decide({
      source: item.source,
      destination: item.destination,
      verdict: this.currentVerdict(item),
      minDestinationBytes: this.minDestinationBytes,
    });
  }

  private derive(item: MediaItem): void {
    const decision = this.decisionFor(item);
    item.classification = decision.classification;
    item.stale = decision.stale;

    if (decision.action === 'Remove') {
      if (!item.inFlight && !this.classifying.has(item.identity)) {
        this.index.delete(item.identity);
        this.cache.forget(item.identity);
      }
      return;
    }

    // Re-derived once the in-flight action settles
    if (item.inFlight) return;

    switch (decision.action) {
      case 'Classify':
        this.startClassification(item);
        return;
      case 'Noop':
        return;
      case 'Skip':
        if (item.source && item.skippedFingerprint === fingerprintOf(item.source)) return;
        break;
      case 'Encode':
      case 'Delete':
        break;
    }

    if (item.blocked === decision.action) return;
    this.issue(item, decision.action);
  }

  private issue(item: MediaItem, kind: 'Encode' | 'Delete' | 'Skip'): void {
    const source = item.source;
    const destinationPath = kind === 'Encode' && source
      ? item.destination?.relativePath ?? this.mapper.toDestination(source.relativePath)
      : item.destination?.relativePath;

    const record: ActionRecord = {
      identity: item.identity,
      kind,
      attempt: item.attempt + 1,
      sourcePath: source?.relativePath,
      destinationPath,
      fingerprint: source ? fingerprintOf(source) : undefined,
      issuedAt: new Date(),
    };

    item.attempt = record.attempt;
    item.inFlight = record;

    logger.info(
      { identity: item.identity, kind, attempt: record.attempt, classification: item.classification, stale: item.stale },
      'Action issued'
    );
    this.emit('action', record);
  }

  private startClassification(item: MediaItem): void {
    if (!item.source) return;

    const identity = item.identity;
    const fingerprint = fingerprintOf(item.source);
    if (this.classifying.get(identity) === fingerprint) return;

    this.classifying.set(identity, fingerprint);
    const path = this.mapper.sourceAbsolute(item.source.relativePath);

    void this.classifyQueue
      .add(async (): Promise<ClassificationResult | null> => {
        // Superseded while queued
        if (this.classifying.get(identity) !== fingerprint) return null;
        try {
          return await this.classifier.classify(path);
        } catch (error) {
          return { verdict: 'ProbeFailed', basis: 'probe', error: errorMessage(error) };
        }
      })
      .then(result => {
        if (result) {
          this.resolveClassification(identity, fingerprint, path, result);
        } else {
          this.notifyIdle();
        }
      })
      .catch((error: unknown) => {
        logger.error({ identity, error: errorMessage(error) }, 'Classification handling failed');
      });
  }

  private resolveClassification(
    identity: string,
    fingerprint: string,
    path: string,
    result: ClassificationResult
  ): void {
    if (this.classifying.get(identity) === fingerprint) {
      this.classifying.delete(identity);
    }

    const detail = result.error ?? (result.normalizedHeight !== undefined ? `${result.normalizedHeight}p` : undefined);
    this.cache.set(identity, fingerprint, result.verdict, detail);

    try {
      const item = this.index.get(identity);
      if (item) {
        const current = item.source !== undefined && fingerprintOf(item.source) === fingerprint;
        if (current) {
          logger.debug({ identity, verdict: result.verdict, basis: result.basis }, 'Source classified');
          if (result.verdict === 'ProbeFailed') {
            this.emit('probe-failed', { identity, path, error: detail ?? 'probe failed' } satisfies ProbeFailure);
          }
        }
        this.derive(item);
      }
    } finally {
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    if (this.classifying.size > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
