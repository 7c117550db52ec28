/**
 * Comparator
 *
 * One-shot reconciliation of the two trees without side effects. The
 * buckets come from the same engine and decision table the monitor runs, so
 * a report always agrees with what the monitor would do.
 */

import { countClassifications, type MediaItem } from '@transcode-mirror/core';
import {
  ReconciliationEngine,
  Sequencer,
  takeSnapshot,
  type PathMapper,
  type SourceClassifier,
} from '@transcode-mirror/sync';
import { createLogger } from '@transcode-mirror/utils';

const logger = createLogger({ module: 'comparator' });

export interface ReportEntry {
  path: string;
  size: number;
  /** Set on missing entries whose existing encode is older than the source */
  stale?: boolean;
}

export interface FailedEntry extends ReportEntry {
  error: string;
}

export interface ReportSummary {
  totalSource: number;
  totalDest: number;
  matched: number;
  missing: number;
  orphaned: number;
  skipped: number;
  failed: number;
  stale: number;
  missingBytes: number;
  orphanedBytes: number;
  skippedBytes: number;
}

export interface ReportBuckets {
  missing: ReportEntry[];
  orphaned: ReportEntry[];
  skipped: ReportEntry[];
  failed: FailedEntry[];
  matched: ReportEntry[];
}

export interface ComparisonReport {
  sourceFolder: string;
  destinationFolder: string;
  summary: ReportSummary;
  buckets: ReportBuckets;
}

export interface CompareOptions {
  mapper: PathMapper;
  classifier: SourceClassifier;
  /** Destinations smaller than this count as missing */
  minDestinationBytes?: number;
}

/**
 * Scan both trees and classify every item
 */
export async function compareTrees(options: CompareOptions): Promise<ComparisonReport> {
  const { mapper, classifier, minDestinationBytes } = options;
  const sequencer = new Sequencer();
  const engine = new ReconciliationEngine({ mapper, classifier, sequencer, minDestinationBytes });

  const snapshot = await takeSnapshot(mapper, sequencer);
  engine.applyScan(snapshot);
  await engine.whenIdle();

  const report = buildReport(engine.items(), {
    sourceFolder: mapper.sourceRoot,
    destinationFolder: mapper.destinationRoot,
  });
  logger.info({ summary: report.summary }, 'Comparison finished');
  return report;
}

function bySizeThenPath(a: ReportEntry, b: ReportEntry): number {
  if (a.size !== b.size) return b.size - a.size;
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

function totalBytes(entries: ReportEntry[]): number {
  return entries.reduce((sum, entry) => sum + entry.size, 0);
}

/**
 * Group engine items into report buckets
 */
export function buildReport(
  items: Iterable<MediaItem>,
  folders: { sourceFolder: string; destinationFolder: string }
): ComparisonReport {
  const all = [...items];
  const buckets: ReportBuckets = { missing: [], orphaned: [], skipped: [], failed: [], matched: [] };

  for (const item of all) {
    const { source, destination } = item;
    switch (item.classification) {
      case 'NeedsEncode':
        if (source) buckets.missing.push({ path: source.relativePath, size: source.size });
        break;
      case 'Encoded':
        if (source && item.stale) {
          buckets.missing.push({ path: source.relativePath, size: source.size, stale: true });
        } else if (source) {
          buckets.matched.push({ path: source.relativePath, size: source.size });
        }
        break;
      case 'Orphaned':
        if (destination) buckets.orphaned.push({ path: destination.relativePath, size: destination.size });
        break;
      case 'AlreadyLowRes':
        if (source) buckets.skipped.push({ path: source.relativePath, size: source.size });
        break;
      case 'ProbeFailed':
        if (source) {
          buckets.failed.push({
            path: source.relativePath,
            size: source.size,
            error: item.verdict?.detail ?? item.lastError ?? 'probe failed',
          });
        }
        break;
      case 'Unclassified':
        logger.warn({ identity: item.identity }, 'Item left unclassified');
        break;
    }
  }

  for (const entries of Object.values(buckets)) {
    entries.sort(bySizeThenPath);
  }

  const counts = countClassifications(all);
  const stale = all.filter(item => item.classification === 'Encoded' && item.stale).length;

  return {
    ...folders,
    summary: {
      totalSource: all.filter(item => item.source).length,
      totalDest: all.filter(item => item.destination).length,
      matched: counts.Encoded - stale,
      missing: counts.NeedsEncode + stale,
      orphaned: counts.Orphaned,
      skipped: counts.AlreadyLowRes,
      failed: counts.ProbeFailed,
      stale,
      missingBytes: totalBytes(buckets.missing),
      orphanedBytes: totalBytes(buckets.orphaned),
      skippedBytes: totalBytes(buckets.skipped),
    },
    buckets,
  };
}

/**
 * 1 when the trees are out of sync (missing or orphaned encodes), else 0
 */
export function reportExitCode(report: ComparisonReport): number {
  return report.summary.missing > 0 || report.summary.orphaned > 0 ? 1 : 0;
}
