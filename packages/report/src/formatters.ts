/**
 * Report Formatters
 */

import { formatBytes } from '@transcode-mirror/utils';
import type { ComparisonReport, ReportEntry } from './comparator.js';

export const REPORT_FORMATS = ['text', 'json', 'csv'] as const;
export type ReportFormat = typeof REPORT_FORMATS[number];

export interface FormatOptions {
  /** Include the list of skipped low resolution sources */
  showSkipped?: boolean;
}

const WIDE_RULE = '='.repeat(80);
const RULE = '-'.repeat(40);

function count(value: number): string {
  return value.toLocaleString('en-US');
}

function entryLine(entry: ReportEntry): string {
  return `  [${formatBytes(entry.size).padStart(12)}] ${entry.path}${entry.stale ? ' (stale)' : ''}`;
}

function section(title: string, entries: ReportEntry[], withTotal: boolean): string[] {
  if (entries.length === 0) return [];
  const total = entries.reduce((sum, entry) => sum + entry.size, 0);
  const heading = withTotal
    ? `${title} (${entries.length} files, ${formatBytes(total)} total)`
    : `${title} (${entries.length} files)`;
  return [RULE, heading, RULE, ...entries.map(entryLine), ''];
}

export function formatText(report: ComparisonReport, options: FormatOptions = {}): string {
  const { summary, buckets } = report;
  const lines = [
    WIDE_RULE,
    'ENCODING COMPARISON REPORT',
    WIDE_RULE,
    '',
    `Source folder:      ${report.sourceFolder}`,
    `Destination folder: ${report.destinationFolder}`,
    '',
    RULE,
    'SUMMARY',
    RULE,
    `Total source files:      ${count(summary.totalSource)}`,
    `Total destination files: ${count(summary.totalDest)}`,
    `Matched (encoded):       ${count(summary.matched)}`,
    `Missing encodes:         ${count(summary.missing)}${summary.stale > 0 ? ` (${count(summary.stale)} stale)` : ''}`,
    `Orphaned encodes:        ${count(summary.orphaned)}`,
    `Skipped (low quality):   ${count(summary.skipped)}`,
    `Probe failures:          ${count(summary.failed)}`,
    '',
    ...section('MISSING ENCODES', buckets.missing, true),
    ...section('ORPHANED ENCODES', buckets.orphaned, true),
  ];

  if (buckets.failed.length > 0) {
    lines.push(RULE, `PROBE FAILURES (${buckets.failed.length} files)`, RULE);
    for (const entry of buckets.failed) {
      lines.push(`${entryLine(entry)}: ${entry.error}`);
    }
    lines.push('');
  }

  if (options.showSkipped) {
    lines.push(...section('SKIPPED - LOW QUALITY', buckets.skipped, false));
  }

  lines.push(WIDE_RULE);
  const issues: string[] = [];
  if (summary.missing > 0) issues.push(`${summary.missing} missing encodes`);
  if (summary.orphaned > 0) issues.push(`${summary.orphaned} orphaned files`);
  lines.push(issues.length === 0 ? 'STATUS: All files are in sync!' : `STATUS: Issues found - ${issues.join(', ')}`);
  lines.push(WIDE_RULE);

  return lines.join('\n');
}

export function formatJson(report: ComparisonReport, options: FormatOptions = {}): string {
  const { buckets } = report;
  const plain = (entries: ReportEntry[]) => entries.map(({ path, size, stale }) => (stale ? { path, size, stale } : { path, size }));

  return JSON.stringify(
    {
      sourceFolder: report.sourceFolder,
      destinationFolder: report.destinationFolder,
      summary: report.summary,
      buckets: {
        missing: plain(buckets.missing),
        orphaned: plain(buckets.orphaned),
        ...(options.showSkipped ? { skipped: plain(buckets.skipped) } : {}),
        failed: buckets.failed.map(({ path, size, error }) => ({ path, size, error })),
      },
    },
    null,
    2
  );
}

/**
 * RFC 4180 field quoting
 */
export function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsv(report: ComparisonReport, options: FormatOptions = {}): string {
  const { buckets } = report;
  const rows: (string | number)[][] = [['bucket', 'path', 'size_bytes', 'size_human']];
  const add = (bucket: string, entries: ReportEntry[]) => {
    for (const entry of entries) {
      rows.push([bucket, entry.path, entry.size, formatBytes(entry.size)]);
    }
  };

  add('missing', buckets.missing);
  add('orphaned', buckets.orphaned);
  add('failed', buckets.failed);
  if (options.showSkipped) {
    add('skipped', buckets.skipped);
  }

  return rows.map(row => row.map(csvField).join(',')).join('\r\n') + '\r\n';
}

export function formatReport(report: ComparisonReport, format: ReportFormat, options: FormatOptions = {}): string {
  switch (format) {
    case 'json':
      return formatJson(report, options);
    case 'csv':
      return formatCsv(report, options);
    case 'text':
      return formatText(report, options);
  }
}
