import { describe, it, expect } from 'vitest';
import type { ComparisonReport } from './comparator.js';
import { csvField, formatCsv, formatJson, formatReport, formatText } from './formatters.js';

function sampleReport(): ComparisonReport {
  return {
    sourceFolder: '/media/src',
    destinationFolder: '/media/dst',
    summary: {
      totalSource: 4,
      totalDest: 2,
      matched: 0,
      missing: 1,
      orphaned: 1,
      skipped: 1,
      failed: 1,
      stale: 0,
      missingBytes: 1536,
      orphanedBytes: 10,
      skippedBytes: 2048,
    },
    buckets: {
      missing: [{ path: 'Show, The/E01.mp4', size: 1536 }],
      orphaned: [{ path: 'Say "Hi".mkv', size: 10 }],
      skipped: [{ path: 'Small.mkv', size: 2048 }],
      failed: [{ path: 'Broken.mkv', size: 0, error: 'moov atom not found' }],
      matched: [],
    },
  };
}

describe('csvField', () => {
  it('quotes only when needed', () => {
    expect(csvField('plain')).toBe('plain');
    expect(csvField(42)).toBe('42');
    expect(csvField('a,b')).toBe('"a,b"');
    expect(csvField('say "hi"')).toBe('"say ""hi"""');
    expect(csvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('formatCsv', () => {
  it('writes one row per entry', () => {
    expect(formatCsv(sampleReport(), { showSkipped: true })).toBe(
      'bucket,path,size_bytes,size_human\r\n' +
      'missing,"Show, The/E01.mp4",1536,1.5 KiB\r\n' +
      'orphaned,"Say ""Hi"".mkv",10,10.0 B\r\n' +
      'failed,Broken.mkv,0,0.0 B\r\n' +
      'skipped,Small.mkv,2048,2.0 KiB\r\n'
    );
  });

  it('leaves skipped rows out by default', () => {
    expect(formatCsv(sampleReport())).not.toContain('skipped,');
  });
});

describe('formatJson', () => {
  it('always carries the skipped count but lists skipped files on request', () => {
    const plain = JSON.parse(formatJson(sampleReport()));
    expect(plain.summary.skipped).toBe(1);
    expect(plain.buckets.skipped).toBeUndefined();

    const verbose = JSON.parse(formatJson(sampleReport(), { showSkipped: true }));
    expect(verbose.buckets.skipped).toEqual([{ path: 'Small.mkv', size: 2048 }]);
    expect(verbose.buckets.failed).toEqual([{ path: 'Broken.mkv', size: 0, error: 'moov atom not found' }]);
    expect(verbose.sourceFolder).toBe('/media/src');
  });
});

describe('formatText', () => {
  it('lists each bucket with sizes', () => {
    const lines = formatText(sampleReport()).split('\n');

    expect(lines).toContain('Missing encodes:         1');
    expect(lines).toContain('MISSING ENCODES (1 files, 1.5 KiB total)');
    expect(lines).toContain('  [     1.5 KiB] Show, The/E01.mp4');
    expect(lines).toContain('  [       0.0 B] Broken.mkv: moov atom not found');
    expect(lines).not.toContain('SKIPPED - LOW QUALITY (1 files)');
    expect(lines.at(-2)).toBe('STATUS: Issues found - 1 missing encodes, 1 orphaned files');
  });

  it('marks stale re-encodes and reports a clean tree', () => {
    const report = sampleReport();
    report.summary = { ...report.summary, missing: 0, orphaned: 0 };
    report.buckets.missing = [];
    report.buckets.orphaned = [];

    const lines = formatText(report, { showSkipped: true }).split('\n');

    expect(lines).toContain('SKIPPED - LOW QUALITY (1 files)');
    expect(lines.at(-2)).toBe('STATUS: All files are in sync!');

    const stale = sampleReport();
    stale.summary.stale = 1;
    stale.buckets.missing = [{ path: 'Movie.mkv', size: 512, stale: true }];
    expect(formatText(stale).split('\n')).toContain('  [     512.0 B] Movie.mkv (stale)');
  });

  it('is selected by name', () => {
    expect(formatReport(sampleReport(), 'csv')).toBe(formatCsv(sampleReport()));
  });
});
