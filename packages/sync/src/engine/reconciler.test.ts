import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ActionRecord, FileObservation, ResolutionVerdict } from '@transcode-mirror/core';
import type { ClassificationResult } from '@transcode-mirror/media';
import { PathMapper } from '../watcher/pathMapper.js';
import { ReconciliationEngine, type ActionFailure, type ProbeFailure } from './reconciler.js';

const mapper = new PathMapper({ sourceRoot: '/media/src', destinationRoot: '/media/dst' });

function obs(relativePath: string, mtimeMs: number, sequence: number, size = 1000): FileObservation {
  return { relativePath, mtimeMs, sequence, size };
}

function fakeClassifier(verdicts: Record<string, ResolutionVerdict> = {}) {
  return {
    classify: vi.fn(async (path: string): Promise<ClassificationResult> => {
      const name = path.split('/').pop() ?? path;
      const verdict = verdicts[name] ?? 'NeedsEncode';
      return verdict === 'ProbeFailed'
        ? { verdict, basis: 'probe', error: 'moov atom not found' }
        : { verdict, basis: 'probe' };
    }),
  };
}

describe('ReconciliationEngine', () => {
  let records: ActionRecord[];

  function createEngine(verdicts: Record<string, ResolutionVerdict> = {}) {
    const classifier = fakeClassifier(verdicts);
    const engine = new ReconciliationEngine({ mapper, classifier });
    engine.on('action', (record: ActionRecord) => records.push(record));
    return { engine, classifier };
  }

  beforeEach(() => {
    records = [];
  });

  it('deletes a destination without a source', () => {
    const { engine } = createEngine();

    engine.applyScan({ startedAt: 1, source: [], destination: [obs('a.mkv', 1000, 2)] });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ identity: 'a', kind: 'Delete', attempt: 1, destinationPath: 'a.mkv' });
    expect(engine.classificationCounts().Orphaned).toBe(1);
  });

  it('re-encodes a destination older than its source without probing', () => {
    const { engine, classifier } = createEngine();

    engine.applyScan({
      startedAt: 1,
      source: [obs('a.mkv', 2000, 2)],
      destination: [obs('a.mkv', 1000, 3)],
    });

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ kind: 'Encode', sourcePath: 'a.mkv', destinationPath: 'a.mkv' });
    expect(engine.getItem('a')).toMatchObject({ classification: 'Encoded', stale: true });
    expect(classifier.classify).not.toHaveBeenCalled();
  });

  it('classifies new sources before encoding them', async () => {
    const { engine, classifier } = createEngine();

    engine.applyScan({ startedAt: 1, source: [obs('Show/E01.mp4', 1000, 2, 5000)], destination: [] });
    expect(records).toHaveLength(0);
    expect(engine.getItem('Show/E01')?.classification).toBe('Unclassified');

    await engine.whenIdle();

    expect(classifier.classify).toHaveBeenCalledWith('/media/src/Show/E01.mp4');
    expect(records).toEqual([
      expect.objectContaining({
        identity: 'Show/E01',
        kind: 'Encode',
        attempt: 1,
        sourcePath: 'Show/E01.mp4',
        destinationPath: 'Show/E01.mkv',
        fingerprint: '1000:5000',
      }),
    ]);
  });

  it('only ever skips a low resolution source', async () => {
    const { engine, classifier } = createEngine({ 'Small.mkv': 'AlreadyLowRes' });

    engine.applyScan({ startedAt: 1, source: [obs('Small.mkv', 1000, 2)], destination: [] });
    await engine.whenIdle();
    expect(records.map(r => r.kind)).toEqual(['Skip']);

    const skip = records[0];
    if (!skip) throw new Error('no record');
    engine.settle({ identity: skip.identity, attempt: skip.attempt, kind: 'Skip', status: 'succeeded' });

    for (let scan = 0; scan < 3; scan++) {
      engine.applyScan({ startedAt: 10 + scan * 2, source: [obs('Small.mkv', 1000, 11 + scan * 2)], destination: [] });
      await engine.whenIdle();
    }

    expect(records.map(r => r.kind)).toEqual(['Skip']);
    expect(classifier.classify).toHaveBeenCalledTimes(1);
    expect(engine.getItem('Small')?.classification).toBe('AlreadyLowRes');
  });

  it('reports probe failures and retries them on the next scan only', async () => {
    const { engine, classifier } = createEngine({ 'Broken.mkv': 'ProbeFailed' });
    const failures: ProbeFailure[] = [];
    engine.on('probe-failed', (failure: ProbeFailure) => failures.push(failure));

    engine.applyScan({ startedAt: 1, source: [obs('Broken.mkv', 1000, 2)], destination: [] });
    await engine.whenIdle();

    expect(records).toHaveLength(0);
    expect(failures).toEqual([{ identity: 'Broken', path: '/media/src/Broken.mkv', error: 'moov atom not found' }]);
    expect(engine.problems()).toEqual([
      { identity: 'Broken', classification: 'ProbeFailed', path: 'Broken.mkv', error: 'moov atom not found' },
    ]);

    engine.handleEvent({ type: 'added', side: 'source', relativePath: 'Broken.mkv', size: 1000, mtimeMs: 1000 });
    await engine.whenIdle();
    expect(classifier.classify).toHaveBeenCalledTimes(1);

    engine.applyScan({ startedAt: 5, source: [obs('Broken.mkv', 1000, 6)], destination: [] });
    await engine.whenIdle();
    expect(classifier.classify).toHaveBeenCalledTimes(2);
    expect(records).toHaveLength(0);
  });

  it('holds one record per identity until it settles', async () => {
    const { engine, classifier } = createEngine();

    engine.handleEvent({ type: 'added', side: 'source', relativePath: 'Movie.mkv', size: 5000, mtimeMs: 1000, sequence: 1 });
    await engine.whenIdle();
    const first = records[0];
    if (!first) throw new Error('no record');

    engine.handleEvent({ type: 'added', side: 'source', relativePath: 'Movie.mkv', size: 5000, mtimeMs: 2000, sequence: 2 });
    await engine.whenIdle();

    expect(records).toHaveLength(1);
    expect(engine.isCurrent(first)).toBe(false);

    engine.settle({ identity: 'Movie', attempt: 1, kind: 'Encode', status: 'abandoned' });
    await engine.whenIdle();

    expect(records).toHaveLength(2);
    expect(records[1]).toMatchObject({ kind: 'Encode', attempt: 2, fingerprint: '2000:5000' });
    expect(classifier.classify).toHaveBeenCalledTimes(2);
  });

  it('ignores outcomes for superseded attempts', async () => {
    const { engine } = createEngine();

    engine.handleEvent({ type: 'added', side: 'source', relativePath: 'Movie.mkv', size: 5000, mtimeMs: 1000 });
    await engine.whenIdle();

    engine.settle({ identity: 'Movie', attempt: 7, kind: 'Encode', status: 'failed', error: 'late' });

    expect(engine.getItem('Movie')?.inFlight?.attempt).toBe(1);
    expect(engine.getItem('Movie')?.lastError).toBeUndefined();
  });

  it('deletes the output of an encode whose source vanished mid-flight', async () => {
    const { engine } = createEngine();

    engine.handleEvent({ type: 'added', side: 'source', relativePath: 'Movie.mkv', size: 5000, mtimeMs: 1000, sequence: 1 });
    await engine.whenIdle();
    engine.handleEvent({ type: 'removed', side: 'source', relativePath: 'Movie.mkv', sequence: 5 });

    expect(engine.getItem('Movie')).toBeDefined();

    engine.settle({
      identity: 'Movie',
      attempt: 1,
      kind: 'Encode',
      status: 'succeeded',
      destination: obs('Movie.mkv', 9000, 6),
    });

    expect(records.map(r => [r.kind, r.attempt])).toEqual([['Encode', 1], ['Delete', 2]]);
    expect(records[1]?.destinationPath).toBe('Movie.mkv');

    engine.settle({ identity: 'Movie', attempt: 2, kind: 'Delete', status: 'succeeded', destination: null });

    expect(engine.items()).toHaveLength(0);
  });

  it('keeps live observations newer than the scan start', () => {
    const { engine } = createEngine();

    engine.handleEvent({ type: 'added', side: 'source', relativePath: 'Live.mkv', size: 1000, mtimeMs: 1000, sequence: 10 });
    engine.handleEvent({ type: 'added', side: 'destination', relativePath: 'Live.mkv', size: 500, mtimeMs: 2000, sequence: 11 });
    engine.applyScan({ startedAt: 5, source: [], destination: [] });

    expect(engine.getItem('Live')?.classification).toBe('Encoded');
    expect(records).toHaveLength(0);
  });

  it('keeps live removals newer than scan observations', () => {
    const { engine } = createEngine();

    engine.applyScan({ startedAt: 1, source: [obs('Old.mkv', 1000, 2)], destination: [obs('Old.mkv', 2000, 3)] });
    engine.handleEvent({ type: 'removed', side: 'source', relativePath: 'Old.mkv', sequence: 8 });
    engine.applyScan({ startedAt: 5, source: [obs('Old.mkv', 1000, 6)], destination: [obs('Old.mkv', 2000, 7)] });

    expect(engine.getItem('Old')?.source).toBeUndefined();
    expect(records.map(r => r.kind)).toEqual(['Delete']);
  });

  it('blocks a failed action until the next scan', async () => {
    const { engine } = createEngine();
    const failures: ActionFailure[] = [];
    engine.on('failure', (failure: ActionFailure) => failures.push(failure));

    engine.applyScan({ startedAt: 1, source: [obs('Movie.mkv', 1000, 2)], destination: [] });
    await engine.whenIdle();
    engine.settle({ identity: 'Movie', attempt: 1, kind: 'Encode', status: 'failed', error: 'ffmpeg exited with 1' });

    expect(records).toHaveLength(1);
    expect(failures).toEqual([{ identity: 'Movie', kind: 'Encode', error: 'ffmpeg exited with 1' }]);
    expect(engine.getItem('Movie')).toMatchObject({ blocked: 'Encode', lastError: 'ffmpeg exited with 1' });

    engine.applyScan({ startedAt: 3, source: [obs('Movie.mkv', 1000, 4)], destination: [] });

    expect(records.map(r => [r.kind, r.attempt])).toEqual([['Encode', 1], ['Encode', 2]]);
  });

  it('puts every identity in exactly one bucket', async () => {
    const { engine } = createEngine({ 'Small.mkv': 'AlreadyLowRes', 'Broken.mkv': 'ProbeFailed' });

    engine.applyScan({
      startedAt: 1,
      source: [
        obs('Big.mkv', 1000, 2),
        obs('Small.mkv', 1000, 3),
        obs('Broken.mkv', 1000, 4),
        obs('Done.mkv', 1000, 5),
      ],
      destination: [obs('Done.mkv', 2000, 6), obs('Gone.mkv', 2000, 7)],
    });
    await engine.whenIdle();

    expect(engine.classificationCounts()).toEqual({
      Unclassified: 0,
      NeedsEncode: 1,
      AlreadyLowRes: 1,
      Encoded: 1,
      Orphaned: 1,
      ProbeFailed: 1,
    });
  });

  it('bounds concurrent classifications', async () => {
    let active = 0;
    let peak = 0;
    const classifier = {
      classify: vi.fn(async (): Promise<ClassificationResult> => {
        active++;
        peak = Math.max(peak, active);
        await new Promise(resolve => setTimeout(resolve, 5));
        active--;
        return { verdict: 'NeedsEncode', basis: 'probe' };
      }),
    };
    const engine = new ReconciliationEngine({ mapper, classifier, classifyConcurrency: 3 });
    engine.on('action', (record: ActionRecord) => records.push(record));

    const sources = Array.from({ length: 20 }, (_, i) => obs(`Movie${i}.mkv`, 1000, i + 2));
    engine.applyScan({ startedAt: 1, source: sources, destination: [] });
    await engine.whenIdle();

    expect(peak).toBe(3);
    expect(classifier.classify).toHaveBeenCalledTimes(20);
    expect(records).toHaveLength(20);
    expect(engine.classificationCounts().NeedsEncode).toBe(20);
  });

  it('replaces a destination below the minimum size', async () => {
    const classifier = fakeClassifier({ 'Small.mkv': 'AlreadyLowRes' });
    const engine = new ReconciliationEngine({ mapper, classifier, minDestinationBytes: 1024 });
    engine.on('action', (record: ActionRecord) => records.push(record));

    engine.applyScan({
      startedAt: 1,
      source: [obs('Movie.mkv', 1000, 2, 5000), obs('Small.mkv', 1000, 3, 5000)],
      destination: [obs('Movie.mkv', 2000, 4, 0), obs('Small.mkv', 2000, 5, 10)],
    });
    await engine.whenIdle();

    expect(records.map(r => [r.identity, r.kind, r.destinationPath])).toEqual([
      ['Movie', 'Encode', 'Movie.mkv'],
      ['Small', 'Delete', 'Small.mkv'],
    ]);
    expect(engine.getItem('Movie')?.classification).toBe('NeedsEncode');
    expect(engine.getItem('Small')?.classification).toBe('AlreadyLowRes');
  });

  it('leaves identities with a deferred source as they were', () => {
    const { engine } = createEngine();

    engine.applyScan({ startedAt: 1, source: [obs('Movie.mkv', 1000, 2)], destination: [obs('Movie.mkv', 2000, 3)] });
    engine.applyScan({
      startedAt: 5,
      source: [],
      destination: [obs('Movie.mkv', 2000, 6), obs('New.mkv', 2000, 7)],
      deferred: ['Movie.mkv', 'New.mp4'],
    });

    expect(engine.getItem('Movie')).toMatchObject({ classification: 'Encoded', source: { relativePath: 'Movie.mkv' } });
    expect(engine.getItem('New')).toBeUndefined();
    expect(records).toHaveLength(0);
  });
});
