import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readdir, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EncodeError,
  createEncodeOptions,
  type ActionOutcome,
  type ActionRecord,
  type EncodeOptions,
} from '@transcode-mirror/core';
import type { Encoder, EncodeResult } from '@transcode-mirror/processing';
import { ClassificationCache } from '../engine/classificationCache.js';
import { Sequencer } from '../engine/sequencer.js';
import { PathMapper } from '../watcher/pathMapper.js';
import { ActionExecutor, type ActionExecutorOptions } from './actionExecutor.js';

class FakeEncoder implements Encoder {
  calls: string[] = [];
  outputSize = 4096;
  failures: Error[] = [];
  running = 0;
  maxRunning = 0;
  delayMs = 0;

  async encode(sourcePath: string, outputPath: string, _options: EncodeOptions): Promise<EncodeResult> {
    this.calls.push(sourcePath);
    this.running++;
    this.maxRunning = Math.max(this.maxRunning, this.running);
    try {
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }
      const failure = this.failures.shift();
      if (failure) {
        await writeFile(outputPath, 'partial');
        throw failure;
      }
      await writeFile(outputPath, Buffer.alloc(this.outputSize, 1));
      return { outputPath, durationSeconds: 10, elapsedMs: 5 };
    } finally {
      this.running--;
    }
  }
}

const encodeOptions = createEncodeOptions({ hwAccel: false, hwType: 'nvidia', quality: 'LOW', codec: 'hevc' });

function record(overrides: Partial<ActionRecord> & Pick<ActionRecord, 'identity' | 'kind'>): ActionRecord {
  return { attempt: 1, issuedAt: new Date(), ...overrides };
}

describe('ActionExecutor', () => {
  let root: string;
  let mapper: PathMapper;
  let encoder: FakeEncoder;
  let cache: ClassificationCache;
  let outcomes: ActionOutcome[];

  function createExecutor(overrides: Partial<ActionExecutorOptions> = {}): ActionExecutor {
    const executor = new ActionExecutor({
      mapper,
      encoder,
      encodeOptions,
      cache,
      sequencer: new Sequencer(),
      retryDelayMs: 1,
      ...overrides,
    });
    executor.on('settled', (outcome: ActionOutcome) => outcomes.push(outcome));
    return executor;
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'executor-'));
    await mkdir(join(root, 'src', 'Show'), { recursive: true });
    await mkdir(join(root, 'dst'), { recursive: true });
    await writeFile(join(root, 'src', 'Show', 'E01.mp4'), 'source video');
    mapper = new PathMapper({ sourceRoot: join(root, 'src'), destinationRoot: join(root, 'dst') });
    encoder = new FakeEncoder();
    cache = new ClassificationCache();
    outcomes = [];
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const encodeE01 = (attempt = 1) => record({
    identity: 'Show/E01',
    kind: 'Encode',
    attempt,
    sourcePath: 'Show/E01.mp4',
    destinationPath: 'Show/E01.mkv',
    fingerprint: '1:12',
  });

  it('publishes an encode under its final name', async () => {
    const executor = createExecutor();

    executor.submit(encodeE01());
    await executor.drain();

    expect(encoder.calls).toEqual([join(root, 'src', 'Show', 'E01.mp4')]);
    expect(outcomes).toEqual([
      expect.objectContaining({
        identity: 'Show/E01',
        attempt: 1,
        kind: 'Encode',
        status: 'succeeded',
        destination: expect.objectContaining({ relativePath: 'Show/E01.mkv', size: 4096 }),
      }),
    ]);
    expect(await readdir(join(root, 'dst', 'Show'))).toEqual(['E01.mkv']);
  });

  it('never publishes an undersized output', async () => {
    encoder.outputSize = 100;
    const executor = createExecutor();

    executor.submit(encodeE01());
    await executor.drain();

    expect(outcomes[0]).toMatchObject({
      status: 'failed',
      error: `Encode failed for ${join(root, 'src', 'Show', 'E01.mp4')}: output is 100 bytes, below the 1024 byte minimum`,
    });
    expect(await readdir(join(root, 'dst', 'Show'))).toEqual([]);
  });

  it('retries transient encoder failures', async () => {
    encoder.failures = [new EncodeError('/src/E01.mp4', 'device busy', true)];
    const executor = createExecutor();

    executor.submit(encodeE01());
    await executor.drain();

    expect(encoder.calls).toHaveLength(2);
    expect(outcomes[0]?.status).toBe('succeeded');
  });

  it('gives up on terminal failures and removes the partial file', async () => {
    encoder.failures = [new EncodeError('/src/E01.mp4', 'source has no audio streams')];
    const executor = createExecutor();

    executor.submit(encodeE01());
    await executor.drain();

    expect(encoder.calls).toHaveLength(1);
    expect(outcomes[0]).toMatchObject({ status: 'failed' });
    expect(existsSync(join(root, 'dst', 'Show', 'E01.mkv.tmp'))).toBe(false);
  });

  it('deletes a destination and its temporary sibling', async () => {
    await writeFile(join(root, 'dst', 'Gone.mkv'), 'old encode');
    await writeFile(join(root, 'dst', 'Gone.mkv.tmp'), 'partial');
    const executor = createExecutor();

    executor.submit(record({ identity: 'Gone', kind: 'Delete', destinationPath: 'Gone.mkv' }));
    executor.submit(record({ identity: 'Missing', kind: 'Delete', destinationPath: 'Missing.mkv' }));
    await executor.drain();

    expect(outcomes.map(o => [o.identity, o.status, o.destination])).toEqual([
      ['Gone', 'succeeded', null],
      ['Missing', 'succeeded', null],
    ]);
    expect(await readdir(join(root, 'dst'))).toEqual([]);
  });

  it('records skipped sources in the classification cache', async () => {
    const executor = createExecutor();

    executor.submit(record({ identity: 'Small', kind: 'Skip', sourcePath: 'Small.mkv', fingerprint: '5:10' }));
    await executor.drain();

    expect(cache.get('Small', '5:10')).toEqual({ result: 'AlreadyLowRes', fingerprint: '5:10', detail: undefined });
    expect(outcomes[0]?.status).toBe('succeeded');
  });

  it('abandons records that are no longer current', async () => {
    const executor = createExecutor({ isCurrent: () => false });

    executor.submit(encodeE01());
    await executor.drain();

    expect(encoder.calls).toHaveLength(0);
    expect(outcomes[0]).toMatchObject({ identity: 'Show/E01', attempt: 1, status: 'abandoned' });
  });

  it('runs actions for one identity in submission order', async () => {
    encoder.delayMs = 30;
    const executor = createExecutor({ concurrency: 4 });

    executor.submit(encodeE01(1));
    executor.submit(record({ identity: 'Show/E01', kind: 'Delete', attempt: 2, destinationPath: 'Show/E01.mkv' }));
    await executor.drain();

    expect(outcomes.map(o => [o.kind, o.status])).toEqual([['Encode', 'succeeded'], ['Delete', 'succeeded']]);
    expect(existsSync(join(root, 'dst', 'Show', 'E01.mkv'))).toBe(false);
  });

  it('bounds concurrent encodes by the pool size', async () => {
    encoder.delayMs = 30;
    for (const name of ['A', 'B', 'C']) {
      await writeFile(join(root, 'src', `${name}.mkv`), 'source video');
    }
    const executor = createExecutor({ concurrency: 2 });

    for (const name of ['A', 'B', 'C']) {
      executor.submit(record({
        identity: name,
        kind: 'Encode',
        sourcePath: `${name}.mkv`,
        destinationPath: `${name}.mkv`,
      }));
    }
    await executor.drain();

    expect(encoder.maxRunning).toBe(2);
    expect(outcomes.every(o => o.status === 'succeeded')).toBe(true);
  });

  it('abandons queued records once stopped', async () => {
    encoder.delayMs = 50;
    for (const name of ['A', 'B', 'C']) {
      await writeFile(join(root, 'src', `${name}.mkv`), 'source video');
    }
    const executor = createExecutor({ concurrency: 1 });

    for (const name of ['A', 'B', 'C']) {
      executor.submit(record({
        identity: name,
        kind: 'Encode',
        sourcePath: `${name}.mkv`,
        destinationPath: `${name}.mkv`,
      }));
    }
    await vi.waitFor(() => expect(encoder.calls).toHaveLength(1));
    executor.stop();
    await executor.drain();

    expect(encoder.calls).toEqual([join(root, 'src', 'A.mkv')]);
    expect(outcomes.map(o => [o.identity, o.status])).toEqual([
      ['A', 'succeeded'],
      ['B', 'abandoned'],
      ['C', 'abandoned'],
    ]);
    expect(await readdir(join(root, 'dst'))).toEqual(['A.mkv']);
  });

  it('removes leftover temporary files at startup', async () => {
    await mkdir(join(root, 'dst', 'Show'), { recursive: true });
    await writeFile(join(root, 'dst', 'Show', 'E01.mkv.tmp'), 'partial');
    await writeFile(join(root, 'dst', 'Show', 'E02.mkv'), 'complete');
    const executor = createExecutor();

    await expect(executor.recoverTemporaryArtifacts()).resolves.toBe(1);
    expect(await readdir(join(root, 'dst', 'Show'))).toEqual(['E02.mkv']);
  });
});
