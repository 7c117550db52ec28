import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FolderWatcher, type WatchEvent } from './folderWatcher.js';

function nextEvent(watcher: FolderWatcher, type: WatchEvent['type']): Promise<WatchEvent> {
  return new Promise(resolve => {
    const listener = (event: WatchEvent) => {
      if (event.type !== type) return;
      watcher.off('event', listener);
      resolve(event);
    };
    watcher.on('event', listener);
  });
}

describe('FolderWatcher', () => {
  let root: string;
  let watcher: FolderWatcher;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'watcher-'));
    watcher = new FolderWatcher({
      root,
      accept: rel => rel.endsWith('.mkv'),
      debounceMs: 20,
      stabilityThresholdMs: 60,
    });
    watcher.start();
  });

  afterEach(async () => {
    watcher.stop();
    await rm(root, { recursive: true, force: true });
  });

  it('reports a file once it stops changing', async () => {
    const added = nextEvent(watcher, 'added');
    await writeFile(join(root, 'Movie.mkv'), 'video bytes');

    const event = await added;

    expect(event).toMatchObject({ relativePath: 'Movie.mkv', path: join(root, 'Movie.mkv'), size: 11 });
  });

  it('reports removals', async () => {
    const added = nextEvent(watcher, 'added');
    await writeFile(join(root, 'Movie.mkv'), 'video bytes');
    await added;

    const removed = nextEvent(watcher, 'removed');
    await rm(join(root, 'Movie.mkv'));

    expect(await removed).toMatchObject({ type: 'removed', relativePath: 'Movie.mkv' });
  });

  it('ignores partial downloads, hidden files and rejected names', async () => {
    const seen: string[] = [];
    watcher.on('event', (event: WatchEvent) => seen.push(event.relativePath));
    const added = nextEvent(watcher, 'added');

    await writeFile(join(root, 'Movie.mkv.part'), 'partial');
    await writeFile(join(root, '.Hidden.mkv'), 'hidden');
    await writeFile(join(root, 'notes.txt'), 'text');
    await writeFile(join(root, 'Real.mkv'), 'video');
    await added;

    expect(seen).toEqual(['Real.mkv']);
  });

  it('refuses to start twice', () => {
    expect(() => watcher.start()).toThrow('Watcher is already running');
  });
});
