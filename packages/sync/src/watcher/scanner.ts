/**
 * Tree Scanner
 *
 * Full enumeration of a tree for the corrective pass. Each observation takes
 * its sequence number when the file is stat'ed, so live events that arrive
 * later still win.
 */

import { readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import { FilesystemError, type FileObservation } from '@transcode-mirror/core';
import { createLogger, hasErrorCode, toPosixPath } from '@transcode-mirror/utils';
import type { Sequencer } from '../engine/sequencer.js';

const logger = createLogger({ module: 'tree-scanner' });

export interface TreeEntry {
  absolutePath: string;
  /** POSIX path relative to the walked root */
  relativePath: string;
  dirent: Dirent;
}

/**
 * Visit every non-directory entry below root. The root must be readable;
 * subdirectories that vanish mid-walk are skipped, any other read error
 * aborts the walk.
 */
export async function walkTree(
  root: string,
  visit: (entry: TreeEntry) => Promise<void> | void
): Promise<void> {
  const walk = async (dir: string, relativeDir: string): Promise<void> => {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir !== root && hasErrorCode(error, 'ENOENT')) {
        logger.debug({ dir }, 'Directory vanished during scan');
        return;
      }
      throw new FilesystemError('scan', dir, error);
    }

    for (const dirent of entries) {
      const absolutePath = join(dir, dirent.name);
      const relativePath = relativeDir ? `${relativeDir}/${dirent.name}` : dirent.name;

      if (dirent.isDirectory()) {
        await walk(absolutePath, relativePath);
      } else {
        await visit({ absolutePath, relativePath: toPosixPath(relativePath), dirent });
      }
    }
  };

  await walk(root, '');
}

/**
 * Observe every accepted file below root. Symlinks are followed when they
 * point at a regular file.
 */
export async function scanTree(
  root: string,
  accept: (relativePath: string) => boolean,
  sequencer: Sequencer
): Promise<FileObservation[]> {
  const observations: FileObservation[] = [];

  await walkTree(root, async ({ absolutePath, relativePath, dirent }) => {
    if (!accept(relativePath)) return;
    if (!dirent.isFile() && !dirent.isSymbolicLink()) return;

    try {
      const stats = await stat(absolutePath);
      if (!stats.isFile()) return;
      observations.push({
        relativePath,
        size: stats.size,
        mtimeMs: stats.mtimeMs,
        sequence: sequencer.next(),
      });
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return; // removed or dangling
      }
      throw new FilesystemError('stat', absolutePath, error);
    }
  });

  logger.debug({ root, files: observations.length }, 'Tree scanned');
  return observations;
}
