/**
 * Version Symlinks
 *
 * Media servers group `Movie.mkv` and `Movie - 720p.mkv` in one folder as two
 * versions of a title. In separate-tree mode a symlink with the version
 * suffix is placed next to each source, pointing at its encode as seen from
 * the source host.
 */

import { readlink, rename, symlink } from 'node:fs/promises';
import { FilesystemError } from '@transcode-mirror/core';
import { createLogger, lstatOrNull, removeIfExists, statOrNull } from '@transcode-mirror/utils';
import type { PathMapper } from '../watcher/pathMapper.js';
import { walkTree } from '../watcher/scanner.js';

const logger = createLogger({ module: 'version-symlinks' });

export class VersionSymlinks {
  constructor(private readonly mapper: PathMapper) {}

  get enabled(): boolean {
    return this.mapper.symlinksEnabled;
  }

  /**
   * Point the identity's version symlink at a destination file. Replaces an
   * existing symlink; a regular file in the way is left alone.
   */
  async create(identity: string, destinationRelative: string): Promise<boolean> {
    if (!this.enabled) return false;

    const linkPath = this.mapper.sourceAbsolute(this.mapper.versionSymlinkPath(identity));
    const target = this.mapper.symlinkTarget(destinationRelative);

    const existing = await lstatOrNull(linkPath);
    if (existing && !existing.isSymbolicLink()) {
      logger.warn({ linkPath }, 'Path exists but is not a symlink, skipping');
      return false;
    }

    const tempLink = `${linkPath}.tmp`;
    try {
      await removeIfExists(tempLink);
      await symlink(target, tempLink);
      await rename(tempLink, linkPath);
    } catch (error) {
      await removeIfExists(tempLink);
      throw new FilesystemError('symlink', linkPath, error);
    }

    logger.info({ linkPath, target }, 'Version symlink created');
    return true;
  }

  async remove(identity: string): Promise<boolean> {
    if (!this.enabled) return false;

    const linkPath = this.mapper.sourceAbsolute(this.mapper.versionSymlinkPath(identity));
    const existing = await lstatOrNull(linkPath);
    if (!existing?.isSymbolicLink()) return false;

    try {
      await removeIfExists(linkPath);
    } catch (error) {
      throw new FilesystemError('delete', linkPath, error);
    }
    logger.info({ linkPath }, 'Version symlink deleted');
    return true;
  }

  /**
   * Remove version symlinks whose destination file no longer exists
   */
  async cleanupOrphaned(): Promise<number> {
    if (!this.enabled) return 0;

    let removed = 0;
    await walkTree(this.mapper.sourceRoot, async ({ absolutePath, relativePath, dirent }) => {
      if (!dirent.isSymbolicLink() || !this.mapper.isVersionSymlinkName(relativePath)) return;

      const destination = this.mapper.destinationOfSymlinkTarget(await readlink(absolutePath));
      if (destination === null) {
        logger.debug({ absolutePath }, 'Symlink target outside the configured prefix');
        return;
      }

      if (!(await statOrNull(this.mapper.destinationAbsolute(destination)))) {
        await removeIfExists(absolutePath);
        removed++;
        logger.info({ absolutePath }, 'Removed orphaned version symlink');
      }
    });

    return removed;
  }
}
