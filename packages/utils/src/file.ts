/**
 * File Operations
 *
 * Small fs helpers where a missing file is an expected answer, not an error.
 */

import {
  mkdir,
  stat,
  lstat,
  unlink,
} from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { hasErrorCode } from './guards.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Stat a path, returning null if it doesn't exist
 */
export async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

/**
 * Like statOrNull but does not follow symlinks
 */
export async function lstatOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await lstat(filePath);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file or symlink. Returns false when it was already absent.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await unlink(filePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}
