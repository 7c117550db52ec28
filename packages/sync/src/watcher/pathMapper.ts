/**
 * Path Mapper
 *
 * Maps relative paths between the source tree and the destination tree.
 * Every media item is keyed by an identity: its POSIX relative path without
 * extension. Both directions are pure functions of the configured roots.
 *
 * Two layouts are supported:
 * - separate trees: `Show/S01E01.mp4` -> `Show/S01E01.mkv`
 * - one shared tree (same-folder mode): `Movie - 1080p.mkv` ->
 *   `Movie - 720p.mkv`, the quality suffix replaced by the version suffix
 *
 * In separate-tree mode a version symlink (`Movie - 720p.mkv`) can be placed
 * next to the source, pointing at the encode as seen from the source host.
 */

import { join, posix, resolve } from 'node:path';
import { ConfigurationError } from '@transcode-mirror/core';
import { getExtension, stripExtension, toPosixPath } from '@transcode-mirror/utils';

export const VIDEO_EXTENSIONS: readonly string[] = ['mp4', 'mkv', 'avi', 'mov', 'wmv', 'flv', 'mpeg', 'mpg', 'webm'];

export const OUTPUT_EXTENSION = 'mkv';
export const TEMP_SUFFIX = '.tmp';

/** Trailing quality labels replaced by the version suffix in same-folder mode */
export const QUALITY_SUFFIXES: readonly string[] = [
  ' - 4K', ' - 2160p', ' - 1080p', ' - 720p', ' - 480p', ' - SD', ' - HDR', ' - REMUX', ' - Remux',
];

export const DEFAULT_IGNORE_PATTERNS: readonly RegExp[] = [
  /^\._/,
  /\.tmp$/,
  /\.part$/,
  /\.!qB$/,
  /^\.DS_Store$/,
  /^Thumbs\.db$/,
];

export const DEFAULT_VERSION_SUFFIX = ' - 720p';

/**
 * Compile a comma-separated list of case-insensitive file name patterns
 */
export function parseIgnorePatterns(value: string): RegExp[] {
  const invalid: string[] = [];
  const patterns: RegExp[] = [];

  for (const source of value.split(',').map(part => part.trim()).filter(Boolean)) {
    try {
      patterns.push(new RegExp(source, 'i'));
    } catch {
      invalid.push(`invalid ignore pattern ${JSON.stringify(source)}`);
    }
  }

  if (invalid.length > 0) {
    throw new ConfigurationError(invalid);
  }
  return patterns;
}

export interface PathMapperConfig {
  sourceRoot: string;
  destinationRoot: string;
  /** Appended to output and symlink names; required in same-folder mode */
  versionSuffix?: string;
  /** Symlink target prefix as seen from the source host; empty disables symlinks */
  symlinkTargetPrefix?: string;
  /** Matched against file names, in addition to the defaults */
  ignorePatterns?: RegExp[];
}

export class PathMapper {
  readonly sourceRoot: string;
  readonly destinationRoot: string;
  readonly versionSuffix: string;
  readonly symlinkTargetPrefix: string;
  readonly sameFolder: boolean;
  private readonly ignorePatterns: RegExp[];

  constructor(config: PathMapperConfig) {
    this.sourceRoot = resolve(config.sourceRoot);
    this.destinationRoot = resolve(config.destinationRoot);
    this.versionSuffix = config.versionSuffix ?? DEFAULT_VERSION_SUFFIX;
    this.symlinkTargetPrefix = config.symlinkTargetPrefix ?? '';
    this.ignorePatterns = [...DEFAULT_IGNORE_PATTERNS, ...(config.ignorePatterns ?? [])];
    this.sameFolder = normalizePath(this.sourceRoot) === normalizePath(this.destinationRoot);

    if (this.sameFolder && !this.versionSuffix.trim()) {
      throw new ConfigurationError([
        'SYMLINK_VERSION_SUFFIX must not be empty when source and destination are the same folder',
      ]);
    }
  }

  /**
   * Destination path an encode of this source is written to
   */
  toDestination(sourceRelative: string): string {
    const rel = toPosixPath(sourceRelative);
    const dir = posix.dirname(rel);
    const stem = posix.basename(stripExtension(rel));
    const name = this.sameFolder ? this.versionName(stem) : stem;
    return dir === '.' ? `${name}.${OUTPUT_EXTENSION}` : `${dir}/${name}.${OUTPUT_EXTENSION}`;
  }

  /**
   * Source side of a destination path, as an extension-less identity path.
   * The source's own extension is not recoverable from the destination.
   */
  toSource(destinationRelative: string): string {
    return this.identityOfDestination(destinationRelative);
  }

  identityOfSource(sourceRelative: string): string {
    const path = stripExtension(toPosixPath(sourceRelative));
    if (!this.sameFolder) return path;

    const suffix = [this.versionSuffix, ...QUALITY_SUFFIXES].find(s => path.endsWith(s));
    return suffix ? path.slice(0, -suffix.length) : path;
  }

  identityOfDestination(destinationRelative: string): string {
    const path = stripExtension(toPosixPath(destinationRelative));
    if (this.sameFolder && path.endsWith(this.versionSuffix)) {
      return path.slice(0, -this.versionSuffix.length);
    }
    return path;
  }

  /**
   * Video file that should have an encoded counterpart
   */
  isCandidateSource(relativePath: string): boolean {
    if (!VIDEO_EXTENSIONS.includes(getExtension(relativePath))) return false;
    if (this.isIgnored(relativePath)) return false;
    return !this.isVersionName(relativePath);
  }

  /**
   * Finished output of this tool
   */
  isCandidateDestination(relativePath: string): boolean {
    if (getExtension(relativePath) !== OUTPUT_EXTENSION) return false;
    if (this.isIgnored(relativePath)) return false;
    return !this.sameFolder || this.isVersionName(relativePath);
  }

  /**
   * Output of an encode that has not been published yet
   */
  isTemporary(relativePath: string): boolean {
    return relativePath.endsWith(`.${OUTPUT_EXTENSION}${TEMP_SUFFIX}`);
  }

  isIgnored(relativePath: string): boolean {
    const name = posix.basename(toPosixPath(relativePath));
    return this.ignorePatterns.some(pattern => pattern.test(name));
  }

  /**
   * Whether version symlinks are written next to sources
   */
  get symlinksEnabled(): boolean {
    return this.symlinkTargetPrefix !== '' && this.versionSuffix !== '' && !this.sameFolder;
  }

  /**
   * Source-relative path of the version symlink for an identity
   */
  versionSymlinkPath(identity: string): string {
    return `${identity}${this.versionSuffix}.${OUTPUT_EXTENSION}`;
  }

  /**
   * Symlink target for a destination file, as seen from the source host
   */
  symlinkTarget(destinationRelative: string): string {
    return posix.join(toPosixPath(this.symlinkTargetPrefix), toPosixPath(destinationRelative));
  }

  /**
   * Destination-relative path a symlink target points at, or null when the
   * target lies outside the prefix
   */
  destinationOfSymlinkTarget(target: string): string | null {
    const normalized = normalizePath(target);
    const prefix = normalizePath(this.symlinkTargetPrefix);
    if (!pathStartsWith(normalized, prefix) || normalized === prefix) return null;
    return normalized.slice(prefix.length).replace(/^\//, '');
  }

  isVersionSymlinkName(relativePath: string): boolean {
    return this.versionSuffix !== '' &&
      posix.basename(toPosixPath(relativePath)).endsWith(`${this.versionSuffix}.${OUTPUT_EXTENSION}`);
  }

  sourceAbsolute(relativePath: string): string {
    return join(this.sourceRoot, relativePath);
  }

  destinationAbsolute(relativePath: string): string {
    return join(this.destinationRoot, relativePath);
  }

  private versionName(stem: string): string {
    const quality = QUALITY_SUFFIXES.find(s => stem.endsWith(s));
    return quality ? stem.slice(0, -quality.length) + this.versionSuffix : stem + this.versionSuffix;
  }

  /**
   * Names ending in the version suffix were written by this tool
   */
  private isVersionName(relativePath: string): boolean {
    const marker = this.versionSuffix.trim();
    if (!marker) return false;
    return posix.basename(stripExtension(toPosixPath(relativePath))).endsWith(marker);
  }
}

function normalizePath(path: string): string {
  let normalized = path.replace(/\\/g, '/');
  if (normalized.endsWith('/') && normalized.length > 1) {
    normalized = normalized.slice(0, -1);
  }
  return normalized;
}

function pathStartsWith(path: string, prefix: string): boolean {
  return path === prefix || path.startsWith(prefix === '/' ? prefix : `${prefix}/`);
}
