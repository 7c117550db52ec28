/**
 * Filename Quality Markers
 *
 * Release names often state their resolution. When they do, the probe can be
 * skipped. A high-quality marker wins over a low-quality one
 * ("Movie.1080p.HDTV" still needs encoding).
 */

import { basename } from 'node:path';

export const LOW_QUALITY_MARKERS: readonly string[] = ['720p', '480p', '360p', 'sd', 'dvdrip', 'hdtv', 'webrip'];
export const HIGH_QUALITY_MARKERS: readonly string[] = ['1080p', '2160p', '4k', 'uhd', 'bluray', 'bdremux', 'remux'];

export type FilenameHint = 'high' | 'low' | null;

function tokenize(filename: string): Set<string> {
  return new Set(
    filename
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter(Boolean)
  );
}

/**
 * Read the quality a file name advertises, if any
 */
export function qualityHintFromName(filePath: string): FilenameHint {
  const tokens = tokenize(basename(filePath));

  if (HIGH_QUALITY_MARKERS.some(marker => tokens.has(marker))) {
    return 'high';
  }
  if (LOW_QUALITY_MARKERS.some(marker => tokens.has(marker))) {
    return 'low';
  }
  return null;
}
