/**
 * Resolution Classifier
 *
 * Decides whether a source file needs a downscaled encode. Calls the probe at
 * most once per classification and caches nothing; callers own caching.
 */

import { createLogger, errorMessage } from '@transcode-mirror/utils';
import { qualityHintFromName } from './qualityMarkers.js';
import type { ClassificationResult, MediaProbe, VideoDimensions } from './types.js';

const logger = createLogger({ module: 'resolution-classifier' });

export const LOW_RES_MAX_HEIGHT = 720;

export interface ResolutionClassifierOptions {
  probe: MediaProbe;
  maxHeight?: number;
  useFilenameHints?: boolean;
}

/**
 * Height of the 16:9 frame this video would fill. Portrait video is turned
 * on its side first, and letterboxed video counts by its width.
 */
export function normalizedHeight({ width, height }: VideoDimensions): number {
  const longSide = Math.max(width, height);
  const shortSide = Math.min(width, height);
  return Math.max(shortSide, Math.round((longSide * 9) / 16));
}

export class ResolutionClassifier {
  private readonly probe: MediaProbe;
  private readonly maxHeight: number;
  private readonly useFilenameHints: boolean;

  constructor(options: ResolutionClassifierOptions) {
    this.probe = options.probe;
    this.maxHeight = options.maxHeight ?? LOW_RES_MAX_HEIGHT;
    this.useFilenameHints = options.useFilenameHints ?? true;
  }

  async classify(filePath: string): Promise<ClassificationResult> {
    if (this.useFilenameHints) {
      const hint = qualityHintFromName(filePath);
      if (hint === 'high') {
        return { verdict: 'NeedsEncode', basis: 'filename' };
      }
      if (hint === 'low') {
        logger.debug({ filePath }, 'Low resolution marker in file name');
        return { verdict: 'AlreadyLowRes', basis: 'filename' };
      }
    }

    let dimensions: VideoDimensions;
    try {
      dimensions = await this.probe.probeDimensions(filePath);
    } catch (error) {
      logger.warn({ filePath, error: errorMessage(error) }, 'Resolution probe failed');
      return { verdict: 'ProbeFailed', basis: 'probe', error: errorMessage(error) };
    }

    const height = normalizedHeight(dimensions);
    const verdict = height <= this.maxHeight ? 'AlreadyLowRes' : 'NeedsEncode';
    logger.debug({ filePath, ...dimensions, normalizedHeight: height, verdict }, 'Resolution probed');

    return {
      verdict,
      basis: 'probe',
      dimensions,
      normalizedHeight: height,
    };
  }
}

/**
 * Classifier for scans that must not spawn ffprobe: only a low resolution
 * marker in the file name skips a source.
 */
export class FilenameClassifier {
  async classify(filePath: string): Promise<ClassificationResult> {
    return qualityHintFromName(filePath) === 'low'
      ? { verdict: 'AlreadyLowRes', basis: 'filename' }
      : { verdict: 'NeedsEncode', basis: 'filename' };
  }
}
