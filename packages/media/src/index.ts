/**
 * @transcode-mirror/media
 *
 * Media inspection layer.
 *
 * Responsibilities:
 * - Probe files with ffprobe (dimensions, streams, duration)
 * - Classify sources as needing an encode or already low resolution
 */

// Probing
export { FFProbe, type FFProbeOutput } from './probes/ffprobe.js';

// Classification
export {
  ResolutionClassifier,
  FilenameClassifier,
  normalizedHeight,
  LOW_RES_MAX_HEIGHT,
  type ResolutionClassifierOptions,
} from './classifier.js';

export {
  qualityHintFromName,
  LOW_QUALITY_MARKERS,
  HIGH_QUALITY_MARKERS,
  type FilenameHint,
} from './qualityMarkers.js';

// Types
export type {
  VideoDimensions,
  StreamSummary,
  ProbeSummary,
  MediaProbe,
  StreamProbe,
  ClassificationResult,
} from './types.js';
