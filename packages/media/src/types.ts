/**
 * Media Types
 */

import type { ResolutionVerdict } from '@transcode-mirror/core';

export interface VideoDimensions {
  width: number;
  height: number;
}

export interface StreamSummary {
  index: number;
  codecType: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment' | 'unknown';
  codecName?: string;
  width?: number;
  height?: number;
}

export interface ProbeSummary {
  streams: StreamSummary[];
  /** Container duration in seconds, when reported */
  duration?: number;
}

/**
 * Probe collaborator: reads stream metadata without decoding.
 * Implementations throw ProbeError for unreadable media.
 */
export interface MediaProbe {
  probeDimensions(filePath: string): Promise<VideoDimensions>;
}

/** Full stream listing, used to plan and verify encodes */
export interface StreamProbe {
  probe(filePath: string): Promise<ProbeSummary>;
}

export interface ClassificationResult {
  verdict: ResolutionVerdict;
  /** How the verdict was reached */
  basis: 'filename' | 'probe';
  dimensions?: VideoDimensions;
  normalizedHeight?: number;
  error?: string;
}
