/**
 * Encoding Presets
 *
 * Quality tables and encoder selection for the downscaled copies. Every
 * encode targets 720 lines, stereo AC-3 audio and Matroska.
 */

import type {
  EncodeOptions,
  EncodingCodec,
  EncodingQuality,
} from '@transcode-mirror/core';
import type { AudioCodecOptions, VideoCodecOptions } from './commandBuilder.js';

export const TARGET_HEIGHT = 720;

/**
 * Constant-quality values per tier: `cq` for hardware encoders
 * (NVENC -cq, QSV -global_quality), `crf` for software encoders.
 */
export const QUALITY_LEVELS: Record<
  EncodingQuality,
  { cq: Record<EncodingCodec, number>; crf: Record<EncodingCodec, number> }
> = {
  LOW: { cq: { av1: 45, hevc: 32 }, crf: { av1: 40, hevc: 30 } },
  MEDIUM: { cq: { av1: 35, hevc: 26 }, crf: { av1: 35, hevc: 26 } },
  HIGH: { cq: { av1: 28, hevc: 22 }, crf: { av1: 28, hevc: 22 } },
};

export const AUDIO_DOWNMIX: AudioCodecOptions = {
  codec: 'ac3',
  bitrate: '192k',
  channels: 2,
};

/** Subtitle codecs Matroska can take by stream copy */
export const SAFE_SUBTITLE_CODECS: readonly string[] = ['ass', 'srt', 'subrip', 'mov_text', 'hdmv_pgs_subtitle'];

/**
 * Pick the video encoder and its quality arguments
 */
export function selectVideoEncoder(options: EncodeOptions): VideoCodecOptions {
  const quality = QUALITY_LEVELS[options.quality];

  if (options.hwAccel) {
    if (options.hwType === 'nvidia') {
      return options.codec === 'av1'
        ? { codec: 'av1_nvenc', preset: 'medium', cq: quality.cq.av1 }
        : { codec: 'hevc_nvenc', preset: 'p5', rateControl: 'vbr_hq', cq: quality.cq.hevc, bitrate: '0' };
    }
    return options.codec === 'av1'
      ? { codec: 'av1_qsv', preset: 'medium', globalQuality: quality.cq.av1 }
      : { codec: 'hevc_qsv', preset: 'medium', globalQuality: quality.cq.hevc };
  }

  return options.codec === 'av1'
    ? { codec: 'libsvtav1', preset: '6', crf: quality.crf.av1 }
    : { codec: 'libx265', preset: 'medium', crf: quality.crf.hevc };
}

/**
 * Hardware encoders accept one or a few sessions; software encoding may use
 * every core.
 */
export function defaultWorkerCount(hwAccel: boolean, cpuCount: number): number {
  return hwAccel ? 1 : Math.max(1, cpuCount);
}
