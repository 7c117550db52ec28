/**
 * @transcode-mirror/processing
 *
 * FFmpeg encoding: command building, encoder presets and the encoder that
 * writes the downscaled copies.
 */

export {
  FFmpegCommandBuilder,
  type InputOptions,
  type VideoEncoderName,
  type VideoCodecOptions,
  type AudioCodecOptions,
} from './commandBuilder.js';

export {
  QUALITY_LEVELS,
  AUDIO_DOWNMIX,
  SAFE_SUBTITLE_CODECS,
  TARGET_HEIGHT,
  selectVideoEncoder,
  defaultWorkerCount,
} from './presets.js';

export { FFmpegProgressParser, type ProgressSnapshot } from './progressParser.js';

export {
  FFmpegEncoder,
  buildEncodeCommand,
  type Encoder,
  type EncodeResult,
  type FFmpegEncoderOptions,
} from './encoder.js';
