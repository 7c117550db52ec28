/**
 * FFmpeg Command Builder
 *
 * Fluent builder for the single-input transcode commands the encoder runs:
 * stream mappings, per-stream codecs, a video filter chain and the output
 * container.
 */

import { logger } from '@transcode-mirror/utils';

export interface InputOptions {
  analyzeDuration?: string;
  probeSize?: string;
}

export type VideoEncoderName =
  | 'copy'
  | 'libx265'
  | 'libsvtav1'
  | 'hevc_nvenc'
  | 'av1_nvenc'
  | 'hevc_qsv'
  | 'av1_qsv';

export interface VideoCodecOptions {
  codec: VideoEncoderName;
  preset?: string;
  /** Software encoders */
  crf?: number;
  /** NVENC constant quality */
  cq?: number;
  /** QSV ICQ */
  globalQuality?: number;
  rateControl?: string;
  bitrate?: string;
}

export interface AudioCodecOptions {
  codec: 'copy' | 'aac' | 'ac3' | 'eac3' | 'libopus';
  bitrate?: string;
  channels?: number;
}

type LogLevel = 'quiet' | 'error' | 'warning' | 'info' | 'verbose';

export class FFmpegCommandBuilder {
  private readonly leading: string[] = [];
  private input: { file: string; options: InputOptions } | null = null;
  private readonly mappings: string[] = [];
  private video: VideoCodecOptions | null = null;
  private readonly audio = new Map<number, AudioCodecOptions>();
  private copySubtitles = false;
  private readonly filters: string[] = [];
  private container: string | null = null;
  private outputFile = '';

  overwrite(): this {
    this.leading.push('-y');
    return this;
  }

  logLevel(level: LogLevel): this {
    this.leading.push('-loglevel', level);
    return this;
  }

  addInput(file: string, options: InputOptions = {}): this {
    if (this.input) {
      throw new Error('FFmpegCommandBuilder takes a single input');
    }
    this.input = { file, options };
    return this;
  }

  /**
   * Map a stream of input 0. `streamSpec` is a type spec such as `a:1` or an
   * absolute stream index.
   */
  map(streamSpec: string, optional = false): this {
    this.mappings.push(`0:${streamSpec}${optional ? '?' : ''}`);
    return this;
  }

  setVideoCodec(options: VideoCodecOptions | 'copy'): this {
    this.video = options === 'copy' ? { codec: 'copy' } : options;
    return this;
  }

  /** Codec for one audio output stream, by output index */
  setAudioStreamCodec(outputIndex: number, options: AudioCodecOptions): this {
    this.audio.set(outputIndex, options);
    return this;
  }

  copySubtitleStreams(): this {
    this.copySubtitles = true;
    return this;
  }

  addVideoFilter(filter: string): this {
    this.filters.push(filter);
    return this;
  }

  setFormat(format: string): this {
    this.container = format;
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  build(): string[] {
    if (!this.input) {
      throw new Error('Input file not specified');
    }
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }

    const args = [...this.leading];
    const { analyzeDuration, probeSize } = this.input.options;
    if (analyzeDuration) args.push('-analyzeduration', analyzeDuration);
    if (probeSize) args.push('-probesize', probeSize);
    args.push('-i', this.input.file);

    for (const mapping of this.mappings) {
      args.push('-map', mapping);
    }

    if (this.video) {
      args.push(...videoArgs(this.video));
    }

    if (this.filters.length > 0) {
      if (this.video?.codec === 'copy') {
        logger.warn({ filters: this.filters }, 'Video filters ignored while copying video');
      } else {
        args.push('-vf', this.filters.join(','));
      }
    }

    for (const [index, options] of [...this.audio].sort(([a], [b]) => a - b)) {
      args.push(`-c:a:${index}`, options.codec);
      if (options.codec === 'copy') continue;
      if (options.bitrate) args.push(`-b:a:${index}`, options.bitrate);
      if (options.channels) args.push(`-ac:a:${index}`, String(options.channels));
    }

    if (this.copySubtitles) {
      args.push('-c:s', 'copy');
    }
    if (this.container) {
      args.push('-f', this.container);
    }

    args.push(this.outputFile);
    return args;
  }

  /** The command line as one string, for logs */
  buildString(binary = 'ffmpeg'): string {
    return [binary, ...this.build()].map(a => (a.includes(' ') ? `"${a}"` : a)).join(' ');
  }
}

function videoArgs(options: VideoCodecOptions): string[] {
  const args = ['-c:v', options.codec];
  if (options.codec === 'copy') return args;

  if (options.preset) args.push('-preset', options.preset);
  if (options.rateControl) args.push('-rc', options.rateControl);
  if (options.crf !== undefined) args.push('-crf', String(options.crf));
  if (options.cq !== undefined) args.push('-cq', String(options.cq));
  if (options.globalQuality !== undefined) args.push('-global_quality', String(options.globalQuality));
  if (options.bitrate) args.push('-b:v', options.bitrate);
  return args;
}
