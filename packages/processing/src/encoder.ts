/**
 * Encoder
 *
 * Produces a 720-line Matroska copy of a source file with ffmpeg. The
 * caller chooses the output path (normally a temporary name) and owns
 * publishing it.
 */

import { createLogger, executeCommand, errorMessage, hasErrorCode, type CommandResult } from '@transcode-mirror/utils';
import { CommandExecutionError, EncodeError, ProbeError, type EncodeOptions } from '@transcode-mirror/core';
import type { ProbeSummary, StreamProbe } from '@transcode-mirror/media';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import { AUDIO_DOWNMIX, SAFE_SUBTITLE_CODECS, TARGET_HEIGHT, selectVideoEncoder } from './presets.js';
import { FFmpegProgressParser } from './progressParser.js';

const logger = createLogger({ module: 'encoder' });

export interface EncodeResult {
  outputPath: string;
  /** Output duration in seconds as read back by the probe */
  durationSeconds: number;
  elapsedMs: number;
}

/**
 * Encoder collaborator. Implementations throw EncodeError; a transient
 * error may succeed when retried.
 */
export interface Encoder {
  encode(sourcePath: string, outputPath: string, options: EncodeOptions): Promise<EncodeResult>;
}

export interface FFmpegEncoderOptions {
  probe: StreamProbe;
  ffmpegPath?: string;
  /** 0 disables the timeout */
  timeoutMs?: number;
}

/** stderr text from failures that tend to clear up on their own */
const TRANSIENT_STDERR_PATTERNS = [
  /device or resource busy/i,
  /resource temporarily unavailable/i,
  /OpenEncodeSessionEx failed/i,
  /no capable devices found/i,
  /cannot allocate memory/i,
];

const SPAWN_TRANSIENT_CODES = ['EAGAIN', 'EMFILE', 'ENFILE', 'ETXTBSY'];

/**
 * Build the ffmpeg arguments for one encode
 */
export function buildEncodeCommand(
  sourcePath: string,
  outputPath: string,
  summary: ProbeSummary,
  options: EncodeOptions
): FFmpegCommandBuilder {
  const audioCount = summary.streams.filter(s => s.codecType === 'audio').length;
  const subtitles = summary.streams.filter(
    s => s.codecType === 'subtitle' && s.codecName !== undefined && SAFE_SUBTITLE_CODECS.includes(s.codecName)
  );

  const builder = new FFmpegCommandBuilder()
    .logLevel('info')
    .overwrite()
    .addInput(sourcePath, { analyzeDuration: '100M', probeSize: '100M' })
    .map('v:0')
    .setVideoCodec(selectVideoEncoder(options))
    .addVideoFilter(`scale=-2:${TARGET_HEIGHT}`);

  for (let i = 0; i < audioCount; i++) {
    builder.map(`a:${i}`).setAudioStreamCodec(i, AUDIO_DOWNMIX);
  }

  for (const subtitle of subtitles) {
    builder.map(String(subtitle.index));
  }
  if (subtitles.length > 0) {
    builder.copySubtitleStreams();
  }

  return builder.setFormat('matroska').setOutput(outputPath);
}

function stderrTail(stderr: string, lines: number = 5): string {
  return stderr
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
    .slice(-lines)
    .join(' | ');
}

export class FFmpegEncoder implements Encoder {
  private readonly probe: StreamProbe;
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;

  constructor(options: FFmpegEncoderOptions) {
    this.probe = options.probe;
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  async encode(sourcePath: string, outputPath: string, options: EncodeOptions): Promise<EncodeResult> {
    const summary = await this.inspect(sourcePath);

    if (!summary.streams.some(s => s.codecType === 'audio')) {
      throw new EncodeError(sourcePath, 'source has no audio streams');
    }

    const builder = buildEncodeCommand(sourcePath, outputPath, summary, options);
    const progress = new FFmpegProgressParser((summary.duration ?? 0) * 1000);

    logger.info({ sourcePath, outputPath, command: builder.buildString(this.ffmpegPath) }, 'Starting encode');

    let result: CommandResult;
    try {
      result = await executeCommand(this.ffmpegPath, builder.build(), {
        timeout: this.timeoutMs,
        onStderrLine: (line) => {
          const milestone = progress.nextMilestone(line);
          if (milestone) {
            logger.info(
              { sourcePath, progress: Math.floor(milestone.progress), fps: milestone.fps, speed: milestone.speed },
              'Encode progress'
            );
          }
        },
      });
    } catch (error) {
      throw new EncodeError(
        sourcePath,
        `could not run ffmpeg: ${errorMessage(error)}`,
        hasErrorCode(error, ...SPAWN_TRANSIENT_CODES),
        error
      );
    }

    if (result.timedOut) {
      throw new EncodeError(sourcePath, `ffmpeg timed out after ${this.timeoutMs}ms`, true);
    }
    if (result.exitCode !== 0) {
      const transient = TRANSIENT_STDERR_PATTERNS.some(pattern => pattern.test(result.stderr));
      throw new EncodeError(
        sourcePath,
        `ffmpeg exited with ${result.exitCode}: ${stderrTail(result.stderr)}`,
        transient,
        new CommandExecutionError(this.ffmpegPath, result.exitCode, result.stderr)
      );
    }

    const durationSeconds = await this.verify(sourcePath, outputPath);

    logger.info({ sourcePath, outputPath, elapsedMs: result.duration, durationSeconds }, 'Encode finished');
    return { outputPath, durationSeconds, elapsedMs: result.duration };
  }

  private async inspect(sourcePath: string): Promise<ProbeSummary> {
    try {
      return await this.probe.probe(sourcePath);
    } catch (error) {
      const reason = error instanceof ProbeError ? errorMessage(error) : `probe failed: ${errorMessage(error)}`;
      throw new EncodeError(sourcePath, reason, false, error);
    }
  }

  /**
   * Read the output back; an encode without a positive duration is a failure
   */
  private async verify(sourcePath: string, outputPath: string): Promise<number> {
    let summary: ProbeSummary;
    try {
      summary = await this.probe.probe(outputPath);
    } catch (error) {
      throw new EncodeError(sourcePath, `output is unreadable: ${errorMessage(error)}`, false, error);
    }

    if (summary.duration === undefined || summary.duration <= 0) {
      throw new EncodeError(sourcePath, 'output has no duration');
    }
    return summary.duration;
  }
}
