/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution.
 * Output is requested as JSON and validated before use.
 */

import { z } from 'zod';
import { executeCommand, errorMessage, type CommandResult } from '@transcode-mirror/utils';
import { CommandExecutionError, ProbeError } from '@transcode-mirror/core';
import type { MediaProbe, ProbeSummary, StreamProbe, StreamSummary, VideoDimensions } from '../types.js';

const CODEC_TYPES = ['video', 'audio', 'subtitle', 'data', 'attachment'] as const;

const streamSchema = z.object({
  index: z.number().int().optional(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
  width: z.number().int().optional(),
  height: z.number().int().optional(),
});

const ffprobeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
  format: z.object({
    duration: z.string().optional(),
  }).optional(),
});

export type FFProbeOutput = z.infer<typeof ffprobeOutputSchema>;

function toCodecType(value: string | undefined): StreamSummary['codecType'] {
  const match = CODEC_TYPES.find(type => type === value);
  return match ?? 'unknown';
}

export class FFProbe implements MediaProbe, StreamProbe {
  private ffprobePath: string;
  private timeoutMs: number;

  constructor(ffprobePath: string = 'ffprobe', timeoutMs: number = 30000) {
    this.ffprobePath = ffprobePath;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Run ffprobe with JSON output and validate the result
   */
  private async run(filePath: string, args: string[]): Promise<FFProbeOutput> {
    let result: CommandResult;
    try {
      result = await executeCommand(
        this.ffprobePath,
        ['-v', 'error', ...args, '-of', 'json', filePath],
        { timeout: this.timeoutMs }
      );
    } catch (error) {
      throw new ProbeError(filePath, `could not run ffprobe: ${errorMessage(error)}`, error);
    }

    if (result.timedOut) {
      throw new ProbeError(filePath, `ffprobe timed out after ${this.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      throw new ProbeError(
        filePath,
        result.stderr.trim() || `ffprobe exited with ${result.exitCode}`,
        new CommandExecutionError(this.ffprobePath, result.exitCode, result.stderr)
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw new ProbeError(filePath, `unparsable ffprobe output: ${result.stdout.substring(0, 200)}`, error);
    }

    const parsed = ffprobeOutputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(filePath, `unexpected ffprobe output: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  }

  /**
   * Width and height of the first video stream
   */
  async probeDimensions(filePath: string): Promise<VideoDimensions> {
    const output = await this.run(filePath, [
      '-select_streams', 'v:0',
      '-show_entries', 'stream=width,height',
    ]);

    const stream = output.streams[0];
    if (!stream || !stream.width || !stream.height) {
      throw new ProbeError(filePath, 'no video stream with dimensions');
    }
    return { width: stream.width, height: stream.height };
  }

  /**
   * Stream list and container duration
   */
  async probe(filePath: string): Promise<ProbeSummary> {
    const output = await this.run(filePath, [
      '-show_entries', 'stream=index,codec_name,codec_type,width,height:format=duration',
    ]);

    const streams = output.streams.map((stream, position): StreamSummary => ({
      index: stream.index ?? position,
      codecType: toCodecType(stream.codec_type),
      codecName: stream.codec_name,
      width: stream.width,
      height: stream.height,
    }));

    const duration = output.format?.duration !== undefined
      ? Number.parseFloat(output.format.duration)
      : undefined;

    return {
      streams,
      duration: duration !== undefined && Number.isFinite(duration) ? duration : undefined,
    };
  }
}
