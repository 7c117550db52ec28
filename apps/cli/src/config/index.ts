/**
 * CLI Configuration
 *
 * Command options fall back to the same environment variables the monitor
 * reads, so one `.env` serves both.
 */

import { z } from 'zod';
import { ConfigurationError } from '@transcode-mirror/core';
import { REPORT_FORMATS, type ReportFormat } from '@transcode-mirror/report';
import { DEFAULT_MIN_OUTPUT_BYTES, DEFAULT_VERSION_SUFFIX, parseIgnorePatterns } from '@transcode-mirror/sync';

export interface TreeCommandOptions {
  source?: string;
  dest?: string;
  format?: string;
  showSkipped?: boolean;
  ignore?: string;
  /** commander sets this false for --no-probe */
  probe?: boolean;
  ffprobe?: string;
}

export interface TreeConfig {
  sourceFolder: string;
  destinationFolder: string;
  versionSuffix: string;
  format: ReportFormat;
  showSkipped: boolean;
  ignorePatterns: RegExp[];
  probe: boolean;
  ffprobePath: string;
  /** Smaller destinations count as missing */
  minOutputBytes: number;
}

const treeSchema = z.object({
  source: z.string({ required_error: 'Source folder not specified. Use --source or set SOURCE_FOLDER.' })
    .trim()
    .min(1, 'Source folder not specified. Use --source or set SOURCE_FOLDER.'),
  dest: z.string({ required_error: 'Destination folder not specified. Use --dest or set DEST_FOLDER.' })
    .trim()
    .min(1, 'Destination folder not specified. Use --dest or set DEST_FOLDER.'),
  format: z.string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(REPORT_FORMATS, {
      errorMap: () => ({ message: `Output format must be one of: ${REPORT_FORMATS.join(', ')}` }),
    }))
    .default('text'),
  versionSuffix: z.string().default(DEFAULT_VERSION_SUFFIX),
  minOutputBytes: z.preprocess(
    value => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.coerce.number({ invalid_type_error: 'MIN_OUTPUT_BYTES must be a whole number of bytes' })
      .int('MIN_OUTPUT_BYTES must be a whole number of bytes')
      .positive('MIN_OUTPUT_BYTES must be a whole number of bytes')
      .default(DEFAULT_MIN_OUTPUT_BYTES)
  ),
});

function truthy(value: string | undefined): boolean {
  return ['true', '1', 'yes'].includes((value ?? '').trim().toLowerCase());
}

export function resolveTreeConfig(
  options: TreeCommandOptions,
  env: Record<string, string | undefined> = process.env
): TreeConfig {
  const parsed = treeSchema.safeParse({
    source: options.source ?? env['SOURCE_FOLDER'],
    dest: options.dest ?? env['DEST_FOLDER'],
    format: options.format ?? env['OUTPUT_FORMAT'],
    versionSuffix: env['SYMLINK_VERSION_SUFFIX'],
    minOutputBytes: env['MIN_OUTPUT_BYTES'],
  });
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map(issue => issue.message));
  }

  return {
    sourceFolder: parsed.data.source,
    destinationFolder: parsed.data.dest,
    versionSuffix: parsed.data.versionSuffix,
    format: parsed.data.format,
    showSkipped: options.showSkipped ?? truthy(env['SHOW_SKIPPED']),
    ignorePatterns: parseIgnorePatterns(options.ignore ?? env['IGNORE_PATTERNS'] ?? ''),
    probe: options.probe ?? true,
    ffprobePath: options.ffprobe ?? env['FFPROBE_PATH'] ?? 'ffprobe',
    minOutputBytes: parsed.data.minOutputBytes,
  };
}
