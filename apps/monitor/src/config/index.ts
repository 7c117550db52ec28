/**
 * Monitor Configuration
 */

import { config as dotenvConfig } from 'dotenv';
import { availableParallelism } from 'node:os';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  ConfigurationError,
  ENCODING_CODECS,
  ENCODING_QUALITIES,
  HW_ENCODING_TYPES,
  createEncodeOptions,
  type EncodeOptions,
} from '@transcode-mirror/core';
import { defaultWorkerCount } from '@transcode-mirror/processing';
import {
  DEFAULT_CLASSIFY_CONCURRENCY,
  DEFAULT_MIN_OUTPUT_BYTES,
  DEFAULT_VERSION_SUFFIX,
  parseIgnorePatterns,
} from '@transcode-mirror/sync';
import { errorMessage, hoursToMs } from '@transcode-mirror/utils';

// Get monorepo root
const __dirname = dirname(fileURLToPath(import.meta.url));
const monorepoRoot = resolve(__dirname, '../../../..');

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const positiveInt = z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional());
const positiveNumber = z.preprocess(blankToUndefined, z.coerce.number().positive().optional());

const booleanString = (fallback: boolean) =>
  z.string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform(value => value === 'true' || value === '1' || value === 'yes')
    .default(String(fallback));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).default('info'),

  SOURCE_FOLDER: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
  DEST_FOLDER: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),

  // Encoding
  ENABLE_HW_ACCEL: booleanString(true),
  HW_ENCODING_TYPE: z.string().trim().toLowerCase().pipe(z.enum(HW_ENCODING_TYPES)).default('nvidia'),
  ENCODING_QUALITY: z.string().trim().toUpperCase().pipe(z.enum(ENCODING_QUALITIES)).default('LOW'),
  ENCODING_CODEC: z.string().trim().toLowerCase().pipe(z.enum(ENCODING_CODECS)).default('hevc'),

  // Version symlinks
  SYMLINK_TARGET_PREFIX: z.string().trim().default(''),
  SYMLINK_VERSION_SUFFIX: z.string().default(DEFAULT_VERSION_SUFFIX),

  // Scheduling and workers
  CLEANUP_INTERVAL_HOURS: positiveNumber,
  MAX_WORKERS: positiveInt,
  ENCODE_MAX_ATTEMPTS: positiveInt,
  ENCODE_RETRY_DELAY_MS: positiveInt,
  MIN_OUTPUT_BYTES: positiveInt,
  STABILITY_THRESHOLD_MS: positiveInt,

  // Classification
  PROBE_CONCURRENCY: positiveInt,
  USE_FILENAME_HINTS: booleanString(true),
  IGNORE_PATTERNS: z.string().default('').transform((value, ctx) => {
    try {
      return parseIgnorePatterns(value);
    } catch (error) {
      const message = error instanceof ConfigurationError ? error.issues.join('; ') : errorMessage(error);
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      return z.NEVER;
    }
  }),

  // Media tools
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
});

export type LogLevel = typeof LOG_LEVELS[number];

export interface MonitorConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;
  sourceFolder: string;
  destinationFolder: string;
  encoding: Readonly<EncodeOptions>;
  symlinks: {
    targetPrefix: string;
    versionSuffix: string;
  };
  cleanupIntervalMs: number;
  maxWorkers: number;
  encodeMaxAttempts: number;
  encodeRetryDelayMs: number;
  minOutputBytes: number;
  stabilityThresholdMs: number;
  probeConcurrency: number;
  useFilenameHints: boolean;
  ignorePatterns: RegExp[];
  mediaTools: {
    ffmpeg: string;
    ffprobe: string;
  };
}

export interface ParseOptions {
  /** CPU count used for the software-encoding worker default */
  cpuCount?: number;
}

/**
 * Validate an environment into a MonitorConfig. Throws ConfigurationError
 * listing every invalid key.
 */
export function parseMonitorConfig(
  source: Record<string, string | undefined>,
  options: ParseOptions = {}
): MonitorConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => {
        const key = issue.path.join('.');
        return key ? `${key}: ${issue.message}` : issue.message;
      })
    );
  }

  const env = parsed.data;
  const encoding = createEncodeOptions({
    hwAccel: env.ENABLE_HW_ACCEL,
    hwType: env.HW_ENCODING_TYPE,
    quality: env.ENCODING_QUALITY,
    codec: env.ENCODING_CODEC,
  });

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    sourceFolder: resolve(env.SOURCE_FOLDER),
    destinationFolder: resolve(env.DEST_FOLDER),
    encoding,
    symlinks: {
      targetPrefix: env.SYMLINK_TARGET_PREFIX,
      versionSuffix: env.SYMLINK_VERSION_SUFFIX,
    },
    cleanupIntervalMs: hoursToMs(env.CLEANUP_INTERVAL_HOURS ?? 6),
    maxWorkers: env.MAX_WORKERS ?? defaultWorkerCount(encoding.hwAccel, options.cpuCount ?? availableParallelism()),
    encodeMaxAttempts: env.ENCODE_MAX_ATTEMPTS ?? 3,
    encodeRetryDelayMs: env.ENCODE_RETRY_DELAY_MS ?? 5000,
    minOutputBytes: env.MIN_OUTPUT_BYTES ?? DEFAULT_MIN_OUTPUT_BYTES,
    stabilityThresholdMs: env.STABILITY_THRESHOLD_MS ?? 60000,
    probeConcurrency: env.PROBE_CONCURRENCY ?? DEFAULT_CLASSIFY_CONCURRENCY,
    useFilenameHints: env.USE_FILENAME_HINTS,
    ignorePatterns: env.IGNORE_PATTERNS,
    mediaTools: {
      ffmpeg: env.FFMPEG_PATH,
      ffprobe: env.FFPROBE_PATH,
    },
  };
}

/**
 * Load `.env` from the monorepo root, then validate process.env
 */
export function loadMonitorConfig(): MonitorConfig {
  dotenvConfig({ path: resolve(monorepoRoot, '.env') });
  return parseMonitorConfig(process.env);
}
