/**
 * Monitor Entry Point
 *
 * Long-running daemon that keeps DEST_FOLDER a 720p mirror of SOURCE_FOLDER:
 * - Watches the source tree for new, changed and removed videos
 * - Encodes what is missing or stale, deletes what is orphaned
 * - Re-scans both trees every CLEANUP_INTERVAL_HOURS
 */

import type { Logger } from 'pino';
import { ConfigurationError } from '@transcode-mirror/core';
import { FFProbe, ResolutionClassifier } from '@transcode-mirror/media';
import { FFmpegEncoder } from '@transcode-mirror/processing';
import { errorMessage } from '@transcode-mirror/utils';
import { loadMonitorConfig } from './config/index.js';
import { createMonitorLogger } from './lib/logger.js';
import { MonitorService } from './service.js';

function exitOnStartupError(error: unknown): never {
  if (error instanceof ConfigurationError) {
    console.error('Invalid environment configuration:');
    for (const issue of error.issues) {
      console.error(`  - ${issue}`);
    }
  } else {
    console.error(errorMessage(error));
  }
  process.exit(1);
}

let logger: Logger;
let service: MonitorService;
try {
  const config = loadMonitorConfig();
  logger = createMonitorLogger(config);
  const probe = new FFProbe(config.mediaTools.ffprobe);

  // Folder combinations are validated here
  service = new MonitorService(config, {
    classifier: new ResolutionClassifier({ probe, useFilenameHints: config.useFilenameHints }),
    encoder: new FFmpegEncoder({ probe, ffmpegPath: config.mediaTools.ffmpeg }),
    logger,
  });
} catch (error) {
  exitOnStartupError(error);
}

let isShuttingDown = false;

const shutdown = async (signal: string) => {
  if (isShuttingDown) {
    logger.warn({ signal }, 'Shutdown already in progress');
    return;
  }
  isShuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received, waiting for running encodes');

  try {
    await service.stop();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Error during shutdown');
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason: errorMessage(reason) }, 'Unhandled rejection');
  void shutdown('unhandledRejection');
});

service.start().catch((error: unknown) => {
  logger.fatal({ error: errorMessage(error) }, 'Monitor failed to start');
  process.exit(1);
});
