/**
 * Monitor Logger
 */

import { pino, type Logger } from 'pino';
import type { MonitorConfig } from '../config/index.js';

export function createMonitorLogger(config: Pick<MonitorConfig, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: config.logLevel,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'transcode-mirror-monitor',
      env: config.nodeEnv,
    },
    transport: config.nodeEnv === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
      },
    } : undefined,
  });
}
