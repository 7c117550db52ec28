/**
 * Folder Watcher Service
 *
 * Monitors the source tree for file changes using native fs.watch with
 * debouncing.
 *
 * Features:
 * - Recursive directory watching
 * - Debounced events (prevents duplicate triggers)
 * - Partial download and hidden file filtering
 * - File stability detection (an `added` event waits until size and mtime
 *   stop changing, so a copy in progress is never encoded)
 *
 * Delivery is best-effort: consumers must not assume every change is seen.
 */

import { EventEmitter } from 'node:events';
import { watch, type FSWatcher } from 'node:fs';
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, errorMessage, toPosixPath } from '@transcode-mirror/utils';

const logger = createLogger({ module: 'folder-watcher' });

export interface WatchEvent {
  type: 'added' | 'removed';
  path: string;
  relativePath: string;
  timestamp: Date;
  size?: number;
  mtimeMs?: number;
}

export interface WatcherConfig {
  root: string;

  // Only relative paths passing this filter are reported
  accept?: (relativePath: string) => boolean;

  // Debounce delay in ms
  debounceMs?: number;

  // Wait for file to be stable (no writes) before emitting
  stabilityThresholdMs?: number;

  // Ignore hidden files/directories
  ignoreHidden?: boolean;
}

interface PendingFile {
  relativePath: string;
  lastSize: number;
  lastModified: number;
  stableSince: number;
}

export class FolderWatcher extends EventEmitter {
  private config: Required<WatcherConfig>;
  private watcher: FSWatcher | null = null;
  private debounceTimers: Map<string, NodeJS.Timeout> = new Map();
  private pendingFiles: Map<string, PendingFile> = new Map();
  private stabilityCheckInterval: NodeJS.Timeout | null = null;
  private checking = false;
  private isRunning = false;

  // Common partial download patterns
  private static readonly PARTIAL_PATTERNS = [
    /\.part$/i,
    /\.partial$/i,
    /\.crdownload$/i,
    /\.download$/i,
    /\.tmp$/i,
    /\.temp$/i,
    /~$/,
    /\.!qB$/i,      // qBittorrent
    /\.!ut$/i,      // uTorrent
    /\.bc!$/i,      // BitComet
    /\.aria2$/i,    // aria2
  ];

  constructor(config: WatcherConfig) {
    super();

    this.config = {
      root: config.root,
      accept: config.accept ?? (() => true),
      debounceMs: config.debounceMs ?? 500,
      stabilityThresholdMs: config.stabilityThresholdMs ?? 60000,
      ignoreHidden: config.ignoreHidden ?? true,
    };
  }

  /**
   * Start watching the root
   */
  start(): void {
    if (this.isRunning) {
      throw new Error('Watcher is already running');
    }

    this.watcher = watch(this.config.root, { recursive: true }, (eventType, filename) => {
      if (filename) {
        this.handleFileEvent(eventType, toPosixPath(filename.toString()));
      }
    });

    this.watcher.on('error', (error) => {
      this.emit('error', { path: this.config.root, error });
    });

    this.isRunning = true;

    // Check often enough that a stable file is reported within 1.5 thresholds
    this.stabilityCheckInterval = setInterval(
      () => void this.checkFileStability(),
      Math.max(10, this.config.stabilityThresholdMs / 2)
    );

    logger.info({ root: this.config.root }, 'Watching source tree');
    this.emit('ready', { root: this.config.root });
  }

  /**
   * Stop watching
   */
  stop(): void {
    this.isRunning = false;

    this.watcher?.close();
    this.watcher = null;

    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();
    this.pendingFiles.clear();

    if (this.stabilityCheckInterval) {
      clearInterval(this.stabilityCheckInterval);
      this.stabilityCheckInterval = null;
    }

    this.emit('close');
  }

  /**
   * Check if watcher is running
   */
  get running(): boolean {
    return this.isRunning;
  }

  // Private methods

  private handleFileEvent(eventType: string, relativePath: string): void {
    if (this.shouldIgnore(relativePath)) {
      return;
    }

    const timer = this.debounceTimers.get(relativePath);
    if (timer) {
      clearTimeout(timer);
    }

    this.debounceTimers.set(relativePath, setTimeout(() => {
      this.debounceTimers.delete(relativePath);
      void this.processFileEvent(eventType, relativePath);
    }, this.config.debounceMs));
  }

  private async processFileEvent(eventType: string, relativePath: string): Promise<void> {
    const fullPath = join(this.config.root, relativePath);

    try {
      const stats = await stat(fullPath).catch(() => null);
      if (!this.isRunning) return;

      if (!stats) {
        this.pendingFiles.delete(fullPath);
        this.emitEvent({ type: 'removed', path: fullPath, relativePath, timestamp: new Date() });
      } else if (stats.isFile()) {
        // Appeared or changed: (re)start the stability check
        this.pendingFiles.set(fullPath, {
          relativePath,
          lastSize: stats.size,
          lastModified: stats.mtimeMs,
          stableSince: Date.now(),
        });
        logger.debug({ relativePath, eventType }, 'Waiting for file to settle');
      }
    } catch (error) {
      this.emit('error', { path: fullPath, error });
    }
  }

  private async checkFileStability(): Promise<void> {
    if (this.checking) return;
    this.checking = true;

    try {
      for (const [path, pending] of this.pendingFiles) {
        const stats = await stat(path).catch(() => null);

        if (!stats) {
          // Deleted before it settled
          this.pendingFiles.delete(path);
          continue;
        }

        if (stats.size !== pending.lastSize || stats.mtimeMs !== pending.lastModified) {
          pending.lastSize = stats.size;
          pending.lastModified = stats.mtimeMs;
          pending.stableSince = Date.now();
          continue;
        }

        if (Date.now() - pending.stableSince >= this.config.stabilityThresholdMs) {
          this.pendingFiles.delete(path);
          this.emitEvent({
            type: 'added',
            path,
            relativePath: pending.relativePath,
            timestamp: new Date(),
            size: stats.size,
            mtimeMs: stats.mtimeMs,
          });
        }
      }
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Stability check failed');
    } finally {
      this.checking = false;
    }
  }

  private emitEvent(event: WatchEvent): void {
    if (!this.isRunning) return;
    this.emit('event', event);
  }

  private shouldIgnore(relativePath: string): boolean {
    const segments = relativePath.split('/');
    const filename = segments[segments.length - 1] ?? relativePath;

    // Ignore hidden files and anything under hidden directories
    if (this.config.ignoreHidden && segments.some(segment => segment.startsWith('.'))) {
      return true;
    }

    for (const pattern of FolderWatcher.PARTIAL_PATTERNS) {
      if (pattern.test(filename)) {
        return true;
      }
    }

    return !this.config.accept(relativePath);
  }
}
