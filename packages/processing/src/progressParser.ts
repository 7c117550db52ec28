/**
 * Progress Parser
 *
 * Reads FFmpeg's stderr status lines and turns them into progress against
 * the source duration.
 */

export interface ProgressSnapshot {
  frame: number;
  fps: number;
  timeMs: number;
  speed: number;    // x realtime
  progress: number; // 0-100, 0 when the duration is unknown
}

export class FFmpegProgressParser {
  private readonly durationMs: number;
  private lastReported = -1;

  constructor(durationMs: number, private readonly stepPercent: number = 10) {
    this.durationMs = durationMs;
  }

  /**
   * Parse one stderr line
   *
   * frame= 1000 fps=24.5 q=28.0 size=   1234kB time=00:00:42.00 bitrate= 240.5kbits/s speed=2.01x
   */
  parseStderrLine(line: string): ProgressSnapshot | null {
    const match = line.match(/frame=\s*(\d+).*fps=\s*([\d.]+).*time=\s*([\d:.]+)/);
    if (!match) return null;

    const [, frame, fps, time] = match;
    const speedMatch = line.match(/speed=\s*([\d.]+)x/);
    const timeMs = parseTime(time ?? '00:00:00');

    return {
      frame: parseInt(frame ?? '0', 10),
      fps: parseFloat(fps ?? '0'),
      timeMs,
      speed: speedMatch ? parseFloat(speedMatch[1] ?? '0') : 0,
      progress: this.durationMs > 0 ? Math.min(100, (timeMs * 100) / this.durationMs) : 0,
    };
  }

  /**
   * Parse a line and return it only when progress crossed the next step
   */
  nextMilestone(line: string): ProgressSnapshot | null {
    const snapshot = this.parseStderrLine(line);
    if (!snapshot || this.durationMs <= 0) return null;

    const step = Math.floor(snapshot.progress / this.stepPercent);
    if (step <= this.lastReported) return null;

    this.lastReported = step;
    return snapshot;
  }
}

function parseTime(time: string): number {
  const parts = time.split(':');
  if (parts.length !== 3) return 0;

  const [hours, minutes, seconds] = parts.map(p => parseFloat(p));
  return ((hours ?? 0) * 3600 + (minutes ?? 0) * 60 + (seconds ?? 0)) * 1000;
}
