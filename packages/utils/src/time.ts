/**
 * Time and Size Formatting
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

const SIZE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'] as const;

/**
 * Format a byte count with binary units and one decimal, e.g. "1,536.0 MiB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit: string = SIZE_UNITS[0];

  for (const candidate of SIZE_UNITS) {
    unit = candidate;
    if (Math.abs(value) < 1024 || candidate === 'TiB') {
      break;
    }
    value /= 1024;
  }

  const formatted = value.toLocaleString('en-US', {
    minimumFractionDigits: 1,
    maximumFractionDigits: 1,
  });
  return `${formatted} ${unit}`;
}

/**
 * Convert hours (possibly fractional) to milliseconds
 */
export function hoursToMs(hours: number): number {
  return Math.round(hours * 60 * 60 * 1000);
}
