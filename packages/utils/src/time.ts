/**
 * Time Utilities
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

/**
 * Seconds as an ffmpeg time argument with millisecond precision
 */
export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

/**
 * Whole milliseconds for a time in seconds (truncated)
 */
export function toMilliseconds(seconds: number): number {
  return Math.trunc(Math.round(seconds * 1e6) / 1e3);
}
