/**
 * Utility functions for formatting durations, dates, and other display values
 */

/**
 * Format a duration given in seconds
 * @param seconds - Duration in seconds
 * @returns Formatted string (e.g., "450ms", "1.50s", "2.3m")
 */
export function formatDuration(seconds: number): string {
  if (seconds < 1) return `${Math.round(seconds * 1000)}ms`;
  if (seconds < 60) return `${seconds.toFixed(2)}s`;
  return `${(seconds / 60).toFixed(1)}m`;
}

/**
 * Format timestamp as "YYYY-MM-DD HH:MM:SS UTC"
 * @param timestamp - ISO timestamp string
 */
export function formatTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  if (Number.isNaN(date.getTime())) return timestamp;
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

/**
 * Format number with English pluralisation of a noun
 * @returns e.g. "1 failure", "3 failures"
 */
export function formatCount(value: number, noun: string): string {
  return `${value} ${noun}${value === 1 ? '' : 's'}`;
}
