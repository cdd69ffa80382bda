/**
 * Human-readable sizes and durations
 */

const SIZE_UNITS = "KMGTPE";

export function formatBytes(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) {
    return `${bytes} B`;
  }

  let div = unit;
  let exp = 0;
  for (let n = Math.floor(bytes / unit); n >= unit && exp < SIZE_UNITS.length - 1; n = Math.floor(n / unit)) {
    div *= unit;
    exp++;
  }

  return `${(bytes / div).toFixed(1)} ${SIZE_UNITS.charAt(exp)}B`;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = Math.round((ms % 60_000) / 1000);
  return `${minutes}m ${seconds}s`;
}

/**
 * Coarse age of a moment relative to now: "45m", "3.5h", "12d"
 */
export function formatAge(date: Date, now: Date = new Date()): string {
  const ms = Math.max(0, now.getTime() - date.getTime());
  const hours = ms / 3_600_000;
  if (hours < 1) {
    return `${Math.round(ms / 60_000)}m`;
  }
  if (hours < 24) {
    return `${hours.toFixed(1)}h`;
  }
  return `${Math.round(hours / 24)}d`;
}

/**
 * "2024-03-01 14:05:09" in UTC
 */
export function formatDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace("T", " ");
}
