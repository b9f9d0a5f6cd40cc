const SIZE_UNITS = ["B", "kB", "MB", "GB", "TB", "PB"];

/**
 * Human-readable byte count in decimal (SI) units, e.g. "2.35 MB"
 */
export function formatBytes(bytes: number, decimals = 2): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "0 B";
  }

  let value = bytes;
  let unit = 0;
  while (value >= 1000 && unit < SIZE_UNITS.length - 1) {
    value /= 1000;
    unit++;
  }

  const digits = unit === 0 ? 0 : Math.max(0, decimals);
  return `${parseFloat(value.toFixed(digits))} ${SIZE_UNITS[unit]}`;
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}
