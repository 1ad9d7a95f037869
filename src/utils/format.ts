/**
 * Formatting helpers for log lines and health output
 */

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Format bytes to a human readable string, e.g. `1.5 MB`
 */
export function formatBytes(bytes: number): string {
  let value = Math.abs(bytes);
  let unit = 0;

  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  const rounded = Math.round(value * 100) / 100;
  return `${bytes < 0 ? '-' : ''}${rounded} ${BYTE_UNITS[unit]}`;
}

/**
 * Format an uptime in seconds as `1d 2h 3m`, `2h 3m` or `3m`
 */
export function formatUptime(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const days = Math.floor(total / 86_400);
  const hours = Math.floor((total % 86_400) / 3_600);
  const minutes = Math.floor((total % 3_600) / 60);

  if (days > 0) {
    return `${days}d ${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}
