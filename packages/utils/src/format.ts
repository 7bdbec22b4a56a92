/**
 * Byte Formatting
 */

const UNITS = ['B', 'KB', 'MB', 'GB', 'TB'] as const;

/**
 * Format a byte count with one decimal, base 1024: 512 -> "512.0B", 1536 -> "1.5KB"
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  for (const unit of UNITS) {
    if (value < 1024) {
      return `${value.toFixed(1)}${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)}PB`;
}

/**
 * Percentage right-aligned to six characters: 5 -> "  5.00"
 */
export function formatPercent(done: number, total: number): string {
  return ((done / total) * 100).toFixed(2).padStart(6, ' ');
}
