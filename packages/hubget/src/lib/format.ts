/**
 * Human-readable formatting helpers shared by the CLI output.
 */

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;

/**
 * Format a byte count with binary (1024-based) units and two decimals.
 *
 * @example formatSize(1536) // "1.50 KB"
 */
export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) {
      return `${size.toFixed(2)} ${unit}`;
    }
    size /= 1024;
  }
  return `${size.toFixed(2)} PB`;
}
