/**
 * Format Utilities
 */

const SIZE_UNITS = [
  { unit: 'KB', digits: 0 },
  { unit: 'MB', digits: 1 },
  { unit: 'GB', digits: 2 },
  { unit: 'TB', digits: 2 },
] as const;

/**
 * Format a file size in bytes the way file browsers show it (decimal units).
 *
 * @example
 * formatFileSize(345678) // "346 KB"
 * formatFileSize(1234567) // "1.2 MB"
 * formatFileSize(25000000) // "25 MB"
 * formatFileSize(512) // "512 bytes"
 */
export function formatFileSize(bytes: number): string {
  if (bytes < 1000) {
    return bytes === 1 ? '1 byte' : `${bytes} bytes`;
  }

  let value = bytes;
  let index = -1;
  while (value >= 1000 && index < SIZE_UNITS.length - 1) {
    value /= 1000;
    index += 1;
  }

  const { unit, digits } = SIZE_UNITS[index] ?? SIZE_UNITS[0];
  return `${parseFloat(value.toFixed(digits))} ${unit}`;
}
