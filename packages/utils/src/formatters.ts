/**
 * Utility functions for formatting data
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format file size in human-readable format
 */
export function formatFileSize(bytes: number): string {
  if (bytes <= 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
}

/**
 * Local time as YYYYMMDD_HHMMSS, used in generated file names
 */
export function formatFileTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Zero-padded sequence file name, e.g. frame_00042.jpg
 */
export function formatSequenceFileName(prefix: string, index: number, extension: string): string {
  return `${prefix}_${pad(index, 5)}.${extension}`;
}

/**
 * Sanitize filename by removing special characters
 */
export function sanitizeFileName(filename: string): string {
  return filename.replace(/[^a-zA-Z0-9._-]/g, '_');
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
