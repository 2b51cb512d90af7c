/**
 * Path Utilities
 */

import { join, basename } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, 200);
}

/**
 * Path of an artifact named `<prefix>_<suffix>` inside `outputDir`
 */
export function artifactPath(outputDir: string, prefix: string, suffix: string): string {
  return join(outputDir, sanitizeFilename(`${prefix}_${suffix}`));
}

/**
 * Last segment of a file id, accepting both separators
 */
export function displayName(fileId: string): string {
  return basename(fileId.replace(/\\/g, '/'));
}
