/**
 * Path Utilities
 */

import { posix } from 'node:path';

/**
 * Sanitize a filename to be safe for filesystem.
 * Any directory part is dropped first, so a name like "../x" becomes "x".
 */
export function sanitizeFilename(filename: string): string {
  return posix.basename(filename.replace(/\\/g, '/'))
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace Windows reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    // Limit length
    .substring(0, 200);
}

/**
 * Last segment of a URL path; empty when the path ends in "/"
 */
export function lastPathSegment(url: URL): string {
  return url.pathname.split('/').pop() ?? '';
}
