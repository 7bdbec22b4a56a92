/**
 * Output Filename Derivation
 */

import { lastPathSegment, sanitizeFilename } from '@modelfetch/utils';

export const FALLBACK_FILENAME = 'downloaded.file';

/**
 * Value of the first `filename=` parameter, surrounding quotes removed
 */
export function filenameFromContentDisposition(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(';')) {
    const param = part.trim();
    if (param.toLowerCase().startsWith('filename=')) {
      return param.slice('filename='.length).replace(/^"+|"+$/g, '');
    }
  }
  return undefined;
}

/**
 * Pick the file name for a download: the Content-Disposition filename, then
 * the requested URL's last path segment, then a fixed fallback.
 */
export function resolveFilename(contentDisposition: string | undefined, url: URL): string {
  const candidates = [filenameFromContentDisposition(contentDisposition), lastPathSegment(url)];
  for (const candidate of candidates) {
    const safe = candidate ? sanitizeFilename(candidate) : '';
    if (safe) {
      return safe;
    }
  }
  return FALLBACK_FILENAME;
}
