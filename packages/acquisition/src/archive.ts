/**
 * Zip Extraction
 *
 * adm-zip reads the whole archive into memory, so archives larger than
 * Node's single-read limit cannot be extracted.
 */

import { stat } from 'node:fs/promises';
import AdmZip from 'adm-zip';
import { createLogger, isErrnoException } from '@modelfetch/utils';

const log = createLogger({ component: 'archive' });

/** Largest file fs can read into one buffer */
export const MAX_ARCHIVE_BYTES = 2 ** 31 - 1;

/**
 * Open a zip archive, or null when the file is not in zip format.
 * Filesystem errors and oversized archives reject.
 */
export async function openZip(filePath: string, maxBytes: number = MAX_ARCHIVE_BYTES): Promise<AdmZip | null> {
  const { size } = await stat(filePath);
  if (size > maxBytes) {
    throw new Error(`archive is too large to extract (${size} bytes, limit ${maxBytes}): ${filePath}`);
  }

  try {
    return new AdmZip(filePath);
  } catch (error) {
    if (isErrnoException(error) && typeof error.code === 'string') {
      throw error;
    }
    log.debug(
      { file: filePath, reason: error instanceof Error ? error.message : String(error) },
      'Not a zip archive'
    );
    return null;
  }
}

/**
 * Extract every entry into a directory, overwriting existing files
 */
export function extractZip(zip: AdmZip, destinationDir: string): void {
  zip.extractAllTo(destinationDir, true);
}
