/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { chmod, mkdir, writeFile, readFile, stat, unlink } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface WriteOptions {
  mode?: number;
}

/**
 * Node system error, including ones raised from another realm
 * where `instanceof Error` does not hold
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Check whether anything exists at a path
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer,
  options: WriteOptions = {}
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, { encoding: 'utf8', mode: options.mode });
  if (options.mode !== undefined) {
    // mode only applies when the file is created
    await chmod(filePath, options.mode);
  }
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Remove a file; a missing file is not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return;
    }
    throw error;
  }
}
