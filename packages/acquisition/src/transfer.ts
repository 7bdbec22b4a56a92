/**
 * Transfer
 * 
 * Fetches one resource to disk:
 * - Bearer token for the URL's host, never forwarded across hosts
 * - Output name from Content-Disposition, the URL, or a fallback
 * - Skips files that already exist unless forced
 * - Streams in fixed 64 KiB chunks with progress after each chunk
 * - Optionally extracts a zip archive in place
 *
 * Faults are not retried. Partial output of a failed transfer stays on disk;
 * a cancelled transfer keeps or removes it according to the partial-file policy.
 */

import { open } from 'node:fs/promises';
import { join } from 'node:path';
import type { Dispatcher } from 'undici';
import {
  CancelledError,
  CredentialStore,
  isModelFetchError,
  TransferError,
  type ModelFetchError,
  type TransferSpec,
} from '@modelfetch/core';
import { createLogger, ensureDir, pathExists, removeFile } from '@modelfetch/utils';
import { headerValue, openResponse, type OpenResponse } from './http.js';
import { resolveFilename } from './filename.js';
import { CHUNK_SIZE, rechunk } from './chunks.js';
import { extractZip, openZip } from './archive.js';
import { ProgressReporter } from './progress.js';

const log = createLogger({ component: 'transfer' });

export type PartialFilePolicy = 'keep' | 'delete';

export interface TransferOptions {
  credentials?: CredentialStore;
  reporter?: ProgressReporter;
  dispatcher?: Dispatcher;
  /** What happens to a partly written file when the transfer is cancelled */
  partialFiles?: PartialFilePolicy;
  chunkSize?: number;
}

export class Transfer {
  private credentials: CredentialStore;
  private reporter: ProgressReporter;
  private dispatcher?: Dispatcher;
  private partialFiles: PartialFilePolicy;
  private chunkSize: number;

  constructor(options: TransferOptions = {}) {
    this.credentials = options.credentials ?? new CredentialStore();
    this.reporter = options.reporter ?? new ProgressReporter();
    this.dispatcher = options.dispatcher;
    this.partialFiles = options.partialFiles ?? 'keep';
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
  }

  /**
   * Run the transfer. Resolves with the downloaded file, or with the
   * destination directory when an archive was extracted.
   */
  async run(spec: TransferSpec, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new CancelledError(spec.name);
    }

    let target: string;
    try {
      const url = parseUrl(spec);
      await ensureDir(spec.destinationDir);

      log.debug({ task: spec.name, host: url.hostname }, 'Transfer started');
      const response = await openResponse(url, {
        authHeaders: this.credentials.authorizationFor(url),
        dispatcher: this.dispatcher,
        signal,
      });

      target = join(
        spec.destinationDir,
        resolveFilename(headerValue(response.headers, 'content-disposition'), url)
      );

      if (!spec.force && await pathExists(target)) {
        await response.body.dump();
        this.reporter.report({ type: 'skip', task: spec.name, path: target });
        return target;
      }

      await this.writeBody(spec, response, target, signal);
      this.reporter.report({ type: 'done', task: spec.name, path: target });
    } catch (error) {
      throw toTransferFailure(spec, error, signal);
    }

    if (!spec.extract) {
      return target;
    }
    try {
      return await this.extract(spec, target);
    } catch (error) {
      throw toTransferFailure(spec, error, signal);
    }
  }

  /**
   * Stream the body to the target, applying the partial-file policy when cancelled
   */
  private async writeBody(
    spec: TransferSpec,
    response: OpenResponse,
    target: string,
    signal?: AbortSignal
  ): Promise<void> {
    try {
      await this.streamToFile(spec, response, target, signal);
    } catch (error) {
      if (signal?.aborted && this.partialFiles === 'delete') {
        await removeFile(target);
        log.debug({ task: spec.name, file: target }, 'Removed partial file');
      }
      throw error;
    }
  }

  private async streamToFile(
    spec: TransferSpec,
    response: OpenResponse,
    target: string,
    signal?: AbortSignal
  ): Promise<void> {
    const total = parseContentLength(headerValue(response.headers, 'content-length'));
    let downloaded = 0;

    const file = await open(target, 'w');
    try {
      for await (const chunk of rechunk(response.body, this.chunkSize)) {
        if (signal?.aborted) {
          throw new CancelledError(spec.name);
        }
        await file.write(chunk);
        downloaded += chunk.length;
        this.reporter.report({ type: 'progress', task: spec.name, downloaded, total });
      }
    } finally {
      await file.close();
    }

    log.debug({ task: spec.name, file: target, bytes: downloaded }, 'Transfer finished');
  }

  private async extract(spec: TransferSpec, archivePath: string): Promise<string> {
    const zip = await openZip(archivePath);
    if (!zip) {
      this.reporter.report({
        type: 'warning',
        task: spec.name,
        message: `file is not a valid zip: ${archivePath}`,
      });
      return archivePath;
    }

    this.reporter.report({ type: 'info', task: spec.name, message: `Unzipping ${archivePath} ...` });
    extractZip(zip, spec.destinationDir);
    await removeFile(archivePath);
    this.reporter.report({ type: 'info', task: spec.name, message: `Unzipped and removed ${archivePath}` });
    return spec.destinationDir;
  }
}

function parseUrl(spec: TransferSpec): URL {
  try {
    return new URL(spec.url);
  } catch {
    throw new TransferError(spec.name, spec.url, `invalid URL '${spec.url}'`);
  }
}

function parseContentLength(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const length = Number.parseInt(value, 10);
  return Number.isFinite(length) && length > 0 ? length : undefined;
}

function toTransferFailure(spec: TransferSpec, error: unknown, signal?: AbortSignal): ModelFetchError {
  if (isModelFetchError(error)) {
    return error;
  }
  if (signal?.aborted) {
    return new CancelledError(spec.name);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransferError(spec.name, spec.url, message, error);
}
