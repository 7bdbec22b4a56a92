/**
 * @modelfetch/acquisition
 * 
 * Download acquisition layer.
 * 
 * Responsibilities:
 * - Fetch one resource to disk with bearer auth and progress
 * - Derive output file names
 * - Extract zip archives
 * - Run many transfers on a bounded pool
 * - Serialize console output from concurrent transfers
 */

// Single transfer
export { Transfer, type TransferOptions, type PartialFilePolicy } from './transfer.js';

// Scheduling
export {
  DownloadScheduler,
  resolvePoolSize,
  DEFAULT_POOL_SIZE,
  type TransferRunner,
  type TransferOutcome,
  type FailedTransfer,
  type SchedulerOptions,
} from './scheduler.js';

// Progress output
export {
  ProgressReporter,
  formatEvent,
  type ReportEvent,
  type TextSink,
  type ProgressReporterOptions,
} from './progress.js';

// HTTP
export { openResponse, headerValue, MAX_REDIRECTS, type OpenOptions, type OpenResponse } from './http.js';

// Helpers
export { resolveFilename, filenameFromContentDisposition, FALLBACK_FILENAME } from './filename.js';
export { rechunk, CHUNK_SIZE } from './chunks.js';
export { openZip, extractZip, MAX_ARCHIVE_BYTES } from './archive.js';
