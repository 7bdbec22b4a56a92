/**
 * @modelfetch/core
 * 
 * Core package containing:
 * - Index and transfer types
 * - Name and group resolution
 * - Credential lookup
 * - Index and token persistence
 * - Error handling
 */

// Types
export {
  createEmptyIndex,
  toTransferSpec,
  type ResourceEntry,
  type ResourceIndex,
  type TransferSpec,
} from './types/index.js';

// Resolution
export { expandNames, dedupe, type ExpandOptions } from './resolver.js';

// Registry
export {
  registerResource,
  saveGroup,
  deleteGroup,
  isKnownName,
  buildTransfers,
} from './registry.js';

// Credentials
export { CredentialStore } from './credentials.js';

// Persistence
export {
  JsonDocument,
  IndexStore,
  TokenStore,
  fromDocument,
  toDocument,
  type IndexDocument,
  type JsonDocumentOptions,
} from './store/index.js';

// Errors
export {
  ModelFetchError,
  ConfigurationError,
  NotFoundError,
  CycleError,
  TransferError,
  CancelledError,
  isModelFetchError,
} from './errors/index.js';
