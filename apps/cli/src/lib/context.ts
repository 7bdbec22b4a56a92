/**
 * Command Context
 * 
 * Everything a command needs, built once per process from the config.
 */

import type { Dispatcher } from 'undici';
import { IndexStore, TokenStore } from '@modelfetch/core';
import { ProgressReporter, type PartialFilePolicy } from '@modelfetch/acquisition';
import type { CliConfig } from '../config/index.js';

export interface CommandContext {
  indexStore: IndexStore;
  tokenStore: TokenStore;
  reporter: ProgressReporter;
  partialFiles: PartialFilePolicy;
  /** Aborted on Ctrl-C */
  signal?: AbortSignal;
  /** HTTP dispatcher override; undici's global dispatcher when unset */
  dispatcher?: Dispatcher;
}

export function createContext(
  config: CliConfig,
  overrides: Partial<CommandContext> = {}
): CommandContext {
  return {
    indexStore: new IndexStore(config.indexFile),
    tokenStore: new TokenStore(config.tokensFile),
    reporter: new ProgressReporter(),
    partialFiles: config.partialFiles,
    ...overrides,
  };
}
