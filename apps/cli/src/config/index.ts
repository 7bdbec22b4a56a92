/**
 * CLI Configuration
 */

import { z } from 'zod';
import { ConfigurationError } from '@modelfetch/core';
import { homedir } from 'node:os';
import { join } from 'node:path';

const INDEX_FILE_NAME = '.model-index.json';
const TOKENS_FILE_NAME = '.model-tokens.json';

// Environment schema
const envSchema = z.object({
  MODELFETCH_HOME: z.string().min(1).optional(),
  MODELFETCH_INDEX_FILE: z.string().min(1).optional(),
  MODELFETCH_TOKENS_FILE: z.string().min(1).optional(),
  MODELFETCH_PARTIAL_FILES: z.enum(['keep', 'delete']).default('keep'),
  MODELFETCH_DEBUG: z.string().optional(),
});

export interface CliConfig {
  /** Directory holding the index and token documents */
  homeDir: string;
  indexFile: string;
  tokensFile: string;
  partialFiles: 'keep' | 'delete';
  debug: boolean;
}

/**
 * Build the configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid environment ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid value'}`
    );
  }

  const vars = parsed.data;
  const homeDir = vars.MODELFETCH_HOME ?? homedir();

  return {
    homeDir,
    indexFile: vars.MODELFETCH_INDEX_FILE ?? join(homeDir, INDEX_FILE_NAME),
    tokensFile: vars.MODELFETCH_TOKENS_FILE ?? join(homeDir, TOKENS_FILE_NAME),
    partialFiles: vars.MODELFETCH_PARTIAL_FILES,
    debug: vars.MODELFETCH_DEBUG === 'true',
  };
}
