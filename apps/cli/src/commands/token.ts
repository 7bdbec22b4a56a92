/**
 * Token Command
 * 
 * Registers a bearer token for a hostname.
 */

import { ConfigurationError } from '@modelfetch/core';
import { isNonEmptyString } from '@modelfetch/utils';
import type { CommandContext } from '../lib/context.js';
import { printSuccess } from '../lib/output.js';

export async function tokenCommand(
  hostname: string,
  token: string,
  context: CommandContext
): Promise<void> {
  if (!isNonEmptyString(hostname) || !isNonEmptyString(token)) {
    throw new ConfigurationError('hostname and token must not be empty');
  }

  const credentials = await context.tokenStore.load();
  credentials.set(hostname, token);
  await context.tokenStore.save(credentials);

  printSuccess(`Stored token for ${hostname}`);
}
