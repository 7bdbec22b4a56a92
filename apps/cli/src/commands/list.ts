/**
 * List Command
 * 
 * Prints registered tokens (hostnames only), resources or groups,
 * tab-separated and sorted by name.
 */

import type { CredentialStore, ResourceIndex } from '@modelfetch/core';
import type { CommandContext } from '../lib/context.js';
import { printLines } from '../lib/output.js';

export const listKinds = ['token', 'dl', 'group'] as const;
export type ListKind = typeof listKinds[number];

function byName<T>(entries: Iterable<[string, T]>): [string, T][] {
  return [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function formatTokens(credentials: CredentialStore): string[] {
  return credentials.hostnames();
}

export function formatResources(index: ResourceIndex): string[] {
  return byName(index.resources).map(
    ([name, entry]) => `${name}\t${entry.destinationDir}\tunzip=${entry.extract}`
  );
}

export function formatGroups(index: ResourceIndex): string[] {
  return byName(index.groups).map(([name, members]) => `${name}\t${members.join(' ')}`);
}

export async function listCommand(kind: ListKind, context: CommandContext): Promise<void> {
  switch (kind) {
    case 'token':
      printLines(formatTokens(await context.tokenStore.load()));
      break;
    case 'dl':
      printLines(formatResources(await context.indexStore.load()));
      break;
    case 'group':
      printLines(formatGroups(await context.indexStore.load()));
      break;
  }
}
