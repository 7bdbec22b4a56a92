/**
 * Registry Operations
 * 
 * In-memory edits of the resource index. Callers persist the index
 * afterwards with IndexStore.save.
 */

import { ConfigurationError, NotFoundError } from './errors/index.js';
import { toTransferSpec, type ResourceEntry, type ResourceIndex, type TransferSpec } from './types/index.js';

/**
 * Add or overwrite a resource entry
 */
export function registerResource(index: ResourceIndex, entry: ResourceEntry): void {
  index.resources.set(entry.name, { ...entry });
}

export function isKnownName(index: ResourceIndex, name: string): boolean {
  return index.resources.has(name) || index.groups.has(name);
}

/**
 * Create or replace a group. Every member must already be a resource or group.
 */
export function saveGroup(index: ResourceIndex, group: string, members: readonly string[]): void {
  for (const member of members) {
    if (!isKnownName(index, member)) {
      throw new ConfigurationError(`unknown model or group '${member}'`, { group, member });
    }
  }
  index.groups.set(group, [...members]);
}

export function deleteGroup(index: ResourceIndex, group: string): void {
  if (!index.groups.delete(group)) {
    throw new ConfigurationError(`group '${group}' does not exist`, { group });
  }
}

/**
 * Look up every leaf name and build its transfer.
 *
 * @throws NotFoundError for the first name without a resource entry
 */
export function buildTransfers(
  index: ResourceIndex,
  names: readonly string[],
  force: boolean
): TransferSpec[] {
  return names.map((name) => {
    const entry = index.resources.get(name);
    if (!entry) {
      throw new NotFoundError('model', name);
    }
    return toTransferSpec(entry, force);
  });
}
