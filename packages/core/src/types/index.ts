/**
 * Index Types
 */

export interface ResourceEntry {
  name: string;
  url: string;
  destinationDir: string;
  extract: boolean;
}

/**
 * In-memory view of the persisted index. Resource and group names may
 * overlap; expansion treats a name as a group first.
 */
export interface ResourceIndex {
  resources: Map<string, ResourceEntry>;
  groups: Map<string, string[]>;
}

/**
 * One unit of work for the transfer pipeline
 */
export interface TransferSpec {
  name: string;
  url: string;
  destinationDir: string;
  force: boolean;
  extract: boolean;
}

export function createEmptyIndex(): ResourceIndex {
  return { resources: new Map(), groups: new Map() };
}

/**
 * Build the transfer for a registered entry
 */
export function toTransferSpec(entry: ResourceEntry, force: boolean): TransferSpec {
  return {
    name: entry.name,
    url: entry.url,
    destinationDir: entry.destinationDir,
    force,
    extract: entry.extract,
  };
}
