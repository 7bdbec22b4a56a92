/**
 * Name Resolver
 * 
 * Expands requested names into an ordered list of leaf resource names.
 * Groups are expanded depth-first, left to right. Leaves are not checked
 * against the resource table here; unknown names fail at lookup time.
 */

import { createLogger } from '@modelfetch/utils';
import { CycleError } from './errors/index.js';
import type { ResourceIndex } from './types/index.js';

const log = createLogger({ component: 'resolver' });

export interface ExpandOptions {
  /** Called once per group expansion with the group's direct members */
  onGroupExpanded?: (group: string, members: readonly string[]) => void;
}

/**
 * Walk state for one expandNames call
 */
interface ExpansionState {
  /** Groups on the current recursion path */
  visiting: string[];
  /** Leaves in visit order, duplicates included */
  leaves: string[];
}

/**
 * Remove repeated names, keeping the first occurrence
 */
export function dedupe(names: Iterable<string>): string[] {
  return [...new Set(names)];
}

function expandName(
  index: ResourceIndex,
  name: string,
  state: ExpansionState,
  options: ExpandOptions
): void {
  if (state.visiting.includes(name)) {
    throw new CycleError(name, state.visiting);
  }

  const members = index.groups.get(name);
  if (members === undefined) {
    state.leaves.push(name);
    return;
  }

  state.visiting.push(name);
  log.debug({ group: name, members }, 'Group expanded');
  options.onGroupExpanded?.(name, members);
  for (const member of members) {
    expandName(index, member, state, options);
  }
  state.visiting.pop();
}

/**
 * Expand group names into leaf names.
 *
 * @throws CycleError when a group is reached again while it is still being expanded
 */
export function expandNames(
  index: ResourceIndex,
  requested: readonly string[],
  options: ExpandOptions = {}
): string[] {
  const state: ExpansionState = { visiting: [], leaves: [] };

  for (const name of dedupe(requested)) {
    expandName(index, name, state, options);
  }

  return dedupe(state.leaves);
}
