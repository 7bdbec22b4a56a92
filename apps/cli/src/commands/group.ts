/**
 * Group Command
 * 
 * Saves a named group of resource or group names, or deletes the group
 * when no members are given.
 */

import { deleteGroup, saveGroup } from '@modelfetch/core';
import type { CommandContext } from '../lib/context.js';
import { printSuccess } from '../lib/output.js';

interface GroupOptions {
  group: string;
}

export async function groupCommand(
  members: string[],
  options: GroupOptions,
  context: CommandContext
): Promise<void> {
  const index = await context.indexStore.load();

  if (members.length === 0) {
    deleteGroup(index, options.group);
    await context.indexStore.save(index);
    printSuccess(`Deleted group '${options.group}'`);
    return;
  }

  saveGroup(index, options.group, members);
  await context.indexStore.save(index);
  printSuccess(`Saved group '${options.group}': ${members.join(' ')}`);
}
