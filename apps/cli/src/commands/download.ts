/**
 * Download Command
 * 
 * Resolves names and groups, then fetches every resource on the scheduler.
 * With -u/-d it registers a single resource and fetches it directly.
 */

import ora from 'ora';
import {
  buildTransfers,
  ConfigurationError,
  expandNames,
  registerResource,
  type ResourceIndex,
} from '@modelfetch/core';
import { DownloadScheduler, Transfer } from '@modelfetch/acquisition';
import type { CommandContext } from '../lib/context.js';

export interface DownloadOptions {
  url?: string;
  subdirectory?: string;
  jobs?: number;
  force?: boolean;
  unzip?: boolean;
}

interface AdHocResource {
  name: string;
  url: string;
  subdirectory: string;
}

/**
 * Validate the -u/-d combination; null when neither flag is given
 */
export function adHocResource(names: readonly string[], options: DownloadOptions): AdHocResource | null {
  if (options.url === undefined && options.subdirectory === undefined) {
    return null;
  }
  const [name] = names;
  if (names.length !== 1 || name === undefined) {
    throw new ConfigurationError('-u / -d require exactly one model name');
  }
  if (options.url === undefined || options.subdirectory === undefined) {
    throw new ConfigurationError('-u and -d must be used together');
  }
  if (options.jobs !== undefined) {
    throw new ConfigurationError('-j cannot be used with -u / -d');
  }
  return { name, url: options.url, subdirectory: options.subdirectory };
}

export async function downloadCommand(
  names: string[],
  options: DownloadOptions,
  context: CommandContext
): Promise<void> {
  const { reporter } = context;
  const spinner = ora({ text: `Resolving ${names.length} name(s)...`, stream: process.stderr }).start();

  let index: ResourceIndex;
  let expanded: string[];
  try {
    index = await context.indexStore.load();
    // Traced as it happens, so a cycle shows the path that led to it
    expanded = expandNames(index, names, {
      onGroupExpanded: (group, members) => {
        reporter.report({ type: 'notice', message: `Group '${group}' expanded to: ${members.join(' ')}` });
      },
    });
    spinner.succeed(`Resolved ${expanded.length} download(s)`);
  } catch (error) {
    spinner.fail('Could not resolve names');
    throw error;
  }

  const transfer = new Transfer({
    credentials: await context.tokenStore.load(),
    reporter,
    dispatcher: context.dispatcher,
    partialFiles: context.partialFiles,
  });

  const adHoc = adHocResource(expanded, options);
  if (adHoc) {
    // Registered before fetching, so the entry stays even if the download fails
    registerResource(index, {
      name: adHoc.name,
      url: adHoc.url,
      destinationDir: adHoc.subdirectory,
      extract: options.unzip === true,
    });
    await context.indexStore.save(index);

    await transfer.run(
      {
        name: adHoc.name,
        url: adHoc.url,
        destinationDir: adHoc.subdirectory,
        force: options.force === true,
        extract: options.unzip === true,
      },
      context.signal
    );
    return;
  }

  const tasks = buildTransfers(index, expanded, options.force === true);
  const scheduler = new DownloadScheduler(
    (spec, signal) => transfer.run(spec, signal),
    { reporter, signal: context.signal }
  );
  await scheduler.runAll(tasks, options.jobs);
}
