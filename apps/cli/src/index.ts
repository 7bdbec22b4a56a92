#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for modelfetch.
 * Commands load the index and token documents, act on them in memory and
 * save them back whole.
 */

import { Argument, Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { isModelFetchError } from '@modelfetch/core';
import { logger, setLogLevel } from '@modelfetch/utils';

import { loadConfigOrReport } from './lib/startup.js';
import { createContext, type CommandContext } from './lib/context.js';
import { printError } from './lib/output.js';
import { tokenCommand } from './commands/token.js';
import { groupCommand } from './commands/group.js';
import { downloadCommand, type DownloadOptions } from './commands/download.js';
import { listCommand, listKinds, type ListKind } from './commands/list.js';

function parseJobCount(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return jobs;
}

/**
 * Run a command action, turning thrown errors into a message and exit code
 */
async function runAction(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    if (isModelFetchError(error)) {
      printError(error.message);
      logger.debug({ code: error.code, details: error.details }, 'Command failed');
      process.exitCode = error.exitCode;
      return;
    }
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

const config = loadConfigOrReport();
if (!config) {
  process.exit(1);
}
if (config.debug) {
  setLogLevel('debug');
}

// ============================================
// CANCELLATION
// ============================================

const abortController = new AbortController();
process.once('SIGINT', () => {
  console.error(chalk.yellow('\nAborting downloads (Ctrl-C)'));
  abortController.abort();
  process.once('SIGINT', () => process.exit(130));
});

const context: CommandContext = createContext(config, { signal: abortController.signal });

const program = new Command();

program
  .name('modelfetch')
  .description('Download named resources and groups with per-host bearer tokens')
  .version('1.0.0');

// ============================================
// INDEX COMMANDS
// ============================================

program
  .command('token <hostname> <token>')
  .description('Store a bearer token for a hostname')
  .action((hostname: string, token: string) =>
    runAction(() => tokenCommand(hostname, token, context))
  );

program
  .command('group [members...]')
  .description('Save a group of model or group names; without members, delete the group')
  .requiredOption('-g, --group <name>', 'Group name')
  .action((members: string[], options: { group: string }) =>
    runAction(() => groupCommand(members, options, context))
  );

program
  .command('list')
  .description('List registered tokens, downloads or groups')
  .addArgument(new Argument('<kind>', 'What to list').choices(listKinds))
  .action((kind: ListKind) => runAction(() => listCommand(kind, context)));

// ============================================
// DOWNLOAD COMMANDS
// ============================================

program
  .command('dl <names...>')
  .description('Download models or groups by name')
  .option('-u, --url <url>', 'URL for a single ad-hoc download (saved to the index)')
  .option('-d, --subdirectory <dir>', 'Destination directory for the ad-hoc download')
  .option('-j, --jobs <count>', 'Number of parallel downloads', parseJobCount)
  .option('-f, --force', 'Overwrite files that already exist')
  .option('-z, --unzip', 'Unzip the downloaded zip file in place')
  .action((names: string[], options: DownloadOptions) =>
    runAction(() => downloadCommand(names, options, context))
  );

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('modelfetch --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  printError(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
