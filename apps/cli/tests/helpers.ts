import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Dispatcher } from 'undici';
import { ProgressReporter, type TextSink } from '@modelfetch/acquisition';
import type { CliConfig } from '../src/config/index.js';
import { createContext, type CommandContext } from '../src/lib/context.js';

export class MemorySink implements TextSink {
  chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  text(): string {
    return this.chunks.join('');
  }
}

export interface TestContext {
  dir: string;
  context: CommandContext;
  out: MemorySink;
  err: MemorySink;
}

/**
* Context over a fresh temporary home directory
*/
export async function createTestContext(dispatcher?: Dispatcher): Promise<TestContext> {
  const dir = await mkdtemp(join(tmpdir(), 'modelfetch-cli-'));
  const config: CliConfig = {
    homeDir: dir,
    indexFile: join(dir, '.model-index.json'),
    tokensFile: join(dir, '.model-tokens.json'),
    partialFiles: 'keep',
    debug: false,
  };
  const out = new MemorySink();
  const err = new MemorySink();
  const context = createContext(config, {
    reporter: new ProgressReporter({ out, err }),
    dispatcher,
  });
  return { dir, context, out, err };
}
