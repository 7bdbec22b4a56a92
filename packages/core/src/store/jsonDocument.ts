/**
 * JSON Document Store
 * 
 * Whole-document load and save for small JSON files. No locking: two
 * processes saving the same file race and the last writer wins.
 */

import type { z } from 'zod';
import { safeReadFile, safeWriteFile, createLogger } from '@modelfetch/utils';
import { ConfigurationError } from '../errors/index.js';

const log = createLogger({ component: 'store' });

export interface JsonDocumentOptions {
  /** File mode enforced on every save */
  mode?: number;
}

export class JsonDocument<S extends z.ZodTypeAny> {
  constructor(
    public readonly filePath: string,
    private readonly schema: S,
    private readonly empty: () => z.output<S>,
    private readonly options: JsonDocumentOptions = {}
  ) {}

  /**
   * Read and validate the document. A missing file yields the empty document.
   */
  async load(): Promise<z.output<S>> {
    const content = await safeReadFile(this.filePath);
    if (content === null) {
      log.debug({ file: this.filePath }, 'Document missing, using empty');
      return this.empty();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `${this.filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { file: this.filePath }
      );
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      throw new ConfigurationError(
        `${this.filePath} has an unexpected shape${where}: ${issue?.message ?? 'invalid'}`,
        { file: this.filePath }
      );
    }
    return parsed.data;
  }

  /**
   * Overwrite the whole document
   */
  async save(document: z.input<S>): Promise<void> {
    await safeWriteFile(
      this.filePath,
      JSON.stringify(document, null, 2),
      { mode: this.options.mode }
    );
    log.debug({ file: this.filePath }, 'Document saved');
  }
}
