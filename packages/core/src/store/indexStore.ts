/**
 * Index Store
 * 
 * Persists the resource index as
 * { "models": { name: { url, subdirectory, unzip } }, "groups": { name: [members] } }.
 */

import { z } from 'zod';
import { JsonDocument } from './jsonDocument.js';
import { createEmptyIndex, type ResourceIndex } from '../types/index.js';

const modelRecordSchema = z.object({
  url: z.string(),
  subdirectory: z.string(),
  unzip: z.boolean().default(false),
});

const indexDocumentSchema = z.object({
  models: z.record(modelRecordSchema).default({}),
  groups: z.record(z.array(z.string())).default({}),
});

export type IndexDocument = z.infer<typeof indexDocumentSchema>;

export function fromDocument(document: IndexDocument): ResourceIndex {
  const index = createEmptyIndex();
  for (const [name, record] of Object.entries(document.models)) {
    index.resources.set(name, {
      name,
      url: record.url,
      destinationDir: record.subdirectory,
      extract: record.unzip,
    });
  }
  for (const [name, members] of Object.entries(document.groups)) {
    index.groups.set(name, members);
  }
  return index;
}

export function toDocument(index: ResourceIndex): IndexDocument {
  const models: IndexDocument['models'] = {};
  for (const [name, entry] of index.resources) {
    models[name] = {
      url: entry.url,
      subdirectory: entry.destinationDir,
      unzip: entry.extract,
    };
  }
  return { models, groups: Object.fromEntries(index.groups) };
}

export class IndexStore {
  private document: JsonDocument<typeof indexDocumentSchema>;

  constructor(filePath: string) {
    this.document = new JsonDocument(
      filePath,
      indexDocumentSchema,
      () => ({ models: {}, groups: {} })
    );
  }

  get filePath(): string {
    return this.document.filePath;
  }

  async load(): Promise<ResourceIndex> {
    return fromDocument(await this.document.load());
  }

  async save(index: ResourceIndex): Promise<void> {
    await this.document.save(toDocument(index));
  }
}
