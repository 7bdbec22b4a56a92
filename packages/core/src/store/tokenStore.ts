/**
 * Token Store
 * 
 * Persists the hostname to token table as a flat JSON object.
 * Written with owner-only permissions.
 */

import { z } from 'zod';
import { JsonDocument } from './jsonDocument.js';
import { CredentialStore } from '../credentials.js';

const tokenDocumentSchema = z.record(z.string());

export class TokenStore {
  private document: JsonDocument<typeof tokenDocumentSchema>;

  constructor(filePath: string) {
    this.document = new JsonDocument(
      filePath,
      tokenDocumentSchema,
      () => ({}),
      { mode: 0o600 }
    );
  }

  get filePath(): string {
    return this.document.filePath;
  }

  async load(): Promise<CredentialStore> {
    const tokens = await this.document.load();
    return new CredentialStore(Object.entries(tokens));
  }

  async save(credentials: CredentialStore): Promise<void> {
    await this.document.save(credentials.toRecord());
  }
}
