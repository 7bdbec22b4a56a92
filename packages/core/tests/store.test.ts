import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { IndexStore } from '../src/store/indexStore.js';
import { TokenStore } from '../src/store/tokenStore.js';
import { CredentialStore } from '../src/credentials.js';
import { ConfigurationError } from '../src/errors/index.js';
import { createEmptyIndex } from '../src/types/index.js';

describe('Persistence', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'modelfetch-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('IndexStore', () => {
    it('should load an empty index when the file is missing', async () => {
      const index = await new IndexStore(join(dir, 'index.json')).load();

      expect(index.resources.size).toBe(0);
      expect(index.groups.size).toBe(0);
    });

    it('should write the models/groups document layout', async () => {
      const file = join(dir, 'index.json');
      const index = createEmptyIndex();
      index.resources.set('vae', { name: 'vae', url: 'https://example.test/vae.bin', destinationDir: 'models/vae', extract: true });
      index.groups.set('base', ['vae']);

      await new IndexStore(file).save(index);

      expect(JSON.parse(await readFile(file, 'utf8'))).toEqual({
        models: { vae: { url: 'https://example.test/vae.bin', subdirectory: 'models/vae', unzip: true } },
        groups: { base: ['vae'] },
      });
    });

    it('should default a missing unzip flag to false', async () => {
      const file = join(dir, 'index.json');
      await writeFile(file, JSON.stringify({
        models: { ckpt: { url: 'https://example.test/ckpt', subdirectory: 'models' } },
        groups: {},
      }));

      const index = await new IndexStore(file).load();

      expect(index.resources.get('ckpt')).toEqual({
        name: 'ckpt',
        url: 'https://example.test/ckpt',
        destinationDir: 'models',
        extract: false,
      });
    });

    it('should reject a document that is not JSON', async () => {
      const file = join(dir, 'index.json');
      await writeFile(file, '{ not json');

      await expect(new IndexStore(file).load()).rejects.toThrow(ConfigurationError);
    });

    it('should reject a document with the wrong shape', async () => {
      const file = join(dir, 'index.json');
      await writeFile(file, JSON.stringify({ models: { bad: { url: 42 } } }));

      await expect(new IndexStore(file).load()).rejects.toThrow('unexpected shape at models.bad.url');
    });
  });

  describe('TokenStore', () => {
    it('should round-trip tokens as a flat object', async () => {
      const file = join(dir, 'tokens.json');
      const store = new TokenStore(file);

      await store.save(new CredentialStore([['host.test', 'test-secret']]));

      expect(await readFile(file, 'utf8')).toBe('{\n  "host.test": "test-secret"\n}');
      expect((await store.load()).lookup('host.test')).toBe('test-secret');
    });

    it('should create the token file readable by the owner only', async () => {
      const file = join(dir, 'tokens.json');
      await new TokenStore(file).save(new CredentialStore());

      const { mode } = await stat(file);
      expect(mode & 0o777).toBe(0o600);
    });
  });
});
