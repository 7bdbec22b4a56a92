import { CredentialStore } from '../src/credentials.js';

describe('CredentialStore', () => {
  const store = new CredentialStore([
    ['huggingface.test', 'test-secret'],
    ['api.civit.test', 'other-secret'],
  ]);

  it('should match hostnames exactly', () => {
    expect(store.lookup('huggingface.test')).toBe('test-secret');
    expect(store.lookup('cdn.huggingface.test')).toBeUndefined();
    expect(store.lookup('civit.test')).toBeUndefined();
  });

  it('should build a bearer header for a registered host only', () => {
    expect(store.authorizationFor(new URL('https://huggingface.test/x.bin'))).toEqual({
      authorization: 'Bearer test-secret',
    });
    expect(store.authorizationFor(new URL('https://unregistered.test/x.bin'))).toEqual({});
  });

  it('should list hostnames sorted', () => {
    expect(store.hostnames()).toEqual(['api.civit.test', 'huggingface.test']);
  });

  it('should replace the token for a host', () => {
    const local = new CredentialStore();
    local.set('host.test', 'one');
    local.set('host.test', 'two');

    expect(local.toRecord()).toEqual({ 'host.test': 'two' });
  });
});
