/**
 * Credential Store
 * 
 * Hostname to bearer token table. Lookups match the hostname exactly;
 * there is no wildcard or parent-domain matching.
 */

export class CredentialStore {
  private tokens: Map<string, string>;

  constructor(tokens: Iterable<readonly [string, string]> = []) {
    this.tokens = new Map(tokens);
  }

  lookup(hostname: string): string | undefined {
    return this.tokens.get(hostname);
  }

  set(hostname: string, token: string): void {
    this.tokens.set(hostname, token);
  }

  hostnames(): string[] {
    return [...this.tokens.keys()].sort();
  }

  /**
   * Authorization header for a URL's host, if a token is registered
   */
  authorizationFor(url: URL): Record<string, string> {
    const token = this.lookup(url.hostname);
    return token === undefined ? {} : { authorization: `Bearer ${token}` };
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.tokens);
  }
}
