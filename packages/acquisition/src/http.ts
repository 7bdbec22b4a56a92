/**
 * HTTP Fetching
 * 
 * Single GET per resource over undici, following redirects by hand so the
 * bearer token never travels to an origin other than the one it was issued for.
 */

import { request, type Dispatcher } from 'undici';
import { createLogger } from '@modelfetch/utils';

const log = createLogger({ component: 'http' });

type ResponseHeaders = Dispatcher.ResponseData['headers'];

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
export const MAX_REDIRECTS = 10;

export interface OpenOptions {
  /** Sent to the original origin and to same-origin redirects only */
  authHeaders?: Record<string, string>;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
  maxRedirects?: number;
}

export interface OpenResponse {
  url: URL;
  statusCode: number;
  headers: ResponseHeaders;
  body: Dispatcher.ResponseData['body'];
}

/**
 * First value of a response header
 */
export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Issue a GET and follow redirects up to the limit. Rejects on a final
 * status outside 2xx; the body of every discarded response is drained.
 */
export async function openResponse(url: URL, options: OpenOptions = {}): Promise<OpenResponse> {
  const maxRedirects = options.maxRedirects ?? MAX_REDIRECTS;
  let authHeaders = options.authHeaders ?? {};
  let current = url;

  for (let redirects = 0; ; redirects++) {
    const { statusCode, headers, body } = await request(current, {
      method: 'GET',
      headers: { ...authHeaders },
      dispatcher: options.dispatcher,
      signal: options.signal,
    });

    if (REDIRECT_STATUSES.has(statusCode)) {
      await body.dump();
      const location = headerValue(headers, 'location');
      if (!location) {
        throw new Error(`HTTP ${statusCode} without a Location header from ${current.href}`);
      }
      if (redirects >= maxRedirects) {
        throw new Error(`too many redirects (more than ${maxRedirects})`);
      }

      const next = new URL(location, current);
      // Scheme and port count too, so a downgrade to http never carries the token
      if (next.origin !== url.origin && Object.keys(authHeaders).length > 0) {
        log.debug({ from: url.origin, to: next.origin }, 'Dropping credentials on cross-origin redirect');
        authHeaders = {};
      }
      current = next;
      continue;
    }

    if (statusCode < 200 || statusCode >= 300) {
      await body.dump();
      throw new Error(`HTTP ${statusCode} from ${current.href}`);
    }

    return { url: current, statusCode, headers, body };
  }
}
