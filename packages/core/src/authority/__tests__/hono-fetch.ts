import type { Hono } from 'hono';
import type { FetchFn } from '../remote-authority-client.js';

/**
 * Route client requests into a Hono app, honoring the abort signal like a real fetch
 */
export function honoFetch(app: Hono): FetchFn {
  return (input, init) =>
    new Promise<Response>((resolve, reject) => {
      const signal = init.signal;
      signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
      Promise.resolve(app.fetch(new Request(input, init))).then(resolve, reject);
    });
}
