/**
 * Capstack Server — Listener
 */

import type { Server } from 'node:http';
import type { Stack } from '@capstack/distribution';
import type { AppOptions } from './app.js';
import { createApp } from './app.js';

export const DEFAULT_PORT = 5000;
export const DEFAULT_HOST = '127.0.0.1';

export interface ServeOptions extends AppOptions {
  /** 0 picks a free port. */
  readonly port?: number | undefined;
  readonly host?: string | undefined;
}

export interface RunningServer {
  readonly server: Server;
  /** Base URL, e.g. `http://127.0.0.1:5000`. */
  readonly url: string;
  /** Stop accepting connections and wait for open ones to finish. */
  close(): Promise<void>;
}

export function serveStack(stack: Stack, options: ServeOptions = {}): Promise<RunningServer> {
  const app = createApp(stack, options);
  const host = options.host ?? DEFAULT_HOST;

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port ?? DEFAULT_PORT, host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : options.port;
      resolve({
        server,
        url: `http://${host}:${port ?? DEFAULT_PORT}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err === undefined ? done() : fail(err)));
          }),
      });
    });
  });
}
