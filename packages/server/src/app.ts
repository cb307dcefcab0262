/**
 * Capstack Server — HTTP App
 *
 * Exposes one stack over the capability wire protocol:
 *
 *   POST /<capability>/<operation>   JSON body = named parameters, 200 + JSON result
 *   GET  /health                     liveness
 *   GET  /providers                  bindings, with the active one per group
 *
 * The body is handed to the router unchanged; validation happens in the
 * adapter that serves the call. A client that disconnects aborts the
 * signal passed down to the adapter.
 */

import express from 'express';
import type { Express } from 'express';
import type { StackError } from '@capstack/core';
import type { Stack } from '@capstack/distribution';
import { createErrorHandler, notFoundHandler } from './error-handler.js';

export const DEFAULT_BODY_LIMIT = '10mb';

export interface AppOptions {
  readonly bodyLimit?: string | undefined;
  /** Receives backend faults before they are sent to the client. */
  readonly logError?: ((error: StackError) => void) | undefined;
}

export function createApp(stack: Stack, options: AppOptions = {}): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: options.bodyLimit ?? DEFAULT_BODY_LIMIT }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/providers', (_req, res) => {
    res.json({ providers: stack.providers() });
  });

  app.post('/:capability/:operation', async (req, res, next) => {
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const { capability, operation } = req.params;
      const payload: unknown = req.body ?? {};
      const result = await stack.dispatch(capability, operation, payload, { signal: controller.signal });
      res.json(result);
    } catch (err: unknown) {
      next(err);
    }
  });

  app.use(notFoundHandler);
  app.use(
    createErrorHandler(
      options.logError ??
        ((error) => console.error(`[capstack-server] ${error.name}(${error.code}): ${error.message}`)),
    ),
  );
  return app;
}
