/**
 * @capstack/server
 *
 * Express app and listener exposing a Stack over HTTP.
 */

export type { AppOptions } from './app.js';
export { DEFAULT_BODY_LIMIT, createApp } from './app.js';
export type { ServeOptions, RunningServer } from './server.js';
export { DEFAULT_HOST, DEFAULT_PORT, serveStack } from './server.js';
export type { ErrorBody } from './error-handler.js';
export { createErrorHandler, errorBody, httpStatusFor, notFoundHandler } from './error-handler.js';
