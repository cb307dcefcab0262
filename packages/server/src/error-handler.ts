/**
 * Capstack Server — Error Mapping
 *
 * Every failure leaves the server as `{ error: WireError }` with a status
 * chosen by the error's class and code. Caller faults map to 4xx, backend
 * faults to 5xx; a result that broke its contract is the provider's fault
 * and maps to 502.
 */

import type { ErrorRequestHandler, RequestHandler } from 'express';
import { RoutingError, toStackError } from '@capstack/core';
import type { StackError, WireError } from '@capstack/core';

export interface ErrorBody {
  readonly error: WireError;
}

/**
 * HTTP status for a stack error.
 *
 * @example
 * httpStatusFor(new NotFoundError('BankId', '...'))   // 404
 * httpStatusFor(new AdapterError('Timeout', '...'))   // 504
 */
export function httpStatusFor(error: StackError): number {
  if (error.code.startsWith('Duplicate')) return 409;

  switch (error.name) {
    case 'ConfigError':
      return 400;
    case 'NotFoundError':
      return 404;
    case 'ChunkingError':
      return 422;
    case 'RoutingError':
      switch (error.code) {
        case 'NoActiveProvider':
        case 'UnknownProvider':
        case 'UnknownCapability':
        case 'UnknownOperation':
        case 'UnknownShield':
          return 404;
        case 'ContractViolation':
          return 502;
        default:
          return 400;
      }
    case 'AdapterError':
      switch (error.code) {
        case 'Timeout':
          return 504;
        case 'Internal':
          return 500;
        default:
          return 502;
      }
    default:
      return error.fault === 'caller' ? 400 : 500;
  }
}

export function errorBody(error: StackError): ErrorBody {
  return { error: error.toWire() };
}

/**
 * Register last. Malformed JSON bodies become InvalidRequest; anything that
 * is not a StackError becomes AdapterError(Internal). Backend faults are
 * reported through `logError`.
 */
export function createErrorHandler(logError: (error: StackError) => void): ErrorRequestHandler {
  return (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const error = isBodyParseError(err)
      ? new RoutingError('InvalidRequest', `Request body is not valid JSON: ${err.message}`, { cause: err })
      : toStackError(err);
    if (error.fault === 'backend') {
      logError(error);
    }
    res.status(httpStatusFor(error)).json(errorBody(error));
  };
}

/** Unmatched routes, in the same error shape as everything else. */
export const notFoundHandler: RequestHandler = (req, res) => {
  const error = new RoutingError('UnknownOperation', `No route for ${req.method} ${req.path}`);
  res.status(404).json(errorBody(error));
};

/** body-parser attaches the raw `body` to the JSON syntax errors it raises. */
function isBodyParseError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && 'body' in err;
}
