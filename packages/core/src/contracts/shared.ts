/**
 * Capstack Core — Contract Primitives
 *
 * A capability contract is a table of operations, each with a zod schema for
 * its request and its result. Contracts are shared by both sides of a call:
 * providers validate requests with them (`handle`), the Router validates
 * results with them, and typed clients parse results with them.
 *
 * Schemas never coerce. A value either matches its schema or the call fails.
 */

import type { z } from 'zod';
import { RoutingError } from '../errors.js';

// ---------------------------------------------------------------------------
// Contract shape
// ---------------------------------------------------------------------------

export interface OperationContract<
  Req extends z.ZodTypeAny = z.ZodTypeAny,
  Res extends z.ZodTypeAny = z.ZodTypeAny,
> {
  readonly request: Req;
  readonly result: Res;
}

/** All operations of one capability group, keyed by operation name. */
export type GroupContract = Readonly<Record<string, OperationContract>>;

export function operation<Req extends z.ZodTypeAny, Res extends z.ZodTypeAny>(
  request: Req,
  result: Res,
): OperationContract<Req, Res> {
  return { request, result };
}

/**
 * Look up an operation by name. Only own keys of the contract count, so
 * `toString` or `constructor` never resolve to an operation.
 */
export function lookupOperation(
  contract: GroupContract,
  name: string,
): OperationContract | undefined {
  return Object.hasOwn(contract, name) ? contract[name] : undefined;
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

/** Per-call routing options. */
export interface DispatchOptions {
  /** Route to this binding instead of the group's active one. */
  readonly provider_id?: string | undefined;
  /** Stop waiting after this many milliseconds and fail with `Timeout`. */
  readonly timeout_ms?: number | undefined;
  /** Caller-side cancellation, forwarded to the adapter. */
  readonly signal?: AbortSignal | undefined;
}

export type Dispatch = (
  capability: string,
  operation: string,
  payload: unknown,
  options?: DispatchOptions,
) => Promise<unknown>;

/** What an adapter receives alongside the payload. */
export interface InvokeOptions {
  /** Aborted when the caller gives up or the deadline passes. */
  readonly signal: AbortSignal;
}

export type OperationHandler = (payload: unknown, options: InvokeOptions) => Promise<unknown>;

/** A complete handler table for a contract: one handler per operation. */
export type OperationTable<C> = { readonly [K in keyof C]: OperationHandler };

// ---------------------------------------------------------------------------
// Server-side helpers
// ---------------------------------------------------------------------------

/**
 * Wrap a typed implementation so it receives a validated request.
 * A payload that does not match the schema fails with `InvalidRequest`.
 */
export function handle<S extends z.ZodTypeAny>(
  schema: S,
  fn: (request: z.output<S>, options: InvokeOptions) => Promise<unknown>,
): OperationHandler {
  return async (payload, options) => {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new RoutingError('InvalidRequest', `Invalid request: ${describeIssues(parsed.error)}`);
    }
    return fn(parsed.data, options);
  };
}

// ---------------------------------------------------------------------------
// Client-side helpers
// ---------------------------------------------------------------------------

/** Dispatch one operation of a fixed group and parse its result. */
export type GroupCall = <S extends z.ZodTypeAny>(
  operation: string,
  payload: unknown,
  result: S,
) => Promise<z.output<S>>;

export function groupCall(
  dispatch: Dispatch,
  capability: string,
  options: DispatchOptions,
): GroupCall {
  return async (operationName, payload, result) => {
    const raw = await dispatch(capability, operationName, payload, options);
    const parsed = result.safeParse(raw);
    if (!parsed.success) {
      throw new RoutingError(
        'ContractViolation',
        `Result of ${capability}.${operationName} does not match its contract: ${describeIssues(parsed.error)}`,
        { capability },
      );
    }
    return parsed.data;
  };
}

/** Render zod issues as `path: message` pairs. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
