/**
 * Capstack Core — Request Router
 *
 * The Router is the single path between a caller and a provider adapter.
 * Every capability call, whether it comes from the HTTP server, the CLI, an
 * in-process client, or another provider, is dispatched here.
 *
 * Dispatch contract:
 * - Resolves the group contract and the operation; unknown names fail
 *   before any adapter is touched
 * - Resolves the adapter from the registry (active or explicitly named)
 * - Forwards the payload unchanged
 * - Validates the adapter's result against the operation's result schema;
 *   a mismatch is `ContractViolation`, never coerced
 * - Annotates every failure with the capability and provider id
 * - Records exactly one CallRecord per dispatch, in a finally block
 *
 * Nothing here retries. A `timeout_ms` deadline abandons the pending result
 * and aborts the signal handed to the adapter.
 */

import { isCapabilityGroup } from '../types/capability.js';
import type { CallRecord } from '../types/call.js';
import { CONTRACTS } from '../contracts/index.js';
import type { DispatchOptions } from '../contracts/shared.js';
import { describeIssues, lookupOperation } from '../contracts/shared.js';
import type { ProviderAdapter } from '../adapters/index.js';
import { AdapterError, RoutingError, toStackError } from '../errors.js';
import type { StackError } from '../errors.js';
import type { LogSink } from '../logging/log-sink.js';
import { CallLogger } from '../logging/call-log.js';
import type { ProviderRegistry } from './registry.js';

export class Router {
  private readonly logger: CallLogger;

  constructor(
    private readonly registry: ProviderRegistry,
    logSinks: ReadonlyArray<LogSink> = [],
  ) {
    this.logger = new CallLogger(logSinks);
  }

  /**
   * Dispatch one capability call.
   *
   * @returns the adapter's result, exactly as the adapter produced it
   * @throws {StackError} annotated with capability and provider id
   */
  async dispatch(
    capability: string,
    operation: string,
    payload: unknown,
    options: DispatchOptions = {},
  ): Promise<unknown> {
    const timestamp = new Date().toISOString();
    const started = performance.now();
    let providerId: string | null = null;
    let failure: StackError | undefined;

    try {
      if (!isCapabilityGroup(capability)) {
        throw new RoutingError('UnknownCapability', `Unknown capability '${capability}'`);
      }
      const contract = lookupOperation(CONTRACTS[capability], operation);
      if (contract === undefined) {
        throw new RoutingError('UnknownOperation', `Capability '${capability}' has no operation '${operation}'`);
      }

      const adapter = this.registry.resolve(capability, options.provider_id);
      providerId = adapter.provider_id;

      const result = await this.invoke(adapter, operation, payload, options);

      const checked = contract.result.safeParse(result);
      if (!checked.success) {
        throw new RoutingError(
          'ContractViolation',
          `Result of ${capability}.${operation} does not match its contract: ${describeIssues(checked.error)}`,
        );
      }
      return result;
    } catch (err: unknown) {
      failure = toStackError(err).annotate(capability, providerId ?? options.provider_id);
      throw failure;
    } finally {
      const record: CallRecord = {
        timestamp,
        capability,
        operation,
        provider_id: providerId,
        outcome: failure === undefined ? 'ok' : 'error',
        ...(failure !== undefined ? { error_type: failure.name, error_code: failure.code } : {}),
        duration_ms: Math.round(performance.now() - started),
      };
      this.logger.record(record);
    }
  }

  /**
   * Invoke the adapter with a signal that fires when the caller aborts or
   * the deadline passes. Past the deadline the adapter's eventual result
   * is discarded.
   */
  private async invoke(
    adapter: ProviderAdapter,
    operation: string,
    payload: unknown,
    options: DispatchOptions,
  ): Promise<unknown> {
    const controller = new AbortController();
    const callerSignal = options.signal;
    const forwardAbort = (): void => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted === true) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const pending = adapter.invoke(operation, payload, { signal: controller.signal });
    const timeoutMs = options.timeout_ms;
    let timer: NodeJS.Timeout | undefined;

    try {
      if (timeoutMs === undefined) {
        return await pending;
      }
      const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
          const error = new AdapterError('Timeout', `No result within ${timeoutMs} ms`);
          reject(error);
          controller.abort(error);
        }, timeoutMs);
      });
      // Promise.race keeps a handler on `pending`, so a late rejection is not unhandled.
      return await Promise.race([pending, deadline]);
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', forwardAbort);
    }
  }
}
