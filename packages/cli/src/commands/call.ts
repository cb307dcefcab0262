/**
 * capstack call — Invoke one capability operation
 *
 *   capstack call memory query_documents '{"bank_id":"notes","query":["x"]}' --manifest run.yaml
 *   capstack call inference list_models --url http://127.0.0.1:5000
 *
 * With --manifest the stack is assembled in-process for the one call; with
 * --url the call goes to a running server. The result is printed as JSON.
 */

import { Command } from 'commander';
import { HttpTransport } from '@capstack/runtime-host';
import type { CliIO } from '../context.js';
import { ExitCode, consoleIO, logModeFrom, openStack, reportError, shutdownAfterFailure } from '../context.js';

export const DEFAULT_CALL_TIMEOUT_MS = 60_000;

export interface CallOptions {
  readonly manifest?: string | undefined;
  readonly url?: string | undefined;
  readonly provider?: string | undefined;
  readonly timeout?: string | undefined;
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Injected for tests; defaults to the global fetch. */
  readonly fetch?: typeof fetch | undefined;
}

export async function callOperation(
  capability: string,
  operation: string,
  payloadText: string | undefined,
  options: CallOptions,
  io: CliIO,
): Promise<ExitCode> {
  let payload: unknown = {};
  if (payloadText !== undefined) {
    try {
      payload = JSON.parse(payloadText);
    } catch (err: unknown) {
      io.err(`error: payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
      return ExitCode.CallerFault;
    }
  }

  const timeoutMs = options.timeout !== undefined ? Number(options.timeout) : DEFAULT_CALL_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    io.err(`error: --timeout must be a positive number of milliseconds, got '${options.timeout ?? ''}'`);
    return ExitCode.CallerFault;
  }
  const { manifest, url } = options;
  if ((manifest === undefined) === (url === undefined)) {
    io.err('error: pass exactly one of --manifest or --url');
    return ExitCode.CallerFault;
  }

  try {
    let result: unknown;
    if (manifest !== undefined) {
      result = await callLocal(manifest, capability, operation, payload, timeoutMs, options, io);
    } else if (url !== undefined) {
      result = await callRemote(url, capability, operation, payload, timeoutMs, options.fetch);
    }
    io.out(JSON.stringify(result, null, 2));
    return ExitCode.Ok;
  } catch (err: unknown) {
    return reportError(err, io);
  }
}

async function callRemote(
  url: string,
  capability: string,
  operation: string,
  payload: unknown,
  timeoutMs: number,
  fetchImpl: typeof fetch | undefined,
): Promise<unknown> {
  const transport = new HttpTransport({
    base_url: url,
    timeout_ms: timeoutMs,
    structured_errors: true,
    fetch: fetchImpl,
  });
  return transport.postJson(`/${encodeURIComponent(capability)}/${encodeURIComponent(operation)}`, payload);
}

async function callLocal(
  manifest: string,
  capability: string,
  operation: string,
  payload: unknown,
  timeoutMs: number,
  options: CallOptions,
  io: CliIO,
): Promise<unknown> {
  const env = options.env ?? process.env;
  const stack = await openStack(manifest, { home: options.home, logMode: logModeFrom(env, 'file'), env, io });
  let result: unknown;
  try {
    result = await stack.dispatch(capability, operation, payload, {
      provider_id: options.provider,
      timeout_ms: timeoutMs,
    });
  } catch (err: unknown) {
    await shutdownAfterFailure(stack, io);
    throw err;
  }
  await stack.shutdown();
  return result;
}

export const callCommand = new Command('call')
  .description('Invoke one capability operation and print its JSON result')
  .argument('<capability>', 'Capability group, e.g. inference')
  .argument('<operation>', 'Operation name, e.g. chat_completion')
  .argument('[payload]', 'JSON request body', '{}')
  .option('--manifest <path>', 'Assemble the stack from this manifest for the call')
  .option('--url <url>', 'Send the call to a running capstack server')
  .option('--provider <id>', 'Route to this binding instead of the active one (--manifest only)')
  .option('--timeout <ms>', 'Give up after this many milliseconds', String(DEFAULT_CALL_TIMEOUT_MS))
  .option('--home <dir>', 'State directory (default: CAPSTACK_HOME or ~/.capstack)')
  .action(
    async (
      capability: string,
      operation: string,
      payload: string,
      options: { manifest?: string; url?: string; provider?: string; timeout?: string; home?: string },
    ) => {
      process.exitCode = await callOperation(capability, operation, payload, options, consoleIO);
    },
  );
