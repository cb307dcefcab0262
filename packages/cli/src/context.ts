/**
 * context.ts — what every command shares: output streams, stack home,
 * call-log sinks, opening a stack from a manifest, and error reporting.
 *
 * Environment:
 *   CAPSTACK_HOME   state root (default ~/.capstack)
 *   CAPSTACK_PORT   port for `capstack run` (default 5000)
 *   CAPSTACK_LOG    call-log sinks: console | file | both | none
 *
 * Exit codes: 0 success, 1 caller fault (bad manifest, bad request),
 * 2 backend fault (provider or upstream failure).
 */

import { z } from 'zod';
import { ConfigError, toStackError } from '@capstack/core';
import type { LogSink } from '@capstack/core';
import { loadManifest, resolveManifest } from '@capstack/distribution';
import type { Stack } from '@capstack/distribution';
import { ConsoleLogSink, FileLogSink, FileStateIO, resolveStackHome } from '@capstack/runtime-host';
import { faultColor, t } from './output/theme.js';

// ---------------------------------------------------------------------------
// Output
// ---------------------------------------------------------------------------

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

export const ExitCode = {
  Ok: 0,
  CallerFault: 1,
  BackendFault: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/** 1 for caller faults, 2 for backend faults; unknown errors count as backend. */
export function exitCodeFor(err: unknown): ExitCode {
  return toStackError(err).fault === 'caller' ? ExitCode.CallerFault : ExitCode.BackendFault;
}

/**
 * Print an error and return the exit code it maps to.
 *
 * @example
 * reportError(err, io)  // err: a routed NotFoundError
 * // error: NotFoundError(BankId) [memory/meta0]: Memory bank 'x' does not exist
 */
export function reportError(err: unknown, io: CliIO): ExitCode {
  const error = toStackError(err);
  const origin =
    error.capability !== undefined ? ` [${error.capability}${error.provider_id !== undefined ? `/${error.provider_id}` : ''}]` : '';
  io.err(`${faultColor(error.fault)('error:')} ${error.name}(${error.code})${origin}: ${error.message}`);
  return exitCodeFor(error);
}

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const LogModeSchema = z.enum(['console', 'file', 'both', 'none']);
export type LogMode = z.infer<typeof LogModeSchema>;

/**
 * Read CAPSTACK_LOG, falling back to `fallback` when unset.
 *
 * @throws {ConfigError} InvalidEnvironment for a value outside console|file|both|none
 */
export function logModeFrom(env: NodeJS.ProcessEnv, fallback: LogMode): LogMode {
  const raw = env['CAPSTACK_LOG'];
  if (raw === undefined || raw === '') return fallback;
  const parsed = LogModeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('InvalidEnvironment', `CAPSTACK_LOG must be one of ${LogModeSchema.options.join(', ')}; got '${raw}'`);
  }
  return parsed.data;
}

export function logSinksFor(mode: LogMode, home: string, io: CliIO = consoleIO): LogSink[] {
  const sinks: LogSink[] = [];
  if (mode === 'console' || mode === 'both') {
    sinks.push(new ConsoleLogSink((line) => io.err(line)));
  }
  if (mode === 'file' || mode === 'both') {
    sinks.push(new FileLogSink(new FileStateIO(home)));
  }
  return sinks;
}

/**
 * Port precedence: --port flag, CAPSTACK_PORT, manifest `server.port`, 5000.
 *
 * @throws {ConfigError} InvalidEnvironment when the chosen value is not a port number
 */
export function resolvePort(
  flag: string | undefined,
  env: NodeJS.ProcessEnv,
  manifestPort: number | undefined,
  fallback: number,
): number {
  const fromEnv = env['CAPSTACK_PORT'];
  const raw = flag ?? (fromEnv !== undefined && fromEnv !== '' ? fromEnv : undefined);
  if (raw === undefined) return manifestPort ?? fallback;

  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new ConfigError('InvalidEnvironment', `Invalid port '${raw}'`);
  }
  return port;
}

// ---------------------------------------------------------------------------
// Stack
// ---------------------------------------------------------------------------

export interface OpenStackOptions {
  readonly home?: string | undefined;
  readonly logMode: LogMode;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly io?: CliIO | undefined;
}

/**
 * Shut a stack down on a failure path. A shutdown failure is only warned
 * about, so the error that caused the failure is the one reported.
 */
export async function shutdownAfterFailure(stack: Pick<Stack, 'shutdown'>, io: CliIO): Promise<void> {
  try {
    await stack.shutdown();
  } catch (err: unknown) {
    const error = toStackError(err);
    io.err(t.amber(`warning: stack failed to shut down: ${error.name}(${error.code}): ${error.message}`));
  }
}

/** Load the manifest at `path` and assemble its stack. */
export async function openStack(path: string, options: OpenStackOptions): Promise<Stack> {
  const env = options.env ?? process.env;
  const home = resolveStackHome({ home: options.home, env });
  const manifest = loadManifest(path, { env });
  return resolveManifest(manifest, {
    home,
    logSinks: logSinksFor(options.logMode, home, options.io),
    warn: (message) => (options.io ?? consoleIO).err(t.amber(message)),
  });
}
