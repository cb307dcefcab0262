/**
 * capstack run — Serve a stack over HTTP
 *
 * Assembles the stack described by the manifest and serves it until
 * SIGINT or SIGTERM, then closes the listener and shuts every provider down.
 *
 * Call logging defaults to the console; set CAPSTACK_LOG to change it.
 */

import { Command } from 'commander';
import type { Stack } from '@capstack/distribution';
import { DEFAULT_HOST, DEFAULT_PORT, serveStack } from '@capstack/server';
import type { RunningServer } from '@capstack/server';
import type { CliIO } from '../context.js';
import { consoleIO, logModeFrom, openStack, reportError, resolvePort, shutdownAfterFailure } from '../context.js';
import { activeMark, t } from '../output/theme.js';

export interface RunOptions {
  readonly port?: string | undefined;
  readonly host?: string | undefined;
  readonly home?: string | undefined;
}

/** Resolves with the exit code once the server has stopped. */
export async function runServer(manifestPath: string, options: RunOptions, io: CliIO): Promise<number> {
  const env = process.env;
  let stack: Stack | undefined;
  let running: RunningServer;
  try {
    stack = await openStack(manifestPath, { home: options.home, logMode: logModeFrom(env, 'console'), env, io });
    const settings = stack.manifest.server;
    running = await serveStack(stack, {
      port: resolvePort(options.port, env, settings?.port, DEFAULT_PORT),
      host: options.host ?? settings?.host ?? DEFAULT_HOST,
    });
  } catch (err: unknown) {
    if (stack !== undefined) await shutdownAfterFailure(stack, io);
    return reportError(err, io);
  }

  io.out(`${t.blue('◈ capstack')} serving ${t.white(manifestPath)} at ${t.white(running.url)}`);
  for (const provider of stack.providers()) {
    io.out(`  ${activeMark(provider.active)} ${provider.capability}/${provider.provider_id} ${t.muted(provider.provider_type)}`);
  }

  await new Promise<void>((resolve) => {
    const stop = (): void => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      resolve();
    };
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
  });

  io.out(t.muted('shutting down'));
  try {
    await running.close();
    await stack.shutdown();
    return 0;
  } catch (err: unknown) {
    return reportError(err, io);
  }
}

export const runCommand = new Command('run')
  .description('Serve the stack described by a manifest over HTTP')
  .argument('<manifest>', 'Path to a YAML or JSON manifest')
  .option('--port <port>', 'Port to listen on (default: CAPSTACK_PORT, manifest server.port, or 5000)')
  .option('--host <host>', `Interface to bind (default: manifest server.host or ${DEFAULT_HOST})`)
  .option('--home <dir>', 'State directory (default: CAPSTACK_HOME or ~/.capstack)')
  .action(async (manifest: string, options: { port?: string; host?: string; home?: string }) => {
    process.exitCode = await runServer(manifest, options, consoleIO);
  });
