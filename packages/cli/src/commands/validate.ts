/**
 * capstack validate — Check a manifest by assembling its stack
 *
 * Runs the full resolution (schema, catalog lookup, provider configs,
 * dependencies, initialize) and shuts the stack down again. Nothing is
 * served and no calls are logged.
 */

import { Command } from 'commander';
import type { ProviderListing } from '@capstack/core';
import type { CliIO } from '../context.js';
import { ExitCode, consoleIO, openStack, reportError } from '../context.js';
import { activeMark, t } from '../output/theme.js';

export interface ValidateOptions {
  readonly home?: string | undefined;
  readonly json?: boolean | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export async function validateManifest(path: string, options: ValidateOptions, io: CliIO): Promise<ExitCode> {
  let providers: ReadonlyArray<ProviderListing>;
  let apis: ReadonlyArray<string>;
  try {
    const stack = await openStack(path, { home: options.home, logMode: 'none', env: options.env, io });
    providers = stack.providers();
    apis = stack.manifest.apis;
    await stack.shutdown();
  } catch (err: unknown) {
    return reportError(err, io);
  }

  if (options.json === true) {
    io.out(JSON.stringify({ valid: true, apis, providers }, null, 2));
    return ExitCode.Ok;
  }

  io.out(`${t.green('✓')} ${path} is valid`);
  for (const provider of providers) {
    const idPad = ' '.repeat(Math.max(1, 16 - provider.provider_id.length));
    io.out(
      `  ${activeMark(provider.active)} ${t.white(provider.capability.padEnd(10))} ${provider.provider_id}${idPad}${t.muted(provider.provider_type)}`,
    );
  }
  return ExitCode.Ok;
}

export const validateCommand = new Command('validate')
  .description('Validate a manifest by assembling (and then shutting down) its stack')
  .argument('<manifest>', 'Path to a YAML or JSON manifest')
  .option('--home <dir>', 'State directory (default: CAPSTACK_HOME or ~/.capstack)')
  .option('--json', 'Output as JSON')
  .action(async (manifest: string, options: { home?: string; json?: boolean }) => {
    process.exitCode = await validateManifest(manifest, options, consoleIO);
  });
