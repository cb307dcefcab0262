/**
 * capstack providers — List the provider catalog
 */

import { Command } from 'commander';
import { defaultCatalog } from '@capstack/distribution';
import type { CliIO } from '../context.js';
import { ExitCode, consoleIO } from '../context.js';
import { t } from '../output/theme.js';

export function listProviders(options: { readonly json?: boolean | undefined }, io: CliIO): ExitCode {
  const specs = defaultCatalog().list();

  if (options.json === true) {
    io.out(
      JSON.stringify(
        specs.map((spec) => ({
          capability: spec.capability,
          provider_type: spec.provider_type,
          kind: spec.kind,
          dependencies: spec.dependencies,
          description: spec.description,
        })),
        null,
        2,
      ),
    );
    return ExitCode.Ok;
  }

  for (const spec of specs) {
    const deps = spec.dependencies.length > 0 ? t.dim(`  needs ${spec.dependencies.join(', ')}`) : '';
    io.out(`  ${t.white(spec.capability.padEnd(10))} ${t.blue(spec.provider_type.padEnd(24))} ${t.muted(spec.description)}${deps}`);
  }
  return ExitCode.Ok;
}

export const providersCommand = new Command('providers')
  .description('List every provider type a manifest can bind')
  .option('--json', 'Output as JSON')
  .action((options: { json?: boolean }) => {
    process.exitCode = listProviders(options, consoleIO);
  });
