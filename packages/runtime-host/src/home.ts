/**
 * Capstack Runtime Host — CAPSTACK_HOME Resolution
 *
 * Precedence:
 *   1. Explicit `home` option (the CLI's --home flag)
 *   2. CAPSTACK_HOME environment variable
 *   3. Default: ~/.capstack
 *
 * Layout under the resolved home:
 *
 *   <CAPSTACK_HOME>/
 *     logs/calls.jsonl         — one record per routed call
 *     logs/telemetry.jsonl     — telemetry events
 *     state/agents.json        — agents, sessions and turns (file store)
 *     state/shields.json       — registered shields
 */

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

export interface ResolveStackHomeOptions {
  readonly home?: string | undefined;
  /** Environment to read; defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Create the directory if missing. Default: true. */
  readonly create?: boolean | undefined;
}

/**
 * Resolve the stack home directory to an absolute path.
 */
export function resolveStackHome(opts: ResolveStackHomeOptions = {}): string {
  const env = opts.env ?? process.env;
  const fromEnv = env['CAPSTACK_HOME'];

  let home: string;
  if (opts.home !== undefined && opts.home !== '') {
    home = opts.home;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    home = fromEnv;
  } else {
    home = join(homedir(), '.capstack');
  }

  const absolute = resolve(home);
  if (opts.create !== false) {
    mkdirSync(absolute, { recursive: true });
  }
  return absolute;
}
