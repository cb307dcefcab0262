/**
 * capstack logs — Show routed calls from the call log
 *
 * Reads `<CAPSTACK_HOME>/logs/calls.jsonl`, which the file sink writes when
 * CAPSTACK_LOG is `file` or `both`. Lines that fail to parse are counted,
 * not shown.
 */

import { Command } from 'commander';
import type { CallLogEntry } from '@capstack/runtime-host';
import {
  CALL_LOG_FILE,
  CallLogEntrySchema,
  FileStateIO,
  formatCallRecord,
  readLog,
  resolveStackHome,
} from '@capstack/runtime-host';
import type { CliIO } from '../context.js';
import { ExitCode, consoleIO } from '../context.js';
import { t } from '../output/theme.js';

export interface LogsOptions {
  readonly home?: string | undefined;
  readonly capability?: string | undefined;
  readonly errors?: boolean | undefined;
  readonly limit?: string | undefined;
  readonly json?: boolean | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
}

export function showLogs(options: LogsOptions, io: CliIO): ExitCode {
  const limit = options.limit !== undefined ? Number(options.limit) : 100;
  if (!Number.isInteger(limit) || limit <= 0) {
    io.err(`error: --limit must be a positive integer, got '${options.limit ?? ''}'`);
    return ExitCode.CallerFault;
  }

  const home = resolveStackHome({ home: options.home, env: options.env, create: false });
  const raw = new FileStateIO(home).readLogRaw(CALL_LOG_FILE);
  const { events, stats } = readLog(raw, CallLogEntrySchema);

  const selected = events
    .filter((entry: CallLogEntry) => options.capability === undefined || entry.capability === options.capability)
    .filter((entry: CallLogEntry) => options.errors !== true || entry.outcome === 'error')
    .slice(-limit);

  if (options.json === true) {
    io.out(JSON.stringify({ entries: selected, stats }, null, 2));
    return ExitCode.Ok;
  }

  if (selected.length === 0) {
    io.out(t.muted('(no calls logged)'));
  }
  for (const entry of selected) {
    io.out(formatCallRecord(entry));
  }
  if (stats.parseErrors > 0 || stats.partialTrailingLine) {
    io.err(t.amber(`${stats.parseErrors} unreadable line(s)${stats.partialTrailingLine ? ', partial trailing line' : ''}`));
  }
  return ExitCode.Ok;
}

export const logsCommand = new Command('logs')
  .description('Show routed calls recorded in the call log')
  .option('--home <dir>', 'State directory (default: CAPSTACK_HOME or ~/.capstack)')
  .option('--capability <group>', 'Only calls to this capability group')
  .option('--errors', 'Only failed calls')
  .option('--limit <n>', 'Show at most the last n calls', '100')
  .option('--json', 'Output as JSON')
  .action((options: { home?: string; capability?: string; errors?: boolean; limit?: string; json?: boolean }) => {
    process.exitCode = showLogs(options, consoleIO);
  });
