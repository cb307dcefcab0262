/**
 * Capstack Runtime Host — Console Call Log Sink
 *
 * Prints one line per routed call, for a server running in the foreground.
 */

import chalk from 'chalk';
import type { CallRecord, LogSink } from '@capstack/core';

export type WriteLine = (line: string) => void;

export class ConsoleLogSink implements LogSink {
  constructor(private readonly write: WriteLine = (line) => console.log(line)) {}

  append(record: CallRecord): void {
    this.write(formatCallRecord(record));
  }
}

/**
 * @example
 * formatCallRecord(record) // "2026-01-01T00:00:00.000Z ok    inference.chat_completion -> ollama (12 ms)"
 */
export function formatCallRecord(record: CallRecord): string {
  const outcome = record.outcome === 'ok' ? chalk.green('ok   ') : chalk.red('error');
  const target = `${record.capability}.${record.operation}`;
  const provider = record.provider_id ?? '-';
  const failure =
    record.error_code !== undefined ? ` ${chalk.yellow(`${record.error_type ?? 'Error'}(${record.error_code})`)}` : '';
  return `${chalk.dim(record.timestamp)} ${outcome} ${target} -> ${provider} (${record.duration_ms} ms)${failure}`;
}
