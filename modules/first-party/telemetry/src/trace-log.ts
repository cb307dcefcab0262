/**
 * Capstack Telemetry Module — Trace Log
 *
 * Events are appended to a JSONL log with a fresh `event_id` each. Traces
 * are read back through readLog(): deduplicated by event_id, ordered by
 * timestamp, lines that do not parse skipped.
 */

import { randomUUID } from 'node:crypto';
import chalk from 'chalk';
import { RecordedEventSchema } from '@capstack/core';
import type {
  EmptyResponse,
  GetTraceRequest,
  GetTraceResponse,
  LogEventRequest,
  RecordedEvent,
  Severity,
  TelemetryApi,
} from '@capstack/core';
import { readLog } from '@capstack/runtime-host';
import type { StateIO, WriteLine } from '@capstack/runtime-host';

export const TELEMETRY_LOG_FILE = 'telemetry.jsonl';

export interface TraceLogOptions {
  readonly logfilename?: string;
  /** Also print each event. */
  readonly echo?: WriteLine | undefined;
}

export class TraceLog implements TelemetryApi {
  private readonly logfilename: string;

  constructor(
    private readonly stateIO: StateIO,
    private readonly options: TraceLogOptions = {},
  ) {
    this.logfilename = options.logfilename ?? TELEMETRY_LOG_FILE;
  }

  async log_event(request: LogEventRequest): Promise<EmptyResponse> {
    const recorded: RecordedEvent = { event_id: randomUUID(), ...request.event };
    this.stateIO.appendLine(this.logfilename, JSON.stringify(recorded));
    this.options.echo?.(formatEvent(recorded));
    return {};
  }

  async get_trace(request: GetTraceRequest): Promise<GetTraceResponse> {
    const { events } = readLog(this.stateIO.readLogRaw(this.logfilename), RecordedEventSchema);
    return { events: events.filter((event) => event.trace_id === request.trace_id) };
  }
}

const SEVERITY_COLOR: Readonly<Record<Severity, (text: string) => string>> = {
  verbose: chalk.dim,
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
  critical: chalk.bgRed,
};

/**
 * @example
 * formatEvent(e) // "2026-01-01T00:00:00Z [trace-1] log info  turn started"
 */
export function formatEvent(event: RecordedEvent): string {
  const severity = event.severity ?? 'info';
  const detail =
    event.type === 'metric'
      ? `${event.metric ?? '?'}=${event.value ?? '?'}`
      : (event.message ?? '');
  const span = event.span_id !== undefined ? `/${event.span_id}` : '';
  return `${chalk.dim(event.timestamp)} [${event.trace_id}${span}] ${event.type} ${SEVERITY_COLOR[severity](severity)} ${detail}`.trimEnd();
}
