/**
 * Capstack Runtime Host — File-backed Call Log Sink
 *
 * Implements the LogSink interface from @capstack/core by appending one
 * JSONL line per routed call to `logs/calls.jsonl` through the injected
 * StateIO. The write is synchronous; the line is on disk before the Router
 * returns to its caller.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { CallRecord, LogSink } from '@capstack/core';
import type { StateIO } from '../state/state-io.js';

export const CALL_LOG_FILE = 'calls.jsonl';

/** Shape of one line in `calls.jsonl`, for reading it back with readLog(). */
export const CallLogEntrySchema = z.object({
  event_id: z.string().min(1),
  timestamp: z.string(),
  capability: z.string(),
  operation: z.string(),
  provider_id: z.string().nullable(),
  outcome: z.enum(['ok', 'error']),
  error_type: z.string().optional(),
  error_code: z.string().optional(),
  duration_ms: z.number(),
});
export type CallLogEntry = z.infer<typeof CallLogEntrySchema>;

export class FileLogSink implements LogSink {
  constructor(
    private readonly stateIO: StateIO,
    private readonly logfilename: string = CALL_LOG_FILE,
  ) {}

  append(record: CallRecord): void {
    const line = JSON.stringify({ event_id: randomUUID(), ...record });
    this.stateIO.appendLine(this.logfilename, line);
  }
}
