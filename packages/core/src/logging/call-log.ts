/**
 * Capstack Core — Call Logger
 *
 * Forwards call records to the injected sinks. With no sinks (tests,
 * embedded use) record() is a no-op.
 */

import type { CallRecord } from '../types/call.js';
import type { LogSink } from './log-sink.js';

export class CallLogger {
  constructor(private readonly sinks: ReadonlyArray<LogSink> = []) {}

  record(entry: CallRecord): void {
    for (const sink of this.sinks) {
      sink.append(entry);
    }
  }
}
