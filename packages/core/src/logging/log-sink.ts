/**
 * Capstack Core — Log Sink Interface
 *
 * Injection point for call-record persistence. Core owns the contract;
 * concrete sinks (JSONL file, console) live in @capstack/runtime-host and
 * are injected when the stack is assembled. Core never writes to disk.
 */

import type { CallRecord } from '../types/call.js';

/**
 * Receives one record per routed call. The Router calls append() in a
 * finally block, so it fires for successful and failed calls alike.
 * append() must not throw.
 */
export interface LogSink {
  append(record: CallRecord): void;
}
