/**
 * Capstack Runtime Host — Call Log Sink Tests
 *
 *   LOG-U1: FileLogSink writes one JSONL line per record, with a UUID event_id
 *   LOG-U2: two records get distinct event_ids
 *   LOG-U3: lines read back through readLog with CallLogEntrySchema
 *   LOG-U4: ConsoleLogSink prints one line naming the call and its outcome
 *
 * Isolation: MemoryStateIO, captured console output.
 */

import { describe, it, expect } from 'vitest';
import type { CallRecord } from '@capstack/core';
import { FileLogSink, CallLogEntrySchema } from '../src/logging/file-log-sink.js';
import { ConsoleLogSink } from '../src/logging/console-log-sink.js';
import { readLog } from '../src/logging/log-reader.js';
import { MemoryStateIO } from '../src/state/state-io.js';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function makeRecord(overrides: Partial<CallRecord> = {}): CallRecord {
  return {
    timestamp: '2026-01-01T00:00:00.000Z',
    capability: 'memory',
    operation: 'query_documents',
    provider_id: 'meta-reference',
    outcome: 'ok',
    duration_ms: 4,
    ...overrides,
  };
}

describe('FileLogSink', () => {
  it('LOG-U1: writes one line per record with a UUID event_id', () => {
    const io = new MemoryStateIO();
    new FileLogSink(io).append(makeRecord());

    const lines = io.readLines('calls.jsonl');
    expect(lines).toHaveLength(1);
    const parsed: unknown = JSON.parse(lines[0]!);
    expect(parsed).toMatchObject({
      capability: 'memory',
      operation: 'query_documents',
      provider_id: 'meta-reference',
      outcome: 'ok',
      duration_ms: 4,
    });
    expect(parsed).toHaveProperty('event_id', expect.stringMatching(UUID));
  });

  it('LOG-U2: two records get distinct event_ids', () => {
    const io = new MemoryStateIO();
    const sink = new FileLogSink(io);
    sink.append(makeRecord());
    sink.append(makeRecord());

    const result = readLog(io.readLogRaw('calls.jsonl'), CallLogEntrySchema);

    expect(result.events).toHaveLength(2);
    expect(result.events[0]?.event_id).not.toBe(result.events[1]?.event_id);
  });

  it('LOG-U3: failed calls read back with their error fields', () => {
    const io = new MemoryStateIO();
    new FileLogSink(io).append(
      makeRecord({ outcome: 'error', error_type: 'NotFoundError', error_code: 'BankId', provider_id: null }),
    );

    const [entry] = readLog(io.readLogRaw('calls.jsonl'), CallLogEntrySchema).events;

    expect(entry).toMatchObject({
      outcome: 'error',
      error_type: 'NotFoundError',
      error_code: 'BankId',
      provider_id: null,
    });
  });
});

describe('ConsoleLogSink', () => {
  it('LOG-U4: prints one line naming the call and its outcome', () => {
    const lines: string[] = [];
    const sink = new ConsoleLogSink((l) => lines.push(l));

    sink.append(makeRecord({ outcome: 'error', error_type: 'AdapterError', error_code: 'Timeout' }));

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('memory.query_documents -> meta-reference (4 ms)');
    expect(lines[0]).toContain('AdapterError(Timeout)');
  });
});
