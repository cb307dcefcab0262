/**
 * Capstack Runtime Host — LogReader
 *
 * Pure function for reading JSONL logs with dedupe-on-read.
 *
 * Guarantees:
 *   LOGR-U1: every line that parses and matches the schema is returned; others are counted in parseErrors
 *   LOGR-U2: events are deduplicated by event_id, first-seen wins
 *   LOGR-U3: a partial trailing line (content not ending in '\n') is dropped and flagged
 *   LOGR-U4: output is sorted by (timestamp asc, event_id asc)
 *   LOGR-U5: empty input returns an empty result with zero stats
 *
 * No I/O here. Callers obtain raw content via StateIO.readLogRaw().
 */

import type { z } from 'zod';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The fields every log line carries. */
export interface LoggedEvent {
  readonly event_id: string;
  readonly timestamp?: string | undefined;
}

export interface LogReadStats {
  /** Non-empty lines processed. */
  totalLines: number;
  /** Events returned, after deduplication. */
  parsedEvents: number;
  /** Events dropped because their event_id was already seen. */
  duplicates: number;
  /** Lines dropped as invalid JSON or not matching the schema. */
  parseErrors: number;
  /** True if the content did not end with '\n'; the last line was dropped. */
  partialTrailingLine: boolean;
}

export interface LogReadResult<T extends LoggedEvent> {
  events: ReadonlyArray<T>;
  stats: LogReadStats;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Parse, validate, deduplicate and sort JSONL log content.
 *
 * @param rawContent - Raw JSONL text
 * @param schema - Shape each line must match
 */
export function readLog<T extends LoggedEvent>(
  rawContent: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): LogReadResult<T> {
  if (rawContent.length === 0) {
    return {
      events: [],
      stats: { totalLines: 0, parsedEvents: 0, duplicates: 0, parseErrors: 0, partialTrailingLine: false },
    };
  }

  const partialTrailingLine = !rawContent.endsWith('\n');
  const rawLines = rawContent.split('\n');
  // The element after the last '\n' is either '' or an incomplete line.
  const lines = rawLines.slice(0, -1).filter((l) => l.length > 0);

  const seen = new Set<string>();
  const events: T[] = [];
  let duplicates = 0;
  let parseErrors = 0;

  for (const line of lines) {
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch {
      parseErrors++;
      continue;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      parseErrors++;
      continue;
    }

    const event = parsed.data;
    if (seen.has(event.event_id)) {
      duplicates++;
      continue;
    }
    seen.add(event.event_id);
    events.push(event);
  }

  events.sort((a, b) => {
    const ta = a.timestamp ?? '';
    const tb = b.timestamp ?? '';
    if (ta !== tb) return ta < tb ? -1 : 1;
    if (a.event_id === b.event_id) return 0;
    return a.event_id < b.event_id ? -1 : 1;
  });

  return {
    events,
    stats: {
      totalLines: lines.length,
      parsedEvents: events.length,
      duplicates,
      parseErrors,
      partialTrailingLine,
    },
  };
}
