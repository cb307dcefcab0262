/**
 * Capstack Core — Call Records
 *
 * One CallRecord is produced for every dispatch through the Router,
 * whatever its outcome.
 */

export type CallOutcome = 'ok' | 'error';

export interface CallRecord {
  /** ISO 8601 time the dispatch started. */
  readonly timestamp: string;
  readonly capability: string;
  readonly operation: string;
  /** Null when the call failed before a provider was resolved. */
  readonly provider_id: string | null;
  readonly outcome: CallOutcome;
  /** Error class name, present when outcome is 'error'. */
  readonly error_type?: string;
  readonly error_code?: string;
  readonly duration_ms: number;
}
