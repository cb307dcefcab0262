/**
 * Capstack Core — Telemetry Contract
 */

import { z } from 'zod';
import type { Dispatch, DispatchOptions, InvokeOptions, OperationTable } from './shared.js';
import { groupCall, handle, operation } from './shared.js';
import { EmptyResponseSchema } from './memory.js';
import type { EmptyResponse } from './memory.js';

export const SeveritySchema = z.enum(['verbose', 'debug', 'info', 'warn', 'error', 'critical']);
export type Severity = z.infer<typeof SeveritySchema>;

export const TelemetryEventSchema = z.object({
  trace_id: z.string().min(1),
  span_id: z.string().optional(),
  type: z.enum(['log', 'metric', 'span_start', 'span_end']),
  timestamp: z.string().datetime({ offset: true }),
  severity: SeveritySchema.optional(),
  message: z.string().optional(),
  metric: z.string().optional(),
  value: z.number().optional(),
  attributes: z.record(z.unknown()).optional(),
});
export type TelemetryEvent = z.infer<typeof TelemetryEventSchema>;

/** An event as stored: the input event plus its assigned id. */
export const RecordedEventSchema = TelemetryEventSchema.extend({ event_id: z.string() });
export type RecordedEvent = z.infer<typeof RecordedEventSchema>;

export const LogEventRequestSchema = z.object({ event: TelemetryEventSchema });
export type LogEventRequest = z.infer<typeof LogEventRequestSchema>;

export const GetTraceRequestSchema = z.object({ trace_id: z.string().min(1) });
export type GetTraceRequest = z.infer<typeof GetTraceRequestSchema>;

export const GetTraceResponseSchema = z.object({ events: z.array(RecordedEventSchema) });
export type GetTraceResponse = z.infer<typeof GetTraceResponseSchema>;

export const TELEMETRY_CONTRACT = {
  log_event: operation(LogEventRequestSchema, EmptyResponseSchema),
  get_trace: operation(GetTraceRequestSchema, GetTraceResponseSchema),
};

export interface TelemetryApi {
  log_event(request: LogEventRequest, options: InvokeOptions): Promise<EmptyResponse>;
  get_trace(request: GetTraceRequest, options: InvokeOptions): Promise<GetTraceResponse>;
}

export function telemetryOperations(api: TelemetryApi): OperationTable<typeof TELEMETRY_CONTRACT> {
  return {
    log_event: handle(LogEventRequestSchema, (req, opts) => api.log_event(req, opts)),
    get_trace: handle(GetTraceRequestSchema, (req, opts) => api.get_trace(req, opts)),
  };
}

export interface TelemetryClient {
  log_event(request: LogEventRequest): Promise<EmptyResponse>;
  get_trace(request: GetTraceRequest): Promise<GetTraceResponse>;
}

export function telemetryClient(dispatch: Dispatch, options: DispatchOptions = {}): TelemetryClient {
  const call = groupCall(dispatch, 'telemetry', options);
  return {
    log_event: (request) => call('log_event', request, EmptyResponseSchema),
    get_trace: (request) => call('get_trace', request, GetTraceResponseSchema),
  };
}
