/**
 * Capstack Core — Safety Contract
 */

import { z } from 'zod';
import type { Dispatch, DispatchOptions, InvokeOptions, OperationTable } from './shared.js';
import { groupCall, handle, operation } from './shared.js';
import { MessageSchema } from './inference.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/** Ordered `none < warning < error`. */
export const ViolationLevelSchema = z.enum(['none', 'warning', 'error']);
export type ViolationLevel = z.infer<typeof ViolationLevelSchema>;

export const ShieldVerdictSchema = z.object({
  violation_level: ViolationLevelSchema,
  user_message: z.string(),
  metadata: z.record(z.unknown()),
});
export type ShieldVerdict = z.infer<typeof ShieldVerdictSchema>;

export const RunShieldRequestSchema = z.object({
  shield_type: z.string().min(1),
  messages: z.array(MessageSchema),
  params: z.record(z.unknown()).optional(),
});
export type RunShieldRequest = z.infer<typeof RunShieldRequestSchema>;

export const ListShieldTypesRequestSchema = z.object({});
export type ListShieldTypesRequest = z.infer<typeof ListShieldTypesRequestSchema>;

export const ListShieldTypesResponseSchema = z.object({
  shield_types: z.array(z.string()),
});
export type ListShieldTypesResponse = z.infer<typeof ListShieldTypesResponseSchema>;

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export const SAFETY_CONTRACT = {
  run_shield: operation(RunShieldRequestSchema, ShieldVerdictSchema),
  list_shield_types: operation(ListShieldTypesRequestSchema, ListShieldTypesResponseSchema),
};

export interface SafetyApi {
  run_shield(request: RunShieldRequest, options: InvokeOptions): Promise<ShieldVerdict>;
  list_shield_types(request: ListShieldTypesRequest, options: InvokeOptions): Promise<ListShieldTypesResponse>;
}

export function safetyOperations(api: SafetyApi): OperationTable<typeof SAFETY_CONTRACT> {
  return {
    run_shield: handle(RunShieldRequestSchema, (req, opts) => api.run_shield(req, opts)),
    list_shield_types: handle(ListShieldTypesRequestSchema, (req, opts) => api.list_shield_types(req, opts)),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface SafetyClient {
  run_shield(request: RunShieldRequest): Promise<ShieldVerdict>;
  list_shield_types(request?: ListShieldTypesRequest): Promise<ListShieldTypesResponse>;
}

export function safetyClient(dispatch: Dispatch, options: DispatchOptions = {}): SafetyClient {
  const call = groupCall(dispatch, 'safety', options);
  return {
    run_shield: (request) => call('run_shield', request, ShieldVerdictSchema),
    list_shield_types: (request = {}) => call('list_shield_types', request, ListShieldTypesResponseSchema),
  };
}
