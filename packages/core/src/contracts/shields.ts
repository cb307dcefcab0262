/**
 * Capstack Core — Shields Contract
 *
 * Named shield registrations. A shield binds an identifier to a shield type
 * served by the stack's safety capability, plus fixed parameters.
 */

import { z } from 'zod';
import type { Dispatch, DispatchOptions, InvokeOptions, OperationTable } from './shared.js';
import { groupCall, handle, operation } from './shared.js';

export const ShieldSchema = z.object({
  identifier: z.string(),
  shield_type: z.string(),
  params: z.record(z.unknown()),
});
export type Shield = z.infer<typeof ShieldSchema>;

export const RegisterShieldRequestSchema = z.object({
  identifier: z.string().min(1),
  shield_type: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});
export type RegisterShieldRequest = z.infer<typeof RegisterShieldRequestSchema>;

export const RegisterShieldResponseSchema = z.object({ shield: ShieldSchema });
export type RegisterShieldResponse = z.infer<typeof RegisterShieldResponseSchema>;

export const GetShieldRequestSchema = z.object({ identifier: z.string().min(1) });
export type GetShieldRequest = z.infer<typeof GetShieldRequestSchema>;

export const GetShieldResponseSchema = z.object({ shield: ShieldSchema.nullable() });
export type GetShieldResponse = z.infer<typeof GetShieldResponseSchema>;

export const ListShieldsRequestSchema = z.object({});
export type ListShieldsRequest = z.infer<typeof ListShieldsRequestSchema>;

export const ListShieldsResponseSchema = z.object({ shields: z.array(ShieldSchema) });
export type ListShieldsResponse = z.infer<typeof ListShieldsResponseSchema>;

export const SHIELDS_CONTRACT = {
  register_shield: operation(RegisterShieldRequestSchema, RegisterShieldResponseSchema),
  get_shield: operation(GetShieldRequestSchema, GetShieldResponseSchema),
  list_shields: operation(ListShieldsRequestSchema, ListShieldsResponseSchema),
};

export interface ShieldsApi {
  register_shield(request: RegisterShieldRequest, options: InvokeOptions): Promise<RegisterShieldResponse>;
  get_shield(request: GetShieldRequest, options: InvokeOptions): Promise<GetShieldResponse>;
  list_shields(request: ListShieldsRequest, options: InvokeOptions): Promise<ListShieldsResponse>;
}

export function shieldsOperations(api: ShieldsApi): OperationTable<typeof SHIELDS_CONTRACT> {
  return {
    register_shield: handle(RegisterShieldRequestSchema, (req, opts) => api.register_shield(req, opts)),
    get_shield: handle(GetShieldRequestSchema, (req, opts) => api.get_shield(req, opts)),
    list_shields: handle(ListShieldsRequestSchema, (req, opts) => api.list_shields(req, opts)),
  };
}

export interface ShieldsClient {
  register_shield(request: RegisterShieldRequest): Promise<RegisterShieldResponse>;
  get_shield(request: GetShieldRequest): Promise<GetShieldResponse>;
  list_shields(request?: ListShieldsRequest): Promise<ListShieldsResponse>;
}

export function shieldsClient(dispatch: Dispatch, options: DispatchOptions = {}): ShieldsClient {
  const call = groupCall(dispatch, 'shields', options);
  return {
    register_shield: (request) => call('register_shield', request, RegisterShieldResponseSchema),
    get_shield: (request) => call('get_shield', request, GetShieldResponseSchema),
    list_shields: (request = {}) => call('list_shields', request, ListShieldsResponseSchema),
  };
}
