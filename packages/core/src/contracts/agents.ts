/**
 * Capstack Core — Agents Contract
 *
 * An agent is a stored configuration (model, instructions, shields, memory
 * banks). Sessions belong to an agent and accumulate turns. A turn runs the
 * agent's input shields, memory retrieval, inference and output shields.
 */

import { z } from 'zod';
import type { Dispatch, DispatchOptions, InvokeOptions, OperationTable } from './shared.js';
import { groupCall, handle, operation } from './shared.js';
import { CompletionMessageSchema, MessageSchema, SamplingParamsSchema } from './inference.js';
import { ShieldVerdictSchema } from './safety.js';
import { EmptyResponseSchema } from './memory.js';
import type { EmptyResponse } from './memory.js';

// ---------------------------------------------------------------------------
// Agents and sessions
// ---------------------------------------------------------------------------

export const AgentConfigSchema = z.object({
  model: z.string().min(1),
  instructions: z.string(),
  sampling_params: SamplingParamsSchema.optional(),
  /** Shield identifiers (or bare shield types) run over the user input. */
  input_shields: z.array(z.string()).optional(),
  /** Shield identifiers (or bare shield types) run over the model output. */
  output_shields: z.array(z.string()).optional(),
  memory_bank_ids: z.array(z.string()).optional(),
  max_memory_chunks: z.number().int().positive().optional(),
});
export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export const AgentSchema = z.object({
  agent_id: z.string(),
  agent_config: AgentConfigSchema,
  created_at: z.string(),
});
export type Agent = z.infer<typeof AgentSchema>;

export const StepSchema = z.discriminatedUnion('step_type', [
  z.object({
    step_type: z.literal('shield_call'),
    shield: z.string(),
    verdict: ShieldVerdictSchema,
  }),
  z.object({
    step_type: z.literal('memory_retrieval'),
    memory_bank_ids: z.array(z.string()),
    inserted_context: z.string(),
  }),
  z.object({
    step_type: z.literal('inference'),
    model: z.string(),
    completion_message: CompletionMessageSchema,
  }),
]);
export type Step = z.infer<typeof StepSchema>;

export const TurnSchema = z.object({
  turn_id: z.string(),
  session_id: z.string(),
  input_messages: z.array(MessageSchema),
  steps: z.array(StepSchema),
  output_message: CompletionMessageSchema,
  started_at: z.string(),
  completed_at: z.string(),
});
export type Turn = z.infer<typeof TurnSchema>;

export const SessionSchema = z.object({
  session_id: z.string(),
  session_name: z.string(),
  agent_id: z.string(),
  turns: z.array(TurnSchema),
  started_at: z.string(),
});
export type Session = z.infer<typeof SessionSchema>;

// ---------------------------------------------------------------------------
// Requests and results
// ---------------------------------------------------------------------------

export const CreateAgentRequestSchema = z.object({ agent_config: AgentConfigSchema });
export type CreateAgentRequest = z.infer<typeof CreateAgentRequestSchema>;

export const AgentIdRequestSchema = z.object({ agent_id: z.string().min(1) });
export type AgentIdRequest = z.infer<typeof AgentIdRequestSchema>;

export const CreateAgentResponseSchema = z.object({ agent_id: z.string() });
export type CreateAgentResponse = z.infer<typeof CreateAgentResponseSchema>;

export const GetAgentResponseSchema = z.object({ agent: AgentSchema });
export type GetAgentResponse = z.infer<typeof GetAgentResponseSchema>;

export const CreateSessionRequestSchema = z.object({
  agent_id: z.string().min(1),
  session_name: z.string().min(1),
});
export type CreateSessionRequest = z.infer<typeof CreateSessionRequestSchema>;

export const CreateSessionResponseSchema = z.object({ session_id: z.string() });
export type CreateSessionResponse = z.infer<typeof CreateSessionResponseSchema>;

export const SessionRequestSchema = z.object({
  agent_id: z.string().min(1),
  session_id: z.string().min(1),
});
export type SessionRequest = z.infer<typeof SessionRequestSchema>;

export const GetSessionResponseSchema = z.object({ session: SessionSchema });
export type GetSessionResponse = z.infer<typeof GetSessionResponseSchema>;

export const CreateTurnRequestSchema = z.object({
  agent_id: z.string().min(1),
  session_id: z.string().min(1),
  messages: z.array(MessageSchema).min(1),
});
export type CreateTurnRequest = z.infer<typeof CreateTurnRequestSchema>;

export const CreateTurnResponseSchema = z.object({ turn: TurnSchema });
export type CreateTurnResponse = z.infer<typeof CreateTurnResponseSchema>;

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export const AGENTS_CONTRACT = {
  create_agent: operation(CreateAgentRequestSchema, CreateAgentResponseSchema),
  get_agent: operation(AgentIdRequestSchema, GetAgentResponseSchema),
  delete_agent: operation(AgentIdRequestSchema, EmptyResponseSchema),
  create_session: operation(CreateSessionRequestSchema, CreateSessionResponseSchema),
  get_session: operation(SessionRequestSchema, GetSessionResponseSchema),
  delete_session: operation(SessionRequestSchema, EmptyResponseSchema),
  create_turn: operation(CreateTurnRequestSchema, CreateTurnResponseSchema),
};

export interface AgentsApi {
  create_agent(request: CreateAgentRequest, options: InvokeOptions): Promise<CreateAgentResponse>;
  get_agent(request: AgentIdRequest, options: InvokeOptions): Promise<GetAgentResponse>;
  delete_agent(request: AgentIdRequest, options: InvokeOptions): Promise<EmptyResponse>;
  create_session(request: CreateSessionRequest, options: InvokeOptions): Promise<CreateSessionResponse>;
  get_session(request: SessionRequest, options: InvokeOptions): Promise<GetSessionResponse>;
  delete_session(request: SessionRequest, options: InvokeOptions): Promise<EmptyResponse>;
  create_turn(request: CreateTurnRequest, options: InvokeOptions): Promise<CreateTurnResponse>;
}

export function agentsOperations(api: AgentsApi): OperationTable<typeof AGENTS_CONTRACT> {
  return {
    create_agent: handle(CreateAgentRequestSchema, (req, opts) => api.create_agent(req, opts)),
    get_agent: handle(AgentIdRequestSchema, (req, opts) => api.get_agent(req, opts)),
    delete_agent: handle(AgentIdRequestSchema, (req, opts) => api.delete_agent(req, opts)),
    create_session: handle(CreateSessionRequestSchema, (req, opts) => api.create_session(req, opts)),
    get_session: handle(SessionRequestSchema, (req, opts) => api.get_session(req, opts)),
    delete_session: handle(SessionRequestSchema, (req, opts) => api.delete_session(req, opts)),
    create_turn: handle(CreateTurnRequestSchema, (req, opts) => api.create_turn(req, opts)),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface AgentsClient {
  create_agent(request: CreateAgentRequest): Promise<CreateAgentResponse>;
  get_agent(request: AgentIdRequest): Promise<GetAgentResponse>;
  delete_agent(request: AgentIdRequest): Promise<EmptyResponse>;
  create_session(request: CreateSessionRequest): Promise<CreateSessionResponse>;
  get_session(request: SessionRequest): Promise<GetSessionResponse>;
  delete_session(request: SessionRequest): Promise<EmptyResponse>;
  create_turn(request: CreateTurnRequest): Promise<CreateTurnResponse>;
}

export function agentsClient(dispatch: Dispatch, options: DispatchOptions = {}): AgentsClient {
  const call = groupCall(dispatch, 'agents', options);
  return {
    create_agent: (request) => call('create_agent', request, CreateAgentResponseSchema),
    get_agent: (request) => call('get_agent', request, GetAgentResponseSchema),
    delete_agent: (request) => call('delete_agent', request, EmptyResponseSchema),
    create_session: (request) => call('create_session', request, CreateSessionResponseSchema),
    get_session: (request) => call('get_session', request, GetSessionResponseSchema),
    delete_session: (request) => call('delete_session', request, EmptyResponseSchema),
    create_turn: (request) => call('create_turn', request, CreateTurnResponseSchema),
  };
}
