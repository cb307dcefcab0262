/**
 * Capstack Core — Inference Contract
 *
 * Non-streaming chat completion, text completion, embeddings and model
 * listing. Every other capability group that needs a model goes through
 * these operations.
 */

import { z } from 'zod';
import type { Dispatch, DispatchOptions, InvokeOptions, OperationTable } from './shared.js';
import { groupCall, handle, operation } from './shared.js';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const MessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string(),
});
export type Message = z.infer<typeof MessageSchema>;

export const SamplingParamsSchema = z.object({
  temperature: z.number().min(0).optional(),
  top_p: z.number().min(0).max(1).optional(),
  top_k: z.number().int().min(0).optional(),
  max_tokens: z.number().int().positive().optional(),
  repetition_penalty: z.number().positive().optional(),
});
export type SamplingParams = z.infer<typeof SamplingParamsSchema>;

export const StopReasonSchema = z.enum(['end_of_turn', 'end_of_message', 'out_of_tokens']);
export type StopReason = z.infer<typeof StopReasonSchema>;

export const CompletionMessageSchema = z.object({
  role: z.literal('assistant'),
  content: z.string(),
  stop_reason: StopReasonSchema,
});
export type CompletionMessage = z.infer<typeof CompletionMessageSchema>;

export const ChatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(MessageSchema).min(1),
  sampling_params: SamplingParamsSchema.optional(),
});
export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;

export const ChatCompletionResponseSchema = z.object({
  completion_message: CompletionMessageSchema,
});
export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

export const CompletionRequestSchema = z.object({
  model: z.string().min(1),
  content: z.string(),
  sampling_params: SamplingParamsSchema.optional(),
});
export type CompletionRequest = z.infer<typeof CompletionRequestSchema>;

export const CompletionResponseSchema = z.object({
  content: z.string(),
  stop_reason: StopReasonSchema,
});
export type CompletionResponse = z.infer<typeof CompletionResponseSchema>;

export const EmbeddingsRequestSchema = z.object({
  model: z.string().min(1),
  contents: z.array(z.string()).min(1),
});
export type EmbeddingsRequest = z.infer<typeof EmbeddingsRequestSchema>;

export const EmbeddingsResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});
export type EmbeddingsResponse = z.infer<typeof EmbeddingsResponseSchema>;

export const ListModelsRequestSchema = z.object({});
export type ListModelsRequest = z.infer<typeof ListModelsRequestSchema>;

export const ModelSchema = z.object({
  identifier: z.string(),
  provider_model: z.string(),
});
export type Model = z.infer<typeof ModelSchema>;

export const ListModelsResponseSchema = z.object({
  models: z.array(ModelSchema),
});
export type ListModelsResponse = z.infer<typeof ListModelsResponseSchema>;

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export const INFERENCE_CONTRACT = {
  chat_completion: operation(ChatCompletionRequestSchema, ChatCompletionResponseSchema),
  completion: operation(CompletionRequestSchema, CompletionResponseSchema),
  embeddings: operation(EmbeddingsRequestSchema, EmbeddingsResponseSchema),
  list_models: operation(ListModelsRequestSchema, ListModelsResponseSchema),
};

/** Implemented by inference providers. */
export interface InferenceApi {
  chat_completion(request: ChatCompletionRequest, options: InvokeOptions): Promise<ChatCompletionResponse>;
  completion(request: CompletionRequest, options: InvokeOptions): Promise<CompletionResponse>;
  embeddings(request: EmbeddingsRequest, options: InvokeOptions): Promise<EmbeddingsResponse>;
  list_models(request: ListModelsRequest, options: InvokeOptions): Promise<ListModelsResponse>;
}

export function inferenceOperations(api: InferenceApi): OperationTable<typeof INFERENCE_CONTRACT> {
  return {
    chat_completion: handle(ChatCompletionRequestSchema, (req, opts) => api.chat_completion(req, opts)),
    completion: handle(CompletionRequestSchema, (req, opts) => api.completion(req, opts)),
    embeddings: handle(EmbeddingsRequestSchema, (req, opts) => api.embeddings(req, opts)),
    list_models: handle(ListModelsRequestSchema, (req, opts) => api.list_models(req, opts)),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface InferenceClient {
  chat_completion(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
  completion(request: CompletionRequest): Promise<CompletionResponse>;
  embeddings(request: EmbeddingsRequest): Promise<EmbeddingsResponse>;
  list_models(request?: ListModelsRequest): Promise<ListModelsResponse>;
}

export function inferenceClient(dispatch: Dispatch, options: DispatchOptions = {}): InferenceClient {
  const call = groupCall(dispatch, 'inference', options);
  return {
    chat_completion: (request) => call('chat_completion', request, ChatCompletionResponseSchema),
    completion: (request) => call('completion', request, CompletionResponseSchema),
    embeddings: (request) => call('embeddings', request, EmbeddingsResponseSchema),
    list_models: (request = {}) => call('list_models', request, ListModelsResponseSchema),
  };
}
