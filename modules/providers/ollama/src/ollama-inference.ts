/**
 * Capstack Ollama Provider — Inference
 *
 * Non-streaming inference against an Ollama server:
 *   chat_completion → POST /api/chat
 *   completion      → POST /api/generate
 *   embeddings      → POST /api/embed
 *   list_models     → GET  /api/ps
 *
 * Chat and completion models must be in the model table. Embedding models
 * are sent as given when they have no entry, since they are usually plain
 * Ollama tags.
 */

import { z } from 'zod';
import { AdapterError, RoutingError, describeIssues } from '@capstack/core';
import type {
  ChatCompletionRequest,
  ChatCompletionResponse,
  CompletionRequest,
  CompletionResponse,
  EmbeddingsRequest,
  EmbeddingsResponse,
  InferenceApi,
  InvokeOptions,
  ListModelsRequest,
  ListModelsResponse,
  SamplingParams,
  StopReason,
} from '@capstack/core';
import type { HttpTransport } from '@capstack/runtime-host';
import type { ModelTable } from './models.js';

// ---------------------------------------------------------------------------
// Ollama wire shapes
// ---------------------------------------------------------------------------

const OllamaChatResponseSchema = z.object({
  message: z.object({ role: z.string(), content: z.string() }),
  done: z.boolean(),
  done_reason: z.string().optional(),
});

const OllamaGenerateResponseSchema = z.object({
  response: z.string(),
  done: z.boolean(),
  done_reason: z.string().optional(),
});

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

const OllamaPsResponseSchema = z.object({
  models: z.array(z.object({ model: z.string() })),
});

export interface OllamaOptions {
  readonly [key: string]: number;
}

// ---------------------------------------------------------------------------
// Inference
// ---------------------------------------------------------------------------

export class OllamaInference implements InferenceApi {
  constructor(
    private readonly transport: HttpTransport,
    private readonly models: ModelTable,
  ) {}

  async chat_completion(request: ChatCompletionRequest, options: InvokeOptions): Promise<ChatCompletionResponse> {
    const body = {
      model: this.requireTag(request.model),
      messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      options: samplingOptions(request.sampling_params),
      stream: false,
    };
    const raw = await this.transport.postJson('/api/chat', body, options.signal);
    const response = parseBody(OllamaChatResponseSchema, raw, '/api/chat');
    return {
      completion_message: {
        role: 'assistant',
        content: response.message.content,
        stop_reason: stopReason(response.done_reason),
      },
    };
  }

  async completion(request: CompletionRequest, options: InvokeOptions): Promise<CompletionResponse> {
    const body = {
      model: this.requireTag(request.model),
      prompt: request.content,
      options: samplingOptions(request.sampling_params),
      stream: false,
    };
    const raw = await this.transport.postJson('/api/generate', body, options.signal);
    const response = parseBody(OllamaGenerateResponseSchema, raw, '/api/generate');
    return { content: response.response, stop_reason: stopReason(response.done_reason) };
  }

  async embeddings(request: EmbeddingsRequest, options: InvokeOptions): Promise<EmbeddingsResponse> {
    const body = { model: this.models.tagFor(request.model) ?? request.model, input: request.contents };
    const raw = await this.transport.postJson('/api/embed', body, options.signal);
    const response = parseBody(OllamaEmbedResponseSchema, raw, '/api/embed');
    if (response.embeddings.length !== request.contents.length) {
      throw new AdapterError(
        'InvalidResponse',
        `/api/embed returned ${response.embeddings.length} embeddings for ${request.contents.length} inputs`,
      );
    }
    return { embeddings: response.embeddings };
  }

  /** Models currently loaded in Ollama that map to a known model name. */
  async list_models(_request: ListModelsRequest, options: InvokeOptions): Promise<ListModelsResponse> {
    const raw = await this.transport.getJson('/api/ps', options.signal);
    const response = parseBody(OllamaPsResponseSchema, raw, '/api/ps');
    const models: ListModelsResponse['models'] = [];
    for (const running of response.models) {
      const identifier = this.models.modelFor(running.model);
      if (identifier !== undefined) {
        models.push({ identifier, provider_model: running.model });
      }
    }
    return { models };
  }

  /** Reachability check; any failure surfaces as the transport's AdapterError. */
  async ping(signal: AbortSignal): Promise<void> {
    await this.transport.getJson('/api/ps', signal);
  }

  private requireTag(model: string): string {
    const tag = this.models.tagFor(model);
    if (tag === undefined) {
      throw new RoutingError('UnsupportedModel', `Model '${model}' is not supported by Ollama`);
    }
    return tag;
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Sampling params in Ollama's option names. `max_tokens` becomes `num_predict`. */
export function samplingOptions(params: SamplingParams | undefined): OllamaOptions {
  const options: Record<string, number> = {};
  if (params === undefined) return options;
  if (params.temperature !== undefined) options['temperature'] = params.temperature;
  if (params.top_p !== undefined) options['top_p'] = params.top_p;
  if (params.top_k !== undefined) options['top_k'] = params.top_k;
  if (params.repetition_penalty !== undefined) options['repeat_penalty'] = params.repetition_penalty;
  if (params.max_tokens !== undefined) options['num_predict'] = params.max_tokens;
  return options;
}

export function stopReason(doneReason: string | undefined): StopReason {
  switch (doneReason) {
    case 'length':
      return 'out_of_tokens';
    case 'stop':
    case undefined:
      return 'end_of_turn';
    default:
      return 'end_of_message';
  }
}

function parseBody<S extends z.ZodTypeAny>(schema: S, raw: unknown, endpoint: string): z.output<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new AdapterError(
      'InvalidResponse',
      `Unexpected response from Ollama ${endpoint}: ${describeIssues(parsed.error)}`,
      { body: JSON.stringify(raw) },
    );
  }
  return parsed.data;
}
