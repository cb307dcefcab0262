/**
 * Capstack Ollama Provider — Provider Manifest
 *
 * `remote::ollama` in the inference group. Building performs no network
 * I/O; with `check_connection` the server is pinged once on initialize.
 */

import { z } from 'zod';
import { CapabilityGroup, InlineAdapter, ProviderKind, defineProvider, inferenceOperations } from '@capstack/core';
import { DEFAULT_REMOTE_TIMEOUT_MS, HttpTransport } from '@capstack/runtime-host';
import { ModelTable } from './models.js';
import { OllamaInference } from './ollama-inference.js';

export const DEFAULT_OLLAMA_URL = 'http://localhost:11434';

export const OllamaConfigSchema = z.object({
  url: z.string().url().default(DEFAULT_OLLAMA_URL),
  timeout_ms: z.number().int().positive().default(DEFAULT_REMOTE_TIMEOUT_MS),
  /** Extra model name → Ollama tag entries, merged over the built-in table. */
  models: z.record(z.string().min(1)).default({}),
  check_connection: z.boolean().default(false),
});
export type OllamaConfig = z.output<typeof OllamaConfigSchema>;

export interface OllamaBuildOptions {
  readonly fetch?: typeof fetch | undefined;
}

export function createOllamaAdapter(
  providerId: string,
  config: OllamaConfig,
  build: OllamaBuildOptions = {},
): InlineAdapter {
  const transport = new HttpTransport({ base_url: config.url, timeout_ms: config.timeout_ms, fetch: build.fetch });
  const inference = new OllamaInference(transport, new ModelTable(config.models));

  return new InlineAdapter({
    provider_id: providerId,
    provider_type: 'remote::ollama',
    kind: ProviderKind.Remote,
    capability: CapabilityGroup.Inference,
    operations: inferenceOperations(inference),
    initialize: async () => {
      if (config.check_connection) {
        await inference.ping(new AbortController().signal);
      }
    },
  });
}

export const OLLAMA_PROVIDER = defineProvider({
  capability: CapabilityGroup.Inference,
  provider_type: 'remote::ollama',
  description: 'Chat, completion and embeddings served by an Ollama server',
  config: OllamaConfigSchema,
  build: (config, context) => createOllamaAdapter(context.provider_id, config),
});
