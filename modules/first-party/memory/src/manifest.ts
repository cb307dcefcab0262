/**
 * Capstack Memory Module — Provider Manifest
 *
 * Catalog entry for `inline::meta-reference` in the memory group. Embeddings
 * are computed by the stack's own inference capability, so the manifest must
 * bind `inference` as well.
 */

import { z } from 'zod';
import {
  CapabilityGroup,
  InlineAdapter,
  MemoryBankSpecSchema,
  defineProvider,
  memoryOperations,
} from '@capstack/core';
import type { InvokeOptions } from '@capstack/core';
import { MemoryBankEngine } from './engine.js';

export const DEFAULT_URI_TIMEOUT_MS = 10_000;

export const MemoryProviderConfigSchema = z.object({
  uri_timeout_ms: z.number().int().positive().default(DEFAULT_URI_TIMEOUT_MS),
  /** Banks registered when the provider initializes. */
  banks: z.array(MemoryBankSpecSchema).default([]),
});
export type MemoryProviderConfig = z.output<typeof MemoryProviderConfigSchema>;

export const MEMORY_PROVIDER = defineProvider({
  capability: CapabilityGroup.Memory,
  provider_type: 'inline::meta-reference',
  description: 'In-process memory banks with token-window chunking and cosine-similarity query',
  dependencies: [CapabilityGroup.Inference],
  config: MemoryProviderConfigSchema,
  build(config, context) {
    const engine = new MemoryBankEngine({
      provider_id: context.provider_id,
      uri_timeout_ms: config.uri_timeout_ms,
      embed: async (model, contents, signal) => {
        const response = await context.client
          .withOptions({ signal })
          .inference.embeddings({ model, contents: [...contents] });
        return response.embeddings;
      },
    });

    return new InlineAdapter({
      provider_id: context.provider_id,
      provider_type: 'inline::meta-reference',
      capability: CapabilityGroup.Memory,
      operations: memoryOperations(engine),
      initialize: async () => {
        const options: InvokeOptions = { signal: new AbortController().signal };
        for (const bank of config.banks) {
          await engine.register_memory_bank(bank, options);
        }
      },
    });
  },
});
