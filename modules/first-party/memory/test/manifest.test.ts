/**
 * Capstack Memory Module — Provider Manifest Tests
 *
 *   MEMP-U1: config is validated; bad config is InvalidProviderConfig
 *   MEMP-U2: embeddings are requested through the stack's inference group
 *   MEMP-U3: banks listed in config are registered on initialize
 *   MEMP-U4: payloads are validated before reaching the engine
 */

import { describe, it, expect, vi } from 'vitest';
import { CapabilityGroup, ProviderKind, StackClient } from '@capstack/core';
import type { Dispatch, ProviderContext } from '@capstack/core';
import { MEMORY_PROVIDER } from '../src/manifest.js';

const opts = { signal: new AbortController().signal };

function contextWith(dispatch: Dispatch): ProviderContext {
  return {
    provider_id: 'meta-memory',
    capability: CapabilityGroup.Memory,
    client: new StackClient(dispatch),
    groups: new Set([CapabilityGroup.Memory, CapabilityGroup.Inference]),
    home: undefined,
  };
}

const embeddingsDispatch = vi.fn<Dispatch>(async (capability, operation, payload) => {
  if (capability === 'inference' && operation === 'embeddings') {
    const contents = typeof payload === 'object' && payload !== null && 'contents' in payload
      ? payload.contents
      : [];
    return { embeddings: Array.isArray(contents) ? contents.map(() => [1, 0]) : [] };
  }
  throw new Error(`unexpected call ${capability}.${operation}`);
});

describe('MEMORY_PROVIDER', () => {
  it('declares itself as an inline memory provider depending on inference', () => {
    expect(MEMORY_PROVIDER.capability).toBe(CapabilityGroup.Memory);
    expect(MEMORY_PROVIDER.provider_type).toBe('inline::meta-reference');
    expect(MEMORY_PROVIDER.kind).toBe(ProviderKind.Inline);
    expect(MEMORY_PROVIDER.dependencies).toEqual([CapabilityGroup.Inference]);
  });

  it('MEMP-U1: bad config is InvalidProviderConfig', () => {
    let caught: unknown;
    try {
      MEMORY_PROVIDER.build({ uri_timeout_ms: -1 }, contextWith(embeddingsDispatch));
    } catch (err: unknown) {
      caught = err;
    }

    expect(caught).toMatchObject({ code: 'InvalidProviderConfig', provider_id: 'meta-memory' });
  });

  it('MEMP-U2: embeddings go through inference.embeddings with the bank model', async () => {
    embeddingsDispatch.mockClear();
    const adapter = MEMORY_PROVIDER.build({}, contextWith(embeddingsDispatch));
    await adapter.initialize();

    await adapter.invoke(
      'register_memory_bank',
      { identifier: 'kb', embedding_model: 'all-minilm', chunk_size_in_tokens: 16, overlap_size_in_tokens: 2 },
      opts,
    );
    await adapter.invoke('insert_documents', { bank_id: 'kb', documents: [{ document_id: 'd', content: 'hello there' }] }, opts);

    expect(embeddingsDispatch).toHaveBeenCalledTimes(1);
    const [capability, operation, payload] = embeddingsDispatch.mock.calls[0]!;
    expect([capability, operation]).toEqual(['inference', 'embeddings']);
    expect(payload).toEqual({ model: 'all-minilm', contents: ['hello there'] });
  });

  it('MEMP-U3: banks listed in config are registered on initialize', async () => {
    const adapter = MEMORY_PROVIDER.build(
      {
        banks: [
          { identifier: 'preloaded', embedding_model: 'all-minilm', chunk_size_in_tokens: 64, overlap_size_in_tokens: 8 },
        ],
      },
      contextWith(embeddingsDispatch),
    );
    await adapter.initialize();

    await expect(adapter.invoke('get_memory_bank', { bank_id: 'preloaded' }, opts)).resolves.toEqual({
      bank: {
        identifier: 'preloaded',
        embedding_model: 'all-minilm',
        chunk_size_in_tokens: 64,
        overlap_size_in_tokens: 8,
        provider_id: 'meta-memory',
      },
    });
  });

  it('MEMP-U4: a malformed payload is RoutingError(InvalidRequest)', async () => {
    const adapter = MEMORY_PROVIDER.build({}, contextWith(embeddingsDispatch));

    await expect(adapter.invoke('query_documents', { bank_id: 'kb', query: [] }, opts)).rejects.toMatchObject({
      name: 'RoutingError',
      code: 'InvalidRequest',
    });
  });
});
