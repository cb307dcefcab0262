/**
 * Capstack Memory Module — Memory Bank Engine Tests
 *
 *   MEM-U1: register rejects duplicates and invalid window sizes
 *   MEM-U2: query scores by cosine similarity, best first
 *   MEM-U3: multiple queries merge, keeping each chunk's best score
 *   MEM-U4: duplicate document ids fail the batch and leave the bank untouched
 *   MEM-U5: unknown bank is NotFoundError(BankId)
 *   MEM-U6: empty bank returns empty arrays without embedding
 *   MEM-U7: repeated identical queries return identical results
 *   MEM-U8: content resolution (base64, URI, unsupported, empty)
 *   MEM-U9: inserts into one bank are serialized and stored contiguously
 *   MEM-U10: embedder returning the wrong count is InvalidResponse
 *   MEM-U11: unregister, list and get
 *   MEM-U12: a bank naming another provider is rejected
 *   MEM-U13: inserts into different banks do not wait on each other
 */

import { describe, it, expect, vi } from 'vitest';
import type { InvokeOptions, MemoryBankSpec } from '@capstack/core';
import { MemoryBankEngine } from '../src/engine.js';
import type { Embedder } from '../src/engine.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const VOCABULARY = ['alpha', 'beta', 'gamma'];

/** Counts vocabulary words; deterministic and offline. */
const wordCountEmbedder: Embedder = async (_model, contents) =>
  contents.map((text) => {
    const words = text.toLowerCase().split(/\s+/);
    return VOCABULARY.map((term) => words.filter((w) => w === term).length);
  });

const opts: InvokeOptions = { signal: new AbortController().signal };

function bankSpec(overrides: Partial<MemoryBankSpec> = {}): MemoryBankSpec {
  return {
    identifier: 'notes',
    embedding_model: 'test-embedder',
    chunk_size_in_tokens: 100,
    overlap_size_in_tokens: 0,
    ...overrides,
  };
}

function makeEngine(embed: Embedder = wordCountEmbedder, fetchImpl?: typeof fetch): MemoryBankEngine {
  return new MemoryBankEngine({ provider_id: 'memory-test', embed, uri_timeout_ms: 1000, fetch: fetchImpl });
}

async function seeded(): Promise<MemoryBankEngine> {
  const engine = makeEngine();
  await engine.register_memory_bank(bankSpec(), opts);
  await engine.insert_documents(
    {
      bank_id: 'notes',
      documents: [
        { document_id: 'd1', content: 'alpha alpha' },
        { document_id: 'd2', content: 'beta' },
        { document_id: 'd3', content: 'alpha beta' },
      ],
    },
    opts,
  );
  return engine;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('MemoryBankEngine', () => {
  it('MEM-U1: register rejects duplicates and invalid window sizes', async () => {
    const engine = makeEngine();
    await expect(engine.register_memory_bank(bankSpec(), opts)).resolves.toEqual({ bank_id: 'notes' });

    await expect(engine.register_memory_bank(bankSpec(), opts)).rejects.toMatchObject({
      name: 'ConfigError',
      code: 'DuplicateBank',
    });
    await expect(
      engine.register_memory_bank(bankSpec({ identifier: 'b', chunk_size_in_tokens: 0 }), opts),
    ).rejects.toMatchObject({ code: 'InvalidBankConfig' });
    await expect(
      engine.register_memory_bank(
        bankSpec({ identifier: 'c', chunk_size_in_tokens: 8, overlap_size_in_tokens: 8 }),
        opts,
      ),
    ).rejects.toMatchObject({ code: 'InvalidBankConfig' });
  });

  it('MEM-U2: query scores by cosine similarity, best first', async () => {
    const engine = await seeded();

    const result = await engine.query_documents({ bank_id: 'notes', query: ['alpha'] }, opts);

    expect(result.chunks.map((c) => c.document_id)).toEqual(['d1', 'd3', 'd2']);
    expect(result.scores[0]).toBeCloseTo(1);
    expect(result.scores[1]).toBeCloseTo(Math.SQRT1_2);
    expect(result.scores[2]).toBeCloseTo(0);
    expect(result.chunks[0]).toEqual({ document_id: 'd1', content: 'alpha alpha', token_count: 2 });
  });

  it('MEM-U2: max_chunks and score_threshold limit the hits', async () => {
    const engine = await seeded();

    const top1 = await engine.query_documents(
      { bank_id: 'notes', query: ['alpha'], params: { max_chunks: 1 } },
      opts,
    );
    const thresholded = await engine.query_documents(
      { bank_id: 'notes', query: ['alpha'], params: { score_threshold: 0.5 } },
      opts,
    );

    expect(top1.chunks.map((c) => c.document_id)).toEqual(['d1']);
    expect(thresholded.chunks.map((c) => c.document_id)).toEqual(['d1', 'd3']);
  });

  it('MEM-U3: multiple queries merge and ties keep insertion order', async () => {
    const engine = await seeded();

    const result = await engine.query_documents(
      { bank_id: 'notes', query: ['beta', 'alpha'], params: { max_chunks: 2 } },
      opts,
    );

    // beta → d2 (1), d3 (0.707); alpha → d1 (1), d3 (0.707)
    expect(result.chunks.map((c) => c.document_id)).toEqual(['d1', 'd2', 'd3']);
    expect(result.scores).toHaveLength(3);
    for (let i = 1; i < result.scores.length; i++) {
      expect(result.scores[i]!).toBeLessThanOrEqual(result.scores[i - 1]!);
    }
  });

  it('MEM-U4: duplicate document ids fail the batch and leave the bank untouched', async () => {
    const engine = await seeded();
    const before = await engine.query_documents(
      { bank_id: 'notes', query: ['gamma alpha'], params: { max_chunks: 64 } },
      opts,
    );

    await expect(
      engine.insert_documents(
        {
          bank_id: 'notes',
          documents: [
            { document_id: 'd4', content: 'gamma' },
            { document_id: 'd1', content: 'gamma gamma' },
          ],
        },
        opts,
      ),
    ).rejects.toMatchObject({ name: 'ChunkingError', code: 'DuplicateDocumentId' });
    await expect(
      engine.insert_documents(
        {
          bank_id: 'notes',
          documents: [
            { document_id: 'd5', content: 'gamma' },
            { document_id: 'd5', content: 'gamma' },
          ],
        },
        opts,
      ),
    ).rejects.toMatchObject({ code: 'DuplicateDocumentId' });

    const after = await engine.query_documents(
      { bank_id: 'notes', query: ['gamma alpha'], params: { max_chunks: 64 } },
      opts,
    );
    expect(after).toEqual(before);
    expect(after.chunks).toHaveLength(3);
  });

  it('MEM-U5: unknown bank is NotFoundError(BankId)', async () => {
    const engine = makeEngine();

    await expect(
      engine.insert_documents({ bank_id: 'missing', documents: [] }, opts),
    ).rejects.toMatchObject({ name: 'NotFoundError', code: 'BankId' });
    await expect(
      engine.query_documents({ bank_id: 'missing', query: ['x'] }, opts),
    ).rejects.toMatchObject({ name: 'NotFoundError', code: 'BankId' });
  });

  it('MEM-U6: empty bank returns empty arrays without embedding', async () => {
    const embed = vi.fn(wordCountEmbedder);
    const engine = makeEngine(embed);
    await engine.register_memory_bank(bankSpec(), opts);

    const result = await engine.query_documents({ bank_id: 'notes', query: ['alpha'] }, opts);

    expect(result).toEqual({ chunks: [], scores: [] });
    expect(embed).not.toHaveBeenCalled();
  });

  it('MEM-U7: repeated identical queries return identical results', async () => {
    const engine = await seeded();
    const request = { bank_id: 'notes', query: ['alpha beta'] };

    const first = await engine.query_documents(request, opts);
    const second = await engine.query_documents(request, opts);

    expect(second).toEqual(first);
  });

  describe('MEM-U8: content resolution', () => {
    it('decodes base64 data', async () => {
      const engine = makeEngine();
      await engine.register_memory_bank(bankSpec(), opts);
      await engine.insert_documents(
        {
          bank_id: 'notes',
          documents: [{ document_id: 'b64', content: { data: Buffer.from('gamma beta').toString('base64') } }],
        },
        opts,
      );

      const result = await engine.query_documents({ bank_id: 'notes', query: ['gamma'] }, opts);
      expect(result.chunks[0]?.content).toBe('gamma beta');
    });

    it('fetches URI content and uses its content type', async () => {
      const fakeFetch = vi.fn<typeof fetch>(
        async () => new Response('alpha from uri', { headers: { 'content-type': 'text/plain; charset=utf-8' } }),
      );
      const engine = makeEngine(wordCountEmbedder, fakeFetch);
      await engine.register_memory_bank(bankSpec(), opts);

      await engine.insert_documents(
        { bank_id: 'notes', documents: [{ document_id: 'u1', content: { uri: 'http://docs.test/a.txt' } }] },
        opts,
      );

      expect(fakeFetch).toHaveBeenCalledTimes(1);
      expect(fakeFetch.mock.calls[0]?.[0]).toBe('http://docs.test/a.txt');
      const result = await engine.query_documents({ bank_id: 'notes', query: ['alpha'] }, opts);
      expect(result.chunks.map((c) => c.content)).toEqual(['alpha from uri']);
    });

    it('rejects a URI served with a non-text content type', async () => {
      const fakeFetch = vi.fn<typeof fetch>(
        async () => new Response('PNG', { headers: { 'content-type': 'image/png' } }),
      );
      const engine = makeEngine(wordCountEmbedder, fakeFetch);
      await engine.register_memory_bank(bankSpec(), opts);

      await expect(
        engine.insert_documents(
          { bank_id: 'notes', documents: [{ document_id: 'u1', content: { uri: 'http://docs.test/a.png' } }] },
          opts,
        ),
      ).rejects.toMatchObject({ code: 'UnsupportedContent' });
    });

    it('rejects unsupported mime types and empty content', async () => {
      const engine = makeEngine();
      await engine.register_memory_bank(bankSpec(), opts);

      await expect(
        engine.insert_documents(
          { bank_id: 'notes', documents: [{ document_id: 'p', content: 'alpha', mime_type: 'application/pdf' }] },
          opts,
        ),
      ).rejects.toMatchObject({ code: 'UnsupportedContent' });
      await expect(
        engine.insert_documents({ bank_id: 'notes', documents: [{ document_id: 'e', content: '   ' }] }, opts),
      ).rejects.toMatchObject({ code: 'EmptyContent' });
    });
  });

  it('MEM-U9: inserts into one bank are serialized and stored contiguously', async () => {
    let calls = 0;
    // Every chunk embeds identically, so query order is insertion order.
    const slowFirst: Embedder = async (_model, contents) => {
      calls++;
      if (calls === 1) {
        await new Promise((resolve) => setTimeout(resolve, 20));
      }
      return contents.map(() => [1, 0]);
    };
    const engine = makeEngine(slowFirst);
    await engine.register_memory_bank(bankSpec({ chunk_size_in_tokens: 2 }), opts);

    await Promise.all([
      engine.insert_documents({ bank_id: 'notes', documents: [{ document_id: 'A', content: 'a1 a2 a3 a4' }] }, opts),
      engine.insert_documents({ bank_id: 'notes', documents: [{ document_id: 'B', content: 'b1 b2 b3 b4' }] }, opts),
    ]);

    const result = await engine.query_documents(
      { bank_id: 'notes', query: ['anything'], params: { max_chunks: 64 } },
      opts,
    );
    expect(result.chunks.map((c) => c.content)).toEqual(['a1 a2 ', 'a3 a4', 'b1 b2 ', 'b3 b4']);
  });

  it('MEM-U10: embedder returning the wrong count is InvalidResponse', async () => {
    const engine = makeEngine(async () => [[1, 0]]);
    await engine.register_memory_bank(bankSpec({ chunk_size_in_tokens: 1 }), opts);

    await expect(
      engine.insert_documents({ bank_id: 'notes', documents: [{ document_id: 'x', content: 'one two' }] }, opts),
    ).rejects.toMatchObject({ name: 'AdapterError', code: 'InvalidResponse' });
  });

  it('MEM-U11: unregister, list and get', async () => {
    const engine = makeEngine();
    await engine.register_memory_bank(bankSpec(), opts);
    await engine.register_memory_bank(bankSpec({ identifier: 'other', provider_id: 'memory-test' }), opts);

    const listed = await engine.list_memory_banks({}, opts);
    expect(listed.banks.map((b) => [b.identifier, b.provider_id])).toEqual([
      ['notes', 'memory-test'],
      ['other', 'memory-test'],
    ]);

    await expect(engine.unregister_memory_bank({ bank_id: 'notes' }, opts)).resolves.toEqual({ bank_id: 'notes' });
    await expect(engine.get_memory_bank({ bank_id: 'notes' }, opts)).resolves.toEqual({ bank: null });
    await expect(engine.unregister_memory_bank({ bank_id: 'notes' }, opts)).rejects.toMatchObject({
      code: 'BankId',
    });
  });

  it('MEM-U12: a bank naming another provider is rejected', async () => {
    const engine = makeEngine();

    await expect(
      engine.register_memory_bank(bankSpec({ provider_id: 'meta1' }), opts),
    ).rejects.toMatchObject({
      name: 'ConfigError',
      code: 'InvalidBankConfig',
      message: "Memory bank 'notes' names provider 'meta1' but was sent to 'memory-test'",
    });
    await expect(engine.get_memory_bank({ bank_id: 'notes' }, opts)).resolves.toEqual({ bank: null });
  });

  it('MEM-U13: inserts into different banks do not wait on each other', async () => {
    let unblock: () => void = () => undefined;
    const blocked = new Promise<void>((resolve) => {
      unblock = resolve;
    });
    const embed: Embedder = async (model, contents) => {
      if (model === 'blocking') await blocked;
      return contents.map(() => [1, 0]);
    };
    const engine = makeEngine(embed);
    await engine.register_memory_bank(bankSpec({ identifier: 'a', embedding_model: 'blocking' }), opts);
    await engine.register_memory_bank(bankSpec({ identifier: 'b' }), opts);

    let aDone = false;
    const insertA = engine
      .insert_documents({ bank_id: 'a', documents: [{ document_id: 'a1', content: 'alpha' }] }, opts)
      .then(() => {
        aDone = true;
      });
    await engine.insert_documents({ bank_id: 'b', documents: [{ document_id: 'b1', content: 'beta' }] }, opts);

    expect(aDone).toBe(false);
    unblock();
    await insertA;
    expect(aDone).toBe(true);
  });
});
