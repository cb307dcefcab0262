/**
 * Capstack Memory Module — Memory Bank Engine
 *
 * Holds memory banks for one provider binding. A bank owns its chunks and
 * the documents they came from; chunks are appended, never mutated.
 *
 * Insert contract:
 * - The whole batch is validated, fetched, chunked and embedded before any
 *   chunk is stored. A failure leaves the bank exactly as it was.
 * - Inserts into the same bank are serialized; different banks proceed
 *   concurrently.
 * - A document's chunks are stored contiguously, in content order.
 *
 * Query contract:
 * - Each query string is embedded and every chunk scored by cosine similarity.
 * - Per query, the top `max_chunks` (default 3, at most 64) are kept.
 * - Results of all queries are merged (best score per chunk), then sorted by
 *   score descending with insertion order breaking ties.
 */

import { ChunkingError, ConfigError, NotFoundError, AdapterError } from '@capstack/core';
import type {
  BankIdRequest,
  EmptyResponse,
  GetMemoryBankResponse,
  InsertDocumentsRequest,
  InvokeOptions,
  ListMemoryBanksRequest,
  ListMemoryBanksResponse,
  MemoryApi,
  MemoryBank,
  MemoryBankSpec,
  MemoryDocument,
  QueryDocumentsRequest,
  QueryDocumentsResponse,
  RegisterMemoryBankResponse,
} from '@capstack/core';
import { KeyedLock } from '@capstack/runtime-host';
import { chunkText } from './chunker.js';
import { resolveDocumentText } from './content.js';
import { cosineSimilarity } from './vector.js';

export const DEFAULT_MAX_CHUNKS = 3;
export const MAX_CHUNKS_LIMIT = 64;

/** Produces one embedding per input text, in order. */
export type Embedder = (
  model: string,
  contents: ReadonlyArray<string>,
  signal: AbortSignal,
) => Promise<ReadonlyArray<ReadonlyArray<number>>>;

export interface MemoryEngineOptions {
  /** Binding id recorded on banks registered without one. */
  readonly provider_id: string;
  readonly embed: Embedder;
  readonly uri_timeout_ms: number;
  readonly fetch?: typeof fetch | undefined;
}

interface StoredChunk {
  readonly seq: number;
  readonly document_id: string;
  readonly content: string;
  readonly token_count: number;
  readonly embedding: ReadonlyArray<number>;
}

interface BankState {
  readonly bank: MemoryBank;
  readonly documents: Map<string, MemoryDocument>;
  readonly chunks: StoredChunk[];
  nextSeq: number;
}

export class MemoryBankEngine implements MemoryApi {
  private readonly banks = new Map<string, BankState>();
  private readonly lock = new KeyedLock();

  constructor(private readonly options: MemoryEngineOptions) {}

  // -------------------------------------------------------------------------
  // Bank lifecycle
  // -------------------------------------------------------------------------

  async register_memory_bank(spec: MemoryBankSpec, _options: InvokeOptions): Promise<RegisterMemoryBankResponse> {
    const bank = this.validateSpec(spec);
    if (this.banks.has(bank.identifier)) {
      throw new ConfigError('DuplicateBank', `Memory bank '${bank.identifier}' is already registered`);
    }
    this.banks.set(bank.identifier, { bank, documents: new Map(), chunks: [], nextSeq: 0 });
    return { bank_id: bank.identifier };
  }

  async unregister_memory_bank(request: BankIdRequest, _options: InvokeOptions): Promise<RegisterMemoryBankResponse> {
    return this.lock.run(request.bank_id, async () => {
      this.requireBank(request.bank_id);
      this.banks.delete(request.bank_id);
      return { bank_id: request.bank_id };
    });
  }

  async list_memory_banks(_request: ListMemoryBanksRequest, _options: InvokeOptions): Promise<ListMemoryBanksResponse> {
    return { banks: [...this.banks.values()].map((state) => state.bank) };
  }

  async get_memory_bank(request: BankIdRequest, _options: InvokeOptions): Promise<GetMemoryBankResponse> {
    return { bank: this.banks.get(request.bank_id)?.bank ?? null };
  }

  // -------------------------------------------------------------------------
  // Insert
  // -------------------------------------------------------------------------

  async insert_documents(request: InsertDocumentsRequest, options: InvokeOptions): Promise<EmptyResponse> {
    this.requireBank(request.bank_id);

    return this.lock.run(request.bank_id, async () => {
      // The bank may have been unregistered while this insert waited.
      const state = this.requireBank(request.bank_id);
      this.checkDocumentIds(state, request.documents);

      const prepared: Array<{ doc: MemoryDocument; windows: ReturnType<typeof chunkText> }> = [];
      for (const doc of request.documents) {
        const text = await resolveDocumentText(doc, {
          uri_timeout_ms: this.options.uri_timeout_ms,
          signal: options.signal,
          fetch: this.options.fetch,
        });
        const windows = chunkText(text, state.bank.chunk_size_in_tokens, state.bank.overlap_size_in_tokens);
        if (windows.length === 0) {
          throw new ChunkingError('EmptyContent', `Document '${doc.document_id}' has no content to chunk`);
        }
        prepared.push({ doc, windows });
      }

      const texts = prepared.flatMap(({ windows }) => windows.map((w) => w.content));
      const embeddings = texts.length > 0 ? await this.embed(state.bank.embedding_model, texts, options.signal) : [];

      let i = 0;
      for (const { doc, windows } of prepared) {
        state.documents.set(doc.document_id, doc);
        for (const window of windows) {
          state.chunks.push({
            seq: state.nextSeq++,
            document_id: doc.document_id,
            content: window.content,
            token_count: window.token_count,
            embedding: embeddings[i++] ?? [],
          });
        }
      }
      return {};
    });
  }

  // -------------------------------------------------------------------------
  // Query
  // -------------------------------------------------------------------------

  async query_documents(request: QueryDocumentsRequest, options: InvokeOptions): Promise<QueryDocumentsResponse> {
    const state = this.requireBank(request.bank_id);
    // Snapshot: chunks appended by a concurrent insert are not scored.
    const chunks = state.chunks.slice();
    if (chunks.length === 0) {
      return { chunks: [], scores: [] };
    }

    const limit = Math.min(request.params?.max_chunks ?? DEFAULT_MAX_CHUNKS, MAX_CHUNKS_LIMIT);
    const threshold = request.params?.score_threshold;
    const queryEmbeddings = await this.embed(state.bank.embedding_model, request.query, options.signal);

    const best = new Map<number, { chunk: StoredChunk; score: number }>();
    for (const queryEmbedding of queryEmbeddings) {
      const ranked = chunks
        .map((chunk) => ({ chunk, score: this.score(queryEmbedding, chunk) }))
        .filter((hit) => threshold === undefined || hit.score >= threshold)
        .sort(byScoreThenSeq)
        .slice(0, limit);

      for (const hit of ranked) {
        const seen = best.get(hit.chunk.seq);
        if (seen === undefined || hit.score > seen.score) {
          best.set(hit.chunk.seq, hit);
        }
      }
    }

    const merged = [...best.values()].sort(byScoreThenSeq);
    return {
      chunks: merged.map(({ chunk }) => ({
        document_id: chunk.document_id,
        content: chunk.content,
        token_count: chunk.token_count,
      })),
      scores: merged.map(({ score }) => score),
    };
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private validateSpec(spec: MemoryBankSpec): MemoryBank {
    if (spec.chunk_size_in_tokens <= 0) {
      throw new ConfigError(
        'InvalidBankConfig',
        `chunk_size_in_tokens must be positive, got ${spec.chunk_size_in_tokens}`,
      );
    }
    if (spec.overlap_size_in_tokens < 0 || spec.overlap_size_in_tokens >= spec.chunk_size_in_tokens) {
      throw new ConfigError(
        'InvalidBankConfig',
        `overlap_size_in_tokens must be in [0, ${spec.chunk_size_in_tokens}), got ${spec.overlap_size_in_tokens}`,
      );
    }
    if (spec.provider_id !== undefined && spec.provider_id !== this.options.provider_id) {
      throw new ConfigError(
        'InvalidBankConfig',
        `Memory bank '${spec.identifier}' names provider '${spec.provider_id}' but was sent to '${this.options.provider_id}'`,
        { provider_id: this.options.provider_id },
      );
    }
    return {
      identifier: spec.identifier,
      embedding_model: spec.embedding_model,
      chunk_size_in_tokens: spec.chunk_size_in_tokens,
      overlap_size_in_tokens: spec.overlap_size_in_tokens,
      provider_id: this.options.provider_id,
    };
  }

  private requireBank(bankId: string): BankState {
    const state = this.banks.get(bankId);
    if (state === undefined) {
      throw new NotFoundError('BankId', `Memory bank '${bankId}' does not exist`);
    }
    return state;
  }

  private checkDocumentIds(state: BankState, documents: ReadonlyArray<MemoryDocument>): void {
    const batch = new Set<string>();
    for (const doc of documents) {
      if (state.documents.has(doc.document_id) || batch.has(doc.document_id)) {
        throw new ChunkingError(
          'DuplicateDocumentId',
          `Document '${doc.document_id}' already exists in bank '${state.bank.identifier}'`,
        );
      }
      batch.add(doc.document_id);
    }
  }

  private async embed(
    model: string,
    contents: ReadonlyArray<string>,
    signal: AbortSignal,
  ): Promise<ReadonlyArray<ReadonlyArray<number>>> {
    const embeddings = await this.options.embed(model, contents, signal);
    if (embeddings.length !== contents.length) {
      throw new AdapterError(
        'InvalidResponse',
        `Embedding model '${model}' returned ${embeddings.length} embeddings for ${contents.length} inputs`,
      );
    }
    return embeddings;
  }

  private score(query: ReadonlyArray<number>, chunk: StoredChunk): number {
    try {
      return cosineSimilarity(query, chunk.embedding);
    } catch (err: unknown) {
      throw new AdapterError('InvalidResponse', `Cannot score chunk ${chunk.seq}: ${String(err)}`, { cause: err });
    }
  }
}

function byScoreThenSeq(
  a: { chunk: StoredChunk; score: number },
  b: { chunk: StoredChunk; score: number },
): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.chunk.seq - b.chunk.seq;
}
