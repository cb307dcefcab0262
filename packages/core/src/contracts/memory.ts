/**
 * Capstack Core — Memory Contract
 *
 * Memory banks hold chunked documents and answer similarity queries. A bank
 * is created by registration, grows only by appending chunks, and is
 * destroyed by unregistration.
 */

import { z } from 'zod';
import type { Dispatch, DispatchOptions, InvokeOptions, OperationTable } from './shared.js';
import { groupCall, handle, operation } from './shared.js';

// ---------------------------------------------------------------------------
// Banks
// ---------------------------------------------------------------------------

export const MemoryBankSpecSchema = z.object({
  identifier: z.string().min(1),
  embedding_model: z.string().min(1),
  chunk_size_in_tokens: z.number().int(),
  overlap_size_in_tokens: z.number().int(),
  /** Defaults to the memory provider that receives the registration. */
  provider_id: z.string().min(1).optional(),
});
export type MemoryBankSpec = z.infer<typeof MemoryBankSpecSchema>;

export const MemoryBankSchema = z.object({
  identifier: z.string(),
  embedding_model: z.string(),
  chunk_size_in_tokens: z.number().int(),
  overlap_size_in_tokens: z.number().int(),
  provider_id: z.string(),
});
export type MemoryBank = z.infer<typeof MemoryBankSchema>;

// ---------------------------------------------------------------------------
// Documents and chunks
// ---------------------------------------------------------------------------

export const DocumentContentSchema = z.union([
  z.string(),
  z.object({ uri: z.string().url() }),
  z.object({ data: z.string().base64() }),
]);
export type DocumentContent = z.infer<typeof DocumentContentSchema>;

export const MemoryDocumentSchema = z.object({
  document_id: z.string().min(1),
  content: DocumentContentSchema,
  mime_type: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});
export type MemoryDocument = z.infer<typeof MemoryDocumentSchema>;

export const ChunkSchema = z.object({
  document_id: z.string(),
  content: z.string(),
  token_count: z.number().int().nonnegative(),
});
export type Chunk = z.infer<typeof ChunkSchema>;

// ---------------------------------------------------------------------------
// Requests and results
// ---------------------------------------------------------------------------

export const BankIdRequestSchema = z.object({ bank_id: z.string().min(1) });
export type BankIdRequest = z.infer<typeof BankIdRequestSchema>;

export const RegisterMemoryBankResponseSchema = z.object({ bank_id: z.string() });
export type RegisterMemoryBankResponse = z.infer<typeof RegisterMemoryBankResponseSchema>;

export const InsertDocumentsRequestSchema = z.object({
  bank_id: z.string().min(1),
  documents: z.array(MemoryDocumentSchema),
});
export type InsertDocumentsRequest = z.infer<typeof InsertDocumentsRequestSchema>;

export const EmptyResponseSchema = z.object({});
export type EmptyResponse = z.infer<typeof EmptyResponseSchema>;

export const QueryParamsSchema = z.object({
  max_chunks: z.number().int().positive().optional(),
  score_threshold: z.number().optional(),
});
export type QueryParams = z.infer<typeof QueryParamsSchema>;

export const QueryDocumentsRequestSchema = z.object({
  bank_id: z.string().min(1),
  query: z.array(z.string()).min(1),
  params: QueryParamsSchema.optional(),
});
export type QueryDocumentsRequest = z.infer<typeof QueryDocumentsRequestSchema>;

export const QueryDocumentsResponseSchema = z
  .object({
    chunks: z.array(ChunkSchema),
    scores: z.array(z.number()),
  })
  .refine((r) => r.chunks.length === r.scores.length, {
    message: 'chunks and scores must have the same length',
  });
export type QueryDocumentsResponse = z.infer<typeof QueryDocumentsResponseSchema>;

export const ListMemoryBanksRequestSchema = z.object({});
export type ListMemoryBanksRequest = z.infer<typeof ListMemoryBanksRequestSchema>;

export const ListMemoryBanksResponseSchema = z.object({ banks: z.array(MemoryBankSchema) });
export type ListMemoryBanksResponse = z.infer<typeof ListMemoryBanksResponseSchema>;

export const GetMemoryBankResponseSchema = z.object({ bank: MemoryBankSchema.nullable() });
export type GetMemoryBankResponse = z.infer<typeof GetMemoryBankResponseSchema>;

// ---------------------------------------------------------------------------
// Contract
// ---------------------------------------------------------------------------

export const MEMORY_CONTRACT = {
  register_memory_bank: operation(MemoryBankSpecSchema, RegisterMemoryBankResponseSchema),
  insert_documents: operation(InsertDocumentsRequestSchema, EmptyResponseSchema),
  query_documents: operation(QueryDocumentsRequestSchema, QueryDocumentsResponseSchema),
  unregister_memory_bank: operation(BankIdRequestSchema, RegisterMemoryBankResponseSchema),
  list_memory_banks: operation(ListMemoryBanksRequestSchema, ListMemoryBanksResponseSchema),
  get_memory_bank: operation(BankIdRequestSchema, GetMemoryBankResponseSchema),
};

export interface MemoryApi {
  register_memory_bank(request: MemoryBankSpec, options: InvokeOptions): Promise<RegisterMemoryBankResponse>;
  insert_documents(request: InsertDocumentsRequest, options: InvokeOptions): Promise<EmptyResponse>;
  query_documents(request: QueryDocumentsRequest, options: InvokeOptions): Promise<QueryDocumentsResponse>;
  unregister_memory_bank(request: BankIdRequest, options: InvokeOptions): Promise<RegisterMemoryBankResponse>;
  list_memory_banks(request: ListMemoryBanksRequest, options: InvokeOptions): Promise<ListMemoryBanksResponse>;
  get_memory_bank(request: BankIdRequest, options: InvokeOptions): Promise<GetMemoryBankResponse>;
}

export function memoryOperations(api: MemoryApi): OperationTable<typeof MEMORY_CONTRACT> {
  return {
    register_memory_bank: handle(MemoryBankSpecSchema, (req, opts) => api.register_memory_bank(req, opts)),
    insert_documents: handle(InsertDocumentsRequestSchema, (req, opts) => api.insert_documents(req, opts)),
    query_documents: handle(QueryDocumentsRequestSchema, (req, opts) => api.query_documents(req, opts)),
    unregister_memory_bank: handle(BankIdRequestSchema, (req, opts) => api.unregister_memory_bank(req, opts)),
    list_memory_banks: handle(ListMemoryBanksRequestSchema, (req, opts) => api.list_memory_banks(req, opts)),
    get_memory_bank: handle(BankIdRequestSchema, (req, opts) => api.get_memory_bank(req, opts)),
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface MemoryClient {
  register_memory_bank(request: MemoryBankSpec): Promise<RegisterMemoryBankResponse>;
  insert_documents(request: InsertDocumentsRequest): Promise<EmptyResponse>;
  query_documents(request: QueryDocumentsRequest): Promise<QueryDocumentsResponse>;
  unregister_memory_bank(request: BankIdRequest): Promise<RegisterMemoryBankResponse>;
  list_memory_banks(request?: ListMemoryBanksRequest): Promise<ListMemoryBanksResponse>;
  get_memory_bank(request: BankIdRequest): Promise<GetMemoryBankResponse>;
}

export function memoryClient(dispatch: Dispatch, options: DispatchOptions = {}): MemoryClient {
  const call = groupCall(dispatch, 'memory', options);
  return {
    register_memory_bank: (request) => call('register_memory_bank', request, RegisterMemoryBankResponseSchema),
    insert_documents: (request) => call('insert_documents', request, EmptyResponseSchema),
    query_documents: (request) => call('query_documents', request, QueryDocumentsResponseSchema),
    unregister_memory_bank: (request) => call('unregister_memory_bank', request, RegisterMemoryBankResponseSchema),
    list_memory_banks: (request = {}) => call('list_memory_banks', request, ListMemoryBanksResponseSchema),
    get_memory_bank: (request) => call('get_memory_bank', request, GetMemoryBankResponseSchema),
  };
}
