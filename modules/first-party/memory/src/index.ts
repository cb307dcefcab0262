/**
 * @capstack/module-memory
 *
 * Memory banks: token-window chunking, embedding storage and
 * cosine-similarity query. Exports the provider manifest for the catalog
 * and the engine for direct use.
 */

export { MEMORY_PROVIDER, MemoryProviderConfigSchema, DEFAULT_URI_TIMEOUT_MS } from './manifest.js';
export type { MemoryProviderConfig } from './manifest.js';
export { MemoryBankEngine, DEFAULT_MAX_CHUNKS, MAX_CHUNKS_LIMIT } from './engine.js';
export type { Embedder, MemoryEngineOptions } from './engine.js';
export { chunkText, tokenize } from './chunker.js';
export type { TextWindow } from './chunker.js';
export { resolveDocumentText, isTextMimeType } from './content.js';
export { cosineSimilarity } from './vector.js';
