/**
 * Capstack Agents Module — Retrieved Context
 */

import type { Chunk } from '@capstack/core';

export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
}

/**
 * Best `limit` chunks across banks. Sort is stable, so equal scores keep
 * bank order then in-bank order.
 */
export function selectChunks(hits: ReadonlyArray<ScoredChunk>, limit: number): ScoredChunk[] {
  return [...hits].sort((a, b) => b.score - a.score).slice(0, limit);
}

/** The system message that carries retrieved chunks; '' when there are none. */
export function formatRetrievedContext(hits: ReadonlyArray<ScoredChunk>): string {
  if (hits.length === 0) return '';
  const body = hits.map(({ chunk }) => `id:${chunk.document_id}; content:${chunk.content}`).join('\n');
  return [
    'Here are the retrieved documents for relevant context:',
    '=== START-RETRIEVED-CONTEXT ===',
    body,
    '=== END-RETRIEVED-CONTEXT ===',
  ].join('\n');
}
