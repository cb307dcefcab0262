/**
 * Capstack Memory Module — Document Content
 *
 * Turns a document's content (inline text, base64 bytes, or a URI) into the
 * text that gets chunked. Only text-like media types are accepted.
 */

import { ChunkingError } from '@capstack/core';
import type { MemoryDocument } from '@capstack/core';
import { sendHttp } from '@capstack/runtime-host';

export interface ContentOptions {
  readonly uri_timeout_ms: number;
  readonly signal?: AbortSignal | undefined;
  readonly fetch?: typeof fetch | undefined;
}

/** `text/*`, `application/json`, or unspecified. */
export function isTextMimeType(mimeType: string | undefined): boolean {
  if (mimeType === undefined) return true;
  const type = mimeType.split(';')[0]?.trim().toLowerCase() ?? '';
  return type === '' || type.startsWith('text/') || type === 'application/json';
}

/**
 * Resolve a document to text.
 *
 * @throws {ChunkingError} UnsupportedContent for a non-text media type
 * @throws {AdapterError} when a URI cannot be fetched
 */
export async function resolveDocumentText(doc: MemoryDocument, options: ContentOptions): Promise<string> {
  const content = doc.content;
  if (typeof content === 'string') {
    assertText(doc.document_id, doc.mime_type);
    return content;
  }

  if ('data' in content) {
    assertText(doc.document_id, doc.mime_type);
    return Buffer.from(content.data, 'base64').toString('utf-8');
  }

  const response = await sendHttp(content.uri, {
    method: 'GET',
    timeout_ms: options.uri_timeout_ms,
    signal: options.signal,
    fetch: options.fetch,
  });
  assertText(doc.document_id, doc.mime_type ?? response.content_type);
  return response.text;
}

function assertText(documentId: string, mimeType: string | undefined): void {
  if (!isTextMimeType(mimeType)) {
    throw new ChunkingError(
      'UnsupportedContent',
      `Document '${documentId}' has unsupported media type '${mimeType ?? ''}'`,
    );
  }
}
