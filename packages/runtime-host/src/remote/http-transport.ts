/**
 * Capstack Runtime Host — HTTP Transport
 *
 * HTTP with a per-request deadline, shared by everything that talks to a
 * network service: the remote stack passthrough, Ollama, and memory
 * documents given by URI.
 *
 * Failure mapping:
 *   deadline exceeded          → AdapterError(Timeout)
 *   connection / DNS failure   → AdapterError(Transport)
 *   non-2xx status             → AdapterError(Upstream, status, body)
 *   2xx with a non-JSON body   → AdapterError(InvalidResponse)  (JSON calls only)
 *
 * One request per call. Nothing here retries.
 */

import { z } from 'zod';
import { AdapterError, isStackError } from '@capstack/core';
import type { UpstreamError } from '@capstack/core';

// ---------------------------------------------------------------------------
// Single request
// ---------------------------------------------------------------------------

export interface HttpRequestOptions {
  readonly method: 'GET' | 'POST';
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly body?: string | undefined;
  readonly timeout_ms: number;
  /** Caller-side cancellation. A StackError abort reason is rethrown as is. */
  readonly signal?: AbortSignal | undefined;
  readonly fetch?: typeof fetch | undefined;
  /** Parse `{ error: { type, code, message } }` bodies of failed responses. */
  readonly structured_errors?: boolean | undefined;
}

export interface HttpResponse {
  readonly status: number;
  /** Media type without parameters, lower-cased; undefined if absent. */
  readonly content_type: string | undefined;
  readonly text: string;
}

const StructuredErrorBody = z.object({
  error: z.object({
    type: z.string(),
    code: z.string(),
    message: z.string(),
  }),
});

/**
 * Send one request and read the whole body before the deadline.
 * Non-2xx responses are thrown as AdapterError(Upstream).
 */
export async function sendHttp(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
  const fetchImpl = options.fetch ?? fetch;
  const label = `${options.method} ${url}`;
  const controller = new AbortController();
  const callerSignal = options.signal;
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, options.timeout_ms);
  const forwardAbort = (): void => controller.abort(callerSignal?.reason);
  if (callerSignal?.aborted === true) {
    controller.abort(callerSignal.reason);
  } else {
    callerSignal?.addEventListener('abort', forwardAbort, { once: true });
  }

  try {
    const response = await fetchImpl(url, {
      method: options.method,
      headers: { ...options.headers },
      body: options.body,
      signal: controller.signal,
    });
    const text = await response.text();

    if (!response.ok) {
      throw new AdapterError('Upstream', `${label} returned HTTP ${response.status}`, {
        status: response.status,
        body: text,
        upstream: options.structured_errors === true ? parseStructuredError(text) : undefined,
      });
    }
    return { status: response.status, content_type: mediaType(response.headers.get('content-type')), text };
  } catch (err: unknown) {
    if (isStackError(err)) throw err;
    if (timedOut) {
      throw new AdapterError('Timeout', `${label} exceeded ${options.timeout_ms} ms`, { cause: err });
    }
    if (controller.signal.aborted) {
      const reason: unknown = controller.signal.reason;
      if (isStackError(reason)) throw reason;
      throw new AdapterError('Transport', `${label} was aborted`, { cause: err });
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new AdapterError('Transport', `${label} failed: ${message}`, { cause: err });
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener('abort', forwardAbort);
  }
}

// ---------------------------------------------------------------------------
// JSON transport
// ---------------------------------------------------------------------------

export interface HttpTransportOptions {
  /** Base URL; request paths are appended to it. */
  readonly base_url: string;
  readonly timeout_ms: number;
  readonly headers?: Readonly<Record<string, string>> | undefined;
  readonly structured_errors?: boolean | undefined;
  /** Injected for tests; defaults to the global fetch. */
  readonly fetch?: typeof fetch | undefined;
}

/** JSON requests against one base URL. */
export class HttpTransport {
  private readonly baseUrl: string;

  constructor(private readonly options: HttpTransportOptions) {
    this.baseUrl = options.base_url.replace(/\/+$/, '');
  }

  postJson(path: string, body: unknown, signal?: AbortSignal): Promise<unknown> {
    return this.request('POST', path, JSON.stringify(body), signal);
  }

  getJson(path: string, signal?: AbortSignal): Promise<unknown> {
    return this.request('GET', path, undefined, signal);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    body: string | undefined,
    signal: AbortSignal | undefined,
  ): Promise<unknown> {
    const url = `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    const response = await sendHttp(url, {
      method,
      headers: {
        accept: 'application/json',
        ...(body !== undefined ? { 'content-type': 'application/json' } : {}),
        ...this.options.headers,
      },
      body,
      timeout_ms: this.options.timeout_ms,
      signal,
      fetch: this.options.fetch,
      structured_errors: this.options.structured_errors,
    });

    try {
      return JSON.parse(response.text);
    } catch (err: unknown) {
      throw new AdapterError('InvalidResponse', `${method} ${url} returned a body that is not JSON`, {
        body: response.text,
        cause: err,
      });
    }
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function parseStructuredError(text: string): UpstreamError | undefined {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = StructuredErrorBody.safeParse(json);
  return parsed.success ? parsed.data.error : undefined;
}

function mediaType(header: string | null): string | undefined {
  if (header === null) return undefined;
  const type = header.split(';')[0]?.trim().toLowerCase();
  return type === undefined || type === '' ? undefined : type;
}
