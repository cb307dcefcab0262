/**
 * Capstack Ollama Provider Tests
 *
 *   OLL-U1: chat_completion posts mapped tag, messages and Ollama options to /api/chat
 *   OLL-U2: done_reason maps to stop_reason
 *   OLL-U3: an unmapped chat model is RoutingError(UnsupportedModel) without a request
 *   OLL-U4: completion posts the prompt to /api/generate
 *   OLL-U5: embeddings post to /api/embed; unmapped models pass through
 *   OLL-U6: list_models maps running tags back to model names and skips unknown ones
 *   OLL-U7: a malformed Ollama body is AdapterError(InvalidResponse)
 *   OLL-U8: building performs no I/O; check_connection pings on initialize
 */

import { describe, it, expect, vi } from 'vitest';
import { ProviderKind } from '@capstack/core';
import { OllamaConfigSchema, createOllamaAdapter } from '../src/manifest.js';
import { stopReason } from '../src/ollama-inference.js';

const opts = { signal: new AbortController().signal };

function jsonFetch(body: unknown) {
  return vi.fn<typeof fetch>(
    async () => new Response(JSON.stringify(body), { headers: { 'content-type': 'application/json' } }),
  );
}

function requestBody(fetchMock: ReturnType<typeof jsonFetch>, index = 0): unknown {
  const init = fetchMock.mock.calls[index]?.[1];
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

function adapterWith(fetchMock: typeof fetch, config: Record<string, unknown> = {}) {
  return createOllamaAdapter('ollama', OllamaConfigSchema.parse({ url: 'http://ollama.test:11434/', ...config }), {
    fetch: fetchMock,
  });
}

describe('Ollama inference', () => {
  it('OLL-U1: chat_completion posts to /api/chat with mapped tag and options', async () => {
    const fetchMock = jsonFetch({ message: { role: 'assistant', content: 'Hi!' }, done: true, done_reason: 'stop' });
    const adapter = adapterWith(fetchMock);

    const result = await adapter.invoke(
      'chat_completion',
      {
        model: 'Llama3.2-3B-Instruct',
        messages: [{ role: 'user', content: 'Hello' }],
        sampling_params: { temperature: 0.2, max_tokens: 64, repetition_penalty: 1.1 },
      },
      opts,
    );

    expect(result).toEqual({
      completion_message: { role: 'assistant', content: 'Hi!', stop_reason: 'end_of_turn' },
    });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/chat');
    expect(requestBody(fetchMock)).toEqual({
      model: 'llama3.2:3b-instruct-fp16',
      messages: [{ role: 'user', content: 'Hello' }],
      options: { temperature: 0.2, repeat_penalty: 1.1, num_predict: 64 },
      stream: false,
    });
  });

  it('OLL-U2: done_reason maps to stop_reason', () => {
    expect(stopReason('stop')).toBe('end_of_turn');
    expect(stopReason(undefined)).toBe('end_of_turn');
    expect(stopReason('length')).toBe('out_of_tokens');
    expect(stopReason('unload')).toBe('end_of_message');
  });

  it('OLL-U3: an unmapped chat model is UnsupportedModel', async () => {
    const fetchMock = jsonFetch({});
    const adapter = adapterWith(fetchMock);

    await expect(
      adapter.invoke('chat_completion', { model: 'gpt-unknown', messages: [{ role: 'user', content: 'x' }] }, opts),
    ).rejects.toMatchObject({ name: 'RoutingError', code: 'UnsupportedModel' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('OLL-U3: config models extend the table', async () => {
    const fetchMock = jsonFetch({ response: 'ok', done: true, done_reason: 'length' });
    const adapter = adapterWith(fetchMock, { models: { 'My-Model': 'mistral:7b' } });

    const result = await adapter.invoke('completion', { model: 'My-Model', content: 'x' }, opts);

    expect(result).toEqual({ content: 'ok', stop_reason: 'out_of_tokens' });
    expect(requestBody(fetchMock)).toMatchObject({ model: 'mistral:7b' });
  });

  it('OLL-U4: completion posts the prompt to /api/generate', async () => {
    const fetchMock = jsonFetch({ response: 'four', done: true, done_reason: 'stop' });
    const adapter = adapterWith(fetchMock);

    const result = await adapter.invoke('completion', { model: 'Llama3.1-8B-Instruct', content: '2+2=' }, opts);

    expect(result).toEqual({ content: 'four', stop_reason: 'end_of_turn' });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/generate');
    expect(requestBody(fetchMock)).toEqual({
      model: 'llama3.1:8b-instruct-fp16',
      prompt: '2+2=',
      options: {},
      stream: false,
    });
  });

  it('OLL-U5: embeddings post to /api/embed and pass unmapped models through', async () => {
    const fetchMock = jsonFetch({ embeddings: [[0.1, 0.2], [0.3, 0.4]] });
    const adapter = adapterWith(fetchMock);

    const result = await adapter.invoke('embeddings', { model: 'all-minilm', contents: ['a', 'b'] }, opts);

    expect(result).toEqual({ embeddings: [[0.1, 0.2], [0.3, 0.4]] });
    expect(requestBody(fetchMock)).toEqual({ model: 'all-minilm', input: ['a', 'b'] });
  });

  it('OLL-U5: a wrong embedding count is InvalidResponse', async () => {
    const adapter = adapterWith(jsonFetch({ embeddings: [[0.1]] }));

    await expect(
      adapter.invoke('embeddings', { model: 'all-minilm', contents: ['a', 'b'] }, opts),
    ).rejects.toMatchObject({ code: 'InvalidResponse' });
  });

  it('OLL-U6: list_models maps running tags and skips unknown ones', async () => {
    const fetchMock = jsonFetch({ models: [{ model: 'llama-guard3:1b' }, { model: 'someone-else:latest' }] });
    const adapter = adapterWith(fetchMock);

    const result = await adapter.invoke('list_models', {}, opts);

    expect(result).toEqual({ models: [{ identifier: 'Llama-Guard-3-1B', provider_model: 'llama-guard3:1b' }] });
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://ollama.test:11434/api/ps');
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET');
  });

  it('OLL-U7: a malformed body is InvalidResponse', async () => {
    const adapter = adapterWith(jsonFetch({ unexpected: true }));

    await expect(
      adapter.invoke('chat_completion', { model: 'Llama3.2-1B-Instruct', messages: [{ role: 'user', content: 'x' }] }, opts),
    ).rejects.toMatchObject({ name: 'AdapterError', code: 'InvalidResponse' });
  });

  it('OLL-U8: building does no I/O; check_connection pings on initialize', async () => {
    const quiet = jsonFetch({ models: [] });
    const checking = jsonFetch({ models: [] });

    const plain = adapterWith(quiet);
    await plain.initialize();
    const pinged = adapterWith(checking, { check_connection: true });
    await pinged.initialize();

    expect(plain.kind).toBe(ProviderKind.Remote);
    expect(plain.provider_type).toBe('remote::ollama');
    expect(quiet).not.toHaveBeenCalled();
    expect(checking).toHaveBeenCalledTimes(1);
  });
});
