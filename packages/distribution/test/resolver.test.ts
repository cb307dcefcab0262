/**
 * Capstack Distribution — Manifest Resolver Tests
 *
 *   RES-U1:  a valid manifest yields a stack whose client routes across groups
 *   RES-U2:  a required group without bindings is MissingCapability
 *   RES-U3:  unknown group names are UnknownCapability
 *   RES-U4:  an unknown provider_type is UnknownProviderKind
 *   RES-U5:  a repeated provider_id within a group is DuplicateProviderId
 *   RES-U6:  provider config and manifest shape are validated
 *   RES-U7:  an unbound dependency is MissingDependency, before anything is built
 *   RES-U8:  all-or-nothing: a failing initialize shuts down everything built
 *   RES-U9:  the flagged binding is active; others are reachable by id
 *   RES-U10: shutdown runs once, in reverse build order
 *   RES-U11: routed calls reach the injected log sinks
 *   RES-U12: the default catalog covers every shipped provider
 *
 * Isolation: a fake inference provider in a test catalog; no network.
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  CAPABILITY_GROUPS,
  CapabilityGroup,
  InlineAdapter,
  ProviderKind,
  defineProvider,
  inferenceOperations,
} from '@capstack/core';
import type { CallRecord, LogSink, ProviderSpec } from '@capstack/core';
import { MEMORY_PROVIDER } from '@capstack/module-memory';
import { TELEMETRY_PROVIDER } from '@capstack/module-telemetry';
import { ProviderCatalog, defaultCatalog, resolveManifest } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** Embeds text as [mentions alpha, mentions beta]. */
function fakeInference(events: string[]): ProviderSpec {
  return defineProvider({
    capability: CapabilityGroup.Inference,
    provider_type: 'inline::fake',
    description: 'Keyword embeddings for tests',
    config: z.object({ fail_initialize: z.boolean().default(false) }),
    build(config, context) {
      return new InlineAdapter({
        provider_id: context.provider_id,
        provider_type: 'inline::fake',
        capability: CapabilityGroup.Inference,
        operations: inferenceOperations({
          chat_completion: async () => ({
            completion_message: { role: 'assistant', content: context.provider_id, stop_reason: 'end_of_turn' },
          }),
          completion: async () => ({ content: context.provider_id, stop_reason: 'end_of_turn' }),
          embeddings: async (request) => ({
            embeddings: request.contents.map((text) => [
              text.includes('alpha') ? 1 : 0,
              text.includes('beta') ? 1 : 0,
            ]),
          }),
          list_models: async () => ({ models: [{ identifier: context.provider_id, provider_model: 'fake' }] }),
        }),
        initialize: async () => {
          events.push(`init:${context.provider_id}`);
          if (config.fail_initialize) throw new Error('backend unavailable');
        },
        shutdown: async () => {
          events.push(`shutdown:${context.provider_id}`);
        },
      });
    },
  });
}

function testCatalog(events: string[]): ProviderCatalog {
  return new ProviderCatalog([fakeInference(events), MEMORY_PROVIDER, TELEMETRY_PROVIDER]);
}

class ArraySink implements LogSink {
  readonly records: CallRecord[] = [];
  append(record: CallRecord): void {
    this.records.push(record);
  }
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err: unknown) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

const BASE = {
  version: '2',
  apis: ['inference', 'memory'],
  providers: {
    inference: [{ provider_id: 'fake0', provider_type: 'inline::fake' }],
    memory: [{ provider_id: 'meta0', provider_type: 'meta-reference' }],
  },
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('resolveManifest', () => {
  it('RES-U1: memory embeds through the stack inference group', async () => {
    const stack = await resolveManifest(BASE, { catalog: testCatalog([]) });

    await stack.client.memory.register_memory_bank({
      identifier: 'notes',
      embedding_model: 'fake-embed',
      chunk_size_in_tokens: 16,
      overlap_size_in_tokens: 0,
    });
    await stack.client.memory.insert_documents({
      bank_id: 'notes',
      documents: [
        { document_id: 'b', content: 'beta only' },
        { document_id: 'a', content: 'alpha only' },
      ],
    });
    const result = await stack.client.memory.query_documents({ bank_id: 'notes', query: ['alpha'] });

    expect(result.chunks.map((chunk) => chunk.document_id)).toEqual(['a', 'b']);
    expect(result.scores).toEqual([1, 0]);
    await stack.shutdown();
  });

  it('RES-U2: a required group with no binding is MissingCapability', async () => {
    const err = await rejection(
      resolveManifest({ ...BASE, apis: ['inference', 'memory', 'safety'] }, { catalog: testCatalog([]) }),
    );
    expect(err).toMatchObject({ name: 'ConfigError', code: 'MissingCapability', capability: 'safety' });
  });

  it('RES-U3: unknown group names in providers or apis are UnknownCapability', async () => {
    const inProviders = await rejection(
      resolveManifest(
        { ...BASE, providers: { ...BASE.providers, vision: [{ provider_id: 'v', provider_type: 'inline::fake' }] } },
        { catalog: testCatalog([]) },
      ),
    );
    const inApis = await rejection(resolveManifest({ ...BASE, apis: ['vision'] }, { catalog: testCatalog([]) }));

    expect(inProviders).toMatchObject({ name: 'ConfigError', code: 'UnknownCapability' });
    expect(inApis).toMatchObject({ name: 'ConfigError', code: 'UnknownCapability' });
  });

  it('RES-U4: a provider_type outside the catalog is UnknownProviderKind', async () => {
    const events: string[] = [];
    const err = await rejection(
      resolveManifest(
        {
          ...BASE,
          providers: {
            ...BASE.providers,
            memory: [{ provider_id: 'pg', provider_type: 'remote::pgvector' }],
          },
        },
        { catalog: testCatalog(events) },
      ),
    );

    expect(err).toMatchObject({ name: 'ConfigError', code: 'UnknownProviderKind', provider_id: 'pg' });
    expect(events).toEqual([]);
  });

  it('RES-U4: an unknown kind prefix is UnknownProviderKind', async () => {
    const err = await rejection(
      resolveManifest(
        { ...BASE, providers: { ...BASE.providers, inference: [{ provider_id: 'x', provider_type: 'gpu::fake' }] } },
        { catalog: testCatalog([]) },
      ),
    );
    expect(err).toMatchObject({ name: 'ConfigError', code: 'UnknownProviderKind' });
  });

  it('RES-U5: a repeated provider_id in one group is DuplicateProviderId', async () => {
    const err = await rejection(
      resolveManifest(
        {
          ...BASE,
          providers: {
            ...BASE.providers,
            inference: [
              { provider_id: 'fake0', provider_type: 'inline::fake' },
              { provider_id: 'fake0', provider_type: 'inline::fake' },
            ],
          },
        },
        { catalog: testCatalog([]) },
      ),
    );
    expect(err).toMatchObject({ name: 'ConfigError', code: 'DuplicateProviderId', provider_id: 'fake0' });
  });

  it('RES-U5: the same provider_id in different groups is allowed', async () => {
    const stack = await resolveManifest(
      {
        ...BASE,
        providers: {
          inference: [{ provider_id: 'meta0', provider_type: 'inline::fake' }],
          memory: [{ provider_id: 'meta0', provider_type: 'meta-reference' }],
        },
      },
      { catalog: testCatalog([]) },
    );
    expect(stack.providers().map((p) => `${p.capability}/${p.provider_id}`)).toEqual([
      'inference/meta0',
      'memory/meta0',
    ]);
    await stack.shutdown();
  });

  it('RES-U6: provider config failing its schema is InvalidProviderConfig', async () => {
    const events: string[] = [];
    const err = await rejection(
      resolveManifest(
        {
          ...BASE,
          providers: {
            ...BASE.providers,
            memory: [{ provider_id: 'meta0', provider_type: 'meta-reference', config: { uri_timeout_ms: 'soon' } }],
          },
        },
        { catalog: testCatalog(events) },
      ),
    );

    expect(err).toMatchObject({ name: 'ConfigError', code: 'InvalidProviderConfig', provider_id: 'meta0' });
    // The inference adapter was built but never initialized; it is still shut down.
    expect(events).toEqual(['shutdown:fake0']);
  });

  it('RES-U6: a malformed manifest is InvalidManifest', async () => {
    const err = await rejection(resolveManifest({ version: '2', apis: 'inference' }, { catalog: testCatalog([]) }));
    expect(err).toMatchObject({ name: 'ConfigError', code: 'InvalidManifest' });
  });

  it('RES-U7: memory without inference is MissingDependency', async () => {
    const err = await rejection(
      resolveManifest(
        {
          version: '2',
          apis: ['memory'],
          providers: { memory: [{ provider_id: 'meta0', provider_type: 'meta-reference' }] },
        },
        { catalog: testCatalog([]) },
      ),
    );
    expect(err).toMatchObject({
      name: 'ConfigError',
      code: 'MissingDependency',
      capability: 'memory',
      provider_id: 'meta0',
    });
  });

  it('RES-U8: a failing initialize shuts down every built adapter and returns no stack', async () => {
    const events: string[] = [];
    const warnings: string[] = [];
    const err = await rejection(
      resolveManifest(
        {
          ...BASE,
          providers: {
            ...BASE.providers,
            inference: [
              { provider_id: 'first', provider_type: 'inline::fake' },
              { provider_id: 'second', provider_type: 'inline::fake', config: { fail_initialize: true } },
            ],
          },
        },
        { catalog: testCatalog(events), warn: (message) => warnings.push(message) },
      ),
    );

    expect(err).toMatchObject({
      name: 'AdapterError',
      code: 'Internal',
      capability: 'inference',
      provider_id: 'second',
    });
    expect(events).toEqual(['init:first', 'init:second', 'shutdown:second', 'shutdown:first']);
    expect(warnings).toEqual([]);
  });

  it('RES-U9: the flagged binding is active and others stay reachable by id', async () => {
    const stack = await resolveManifest(
      {
        ...BASE,
        providers: {
          ...BASE.providers,
          inference: [
            { provider_id: 'small', provider_type: 'inline::fake' },
            { provider_id: 'large', provider_type: 'inline::fake', active: true },
          ],
        },
      },
      { catalog: testCatalog([]) },
    );

    const active = await stack.client.inference.list_models();
    const named = await stack.client.withOptions({ provider_id: 'small' }).inference.list_models();

    expect(active.models[0]?.identifier).toBe('large');
    expect(named.models[0]?.identifier).toBe('small');
    expect(stack.providers().filter((p) => p.capability === 'inference')).toEqual([
      { capability: 'inference', provider_id: 'small', provider_type: 'inline::fake', kind: 'inline', active: false },
      { capability: 'inference', provider_id: 'large', provider_type: 'inline::fake', kind: 'inline', active: true },
    ]);
    await stack.shutdown();
  });

  it('RES-U9: two bindings flagged active is MultipleActiveProviders', async () => {
    const events: string[] = [];
    const err = await rejection(
      resolveManifest(
        {
          ...BASE,
          providers: {
            ...BASE.providers,
            inference: [
              { provider_id: 'small', provider_type: 'inline::fake', active: true },
              { provider_id: 'large', provider_type: 'inline::fake', active: true },
            ],
          },
        },
        { catalog: testCatalog(events) },
      ),
    );

    expect(err).toMatchObject({ name: 'ConfigError', code: 'MultipleActiveProviders' });
    expect(events).toEqual(['shutdown:large', 'shutdown:small']);
  });

  it('RES-U10: shutdown runs each adapter once, last built first', async () => {
    const events: string[] = [];
    const stack = await resolveManifest(
      {
        ...BASE,
        providers: {
          ...BASE.providers,
          inference: [
            { provider_id: 'one', provider_type: 'inline::fake' },
            { provider_id: 'two', provider_type: 'inline::fake' },
          ],
        },
      },
      { catalog: testCatalog(events) },
    );
    events.length = 0;

    await Promise.all([stack.shutdown(), stack.shutdown()]);

    expect(events).toEqual(['shutdown:two', 'shutdown:one']);
  });

  it('RES-U11: one call record per routed call, including nested ones', async () => {
    const sink = new ArraySink();
    const stack = await resolveManifest(BASE, { catalog: testCatalog([]), logSinks: [sink] });

    await stack.dispatch('memory', 'register_memory_bank', {
      identifier: 'notes',
      embedding_model: 'fake-embed',
      chunk_size_in_tokens: 8,
      overlap_size_in_tokens: 0,
    });
    await stack.dispatch('memory', 'insert_documents', {
      bank_id: 'notes',
      documents: [{ document_id: 'a', content: 'alpha' }],
    });

    expect(sink.records.map((r) => `${r.capability}.${r.operation}:${r.outcome}`)).toEqual([
      'memory.register_memory_bank:ok',
      'inference.embeddings:ok',
      'memory.insert_documents:ok',
    ]);
    await stack.shutdown();
  });
});

describe('defaultCatalog', () => {
  it('RES-U12: lists every shipped provider and normalizes bare types', () => {
    const catalog = defaultCatalog();

    expect(catalog.lookup(CapabilityGroup.Inference, 'remote::ollama')?.kind).toBe(ProviderKind.Remote);
    expect(catalog.lookup(CapabilityGroup.Memory, 'meta-reference')?.provider_type).toBe('inline::meta-reference');
    expect(catalog.lookup(CapabilityGroup.Safety, 'inline::meta-reference')).toBeDefined();
    expect(catalog.lookup(CapabilityGroup.Shields, 'meta-reference')).toBeDefined();
    expect(catalog.lookup(CapabilityGroup.Agents, 'meta-reference')).toBeDefined();
    expect(catalog.lookup(CapabilityGroup.Telemetry, 'meta-reference')).toBeDefined();
    for (const capability of CAPABILITY_GROUPS) {
      expect(catalog.lookup(capability, 'remote::stack')?.kind).toBe(ProviderKind.Remote);
    }
    expect(catalog.lookup(CapabilityGroup.Inference, 'meta-reference')).toBeUndefined();
    expect(catalog.lookup(CapabilityGroup.Memory, '')).toBeUndefined();
  });
});
