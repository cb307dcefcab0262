/**
 * Capstack Safety Module — Shield Registry Tests
 *
 *   SHR-U1: register stores the shield with empty params by default
 *   SHR-U2: a repeated identifier is ConfigError(DuplicateShield), also when concurrent
 *   SHR-U3: a type the safety capability does not serve is UnknownShield and nothing is stored
 *   SHR-U4: get returns null for a missing shield; list returns all
 *   SHR-U5: put_shield replaces an existing registration
 */

import { describe, it, expect, vi } from 'vitest';
import { MemoryKVStore } from '@capstack/runtime-host';
import { ShieldRegistry } from '../src/shield-registry.js';
import type { ShieldTypeLookup } from '../src/shield-registry.js';

const opts = { signal: new AbortController().signal };

function makeRegistry(): ShieldRegistry {
  const lookup = vi.fn<ShieldTypeLookup>(async () => ['llama_guard', 'pattern']);
  return new ShieldRegistry(new MemoryKVStore(), lookup);
}

describe('ShieldRegistry', () => {
  it('SHR-U1: register stores the shield', async () => {
    const registry = makeRegistry();

    await expect(registry.register_shield({ identifier: 'guard', shield_type: 'llama_guard' }, opts)).resolves.toEqual({
      shield: { identifier: 'guard', shield_type: 'llama_guard', params: {} },
    });
    await expect(registry.get_shield({ identifier: 'guard' })).resolves.toEqual({
      shield: { identifier: 'guard', shield_type: 'llama_guard', params: {} },
    });
  });

  it('SHR-U2: a repeated identifier is DuplicateShield', async () => {
    const registry = makeRegistry();
    await registry.register_shield({ identifier: 'guard', shield_type: 'llama_guard' }, opts);

    await expect(
      registry.register_shield({ identifier: 'guard', shield_type: 'pattern' }, opts),
    ).rejects.toMatchObject({ name: 'ConfigError', code: 'DuplicateShield' });
  });

  it('SHR-U2: only one of two concurrent registrations succeeds', async () => {
    const registry = makeRegistry();

    const results = await Promise.allSettled([
      registry.register_shield({ identifier: 'same', shield_type: 'pattern' }, opts),
      registry.register_shield({ identifier: 'same', shield_type: 'llama_guard' }, opts),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    await expect(registry.get_shield({ identifier: 'same' })).resolves.toEqual({
      shield: { identifier: 'same', shield_type: 'pattern', params: {} },
    });
  });

  it('SHR-U3: an unserved type is UnknownShield and nothing is stored', async () => {
    const registry = makeRegistry();

    await expect(
      registry.register_shield({ identifier: 'x', shield_type: 'prompt_guard' }, opts),
    ).rejects.toMatchObject({ name: 'RoutingError', code: 'UnknownShield' });
    await expect(registry.get_shield({ identifier: 'x' })).resolves.toEqual({ shield: null });
  });

  it('SHR-U4: list returns every registered shield', async () => {
    const registry = makeRegistry();
    await registry.register_shield({ identifier: 'a', shield_type: 'pattern' }, opts);
    await registry.register_shield({ identifier: 'b', shield_type: 'llama_guard', params: { excluded_categories: ['S6'] } }, opts);

    const { shields } = await registry.list_shields();

    expect(shields).toEqual([
      { identifier: 'a', shield_type: 'pattern', params: {} },
      { identifier: 'b', shield_type: 'llama_guard', params: { excluded_categories: ['S6'] } },
    ]);
  });

  it('SHR-U5: put_shield replaces an existing registration', async () => {
    const registry = makeRegistry();
    await registry.register_shield({ identifier: 'a', shield_type: 'pattern' }, opts);

    await registry.put_shield({ identifier: 'a', shield_type: 'llama_guard' }, opts);

    await expect(registry.get_shield({ identifier: 'a' })).resolves.toEqual({
      shield: { identifier: 'a', shield_type: 'llama_guard', params: {} },
    });
  });
});
