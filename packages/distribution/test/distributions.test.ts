/**
 * Capstack Distribution — Shipped Manifests
 *
 *   DIST-U1: distributions/ollama/run.yaml assembles offline with its defaults
 *   DIST-U2: distributions/remote/run.yaml needs CAPSTACK_UPSTREAM
 *
 * Neither manifest touches the network while resolving: the Ollama binding
 * only pings its server when check_connection is set, and remote::stack
 * connects per call.
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { loadManifest, resolveManifest } from '../src/index.js';

function distribution(name: string): string {
  return fileURLToPath(new URL(`../../../distributions/${name}/run.yaml`, import.meta.url));
}

describe('distributions/ollama', () => {
  it('DIST-U1: binds every group and registers the configured shields and banks', async () => {
    const manifest = loadManifest(distribution('ollama'), { env: {} });
    const stack = await resolveManifest(manifest);

    try {
      expect(stack.providers().map((p) => `${p.capability}/${p.provider_id}/${p.provider_type}`)).toEqual([
        'inference/ollama/remote::ollama',
        'safety/meta0/inline::meta-reference',
        'shields/meta0/inline::meta-reference',
        'memory/meta0/inline::meta-reference',
        'agents/meta0/inline::meta-reference',
        'telemetry/meta0/inline::meta-reference',
      ]);
      expect(manifest.server).toEqual({ port: 5000 });

      const shields = await stack.client.shields.list_shields();
      expect(shields.shields.map((s) => `${s.identifier}:${s.shield_type}`)).toEqual([
        'llama_guard:llama_guard',
        'pii:pattern',
      ]);

      const banks = await stack.client.memory.list_memory_banks();
      expect(banks.banks).toMatchObject([{ identifier: 'notes', embedding_model: 'all-minilm' }]);
    } finally {
      await stack.shutdown();
    }
  });

  it('DIST-U1: takes the Ollama url from the environment', () => {
    const manifest = loadManifest(distribution('ollama'), { env: { OLLAMA_URL: 'http://gpu-box:11434' } });

    expect(manifest.providers['inference']?.[0]?.config).toEqual({ url: 'http://gpu-box:11434' });
  });
});

describe('distributions/remote', () => {
  it('DIST-U2: refuses to load without an upstream url', () => {
    expect(() => loadManifest(distribution('remote'), { env: {} })).toThrow(
      'Manifest references unset environment variable(s): CAPSTACK_UPSTREAM',
    );
  });

  it('DIST-U2: forwards inference and memory to the upstream stack', async () => {
    const manifest = loadManifest(distribution('remote'), { env: { CAPSTACK_UPSTREAM: 'http://stack.test:5000' } });
    const stack = await resolveManifest(manifest);

    try {
      expect(stack.providers()).toEqual([
        { capability: 'inference', provider_id: 'upstream', provider_type: 'remote::stack', kind: 'remote', active: true },
        { capability: 'memory', provider_id: 'upstream', provider_type: 'remote::stack', kind: 'remote', active: true },
      ]);
    } finally {
      await stack.shutdown();
    }
  });
});
