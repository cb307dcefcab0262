/**
 * Capstack Distribution — Provider Catalog
 *
 * The closed set of providers a manifest may bind, keyed by
 * (capability group, normalized provider_type). A binding whose type is not
 * in the catalog fails resolution; nothing is loaded dynamically.
 */

import { normalizeProviderType } from '@capstack/core';
import type { CapabilityGroup, ProviderSpec } from '@capstack/core';
import { remoteStackProviders } from '@capstack/runtime-host';
import { AGENTS_PROVIDER } from '@capstack/module-agents';
import { MEMORY_PROVIDER } from '@capstack/module-memory';
import { SAFETY_PROVIDER, SHIELDS_PROVIDER } from '@capstack/module-safety';
import { TELEMETRY_PROVIDER } from '@capstack/module-telemetry';
import { OLLAMA_PROVIDER } from '@capstack/provider-ollama';

export class ProviderCatalog {
  private readonly specs = new Map<string, ProviderSpec>();

  constructor(specs: ReadonlyArray<ProviderSpec>) {
    for (const spec of specs) {
      const key = catalogKey(spec.capability, spec.provider_type);
      if (this.specs.has(key)) {
        throw new Error(`Provider catalog already has an entry for ${key}`);
      }
      this.specs.set(key, spec);
    }
  }

  /**
   * Find the spec for a manifest binding. Bare types are read as `inline::`.
   * Returns undefined for malformed or unknown types.
   */
  lookup(capability: CapabilityGroup, providerType: string): ProviderSpec | undefined {
    const normalized = normalizeProviderType(providerType);
    if (normalized === undefined) return undefined;
    return this.specs.get(catalogKey(capability, normalized.provider_type));
  }

  list(): ReadonlyArray<ProviderSpec> {
    return [...this.specs.values()];
  }
}

function catalogKey(capability: CapabilityGroup, providerType: string): string {
  return `${capability}/${providerType}`;
}

/** Every provider shipped with Capstack. */
export function defaultCatalog(): ProviderCatalog {
  return new ProviderCatalog([
    OLLAMA_PROVIDER,
    SAFETY_PROVIDER,
    MEMORY_PROVIDER,
    AGENTS_PROVIDER,
    TELEMETRY_PROVIDER,
    SHIELDS_PROVIDER,
    ...remoteStackProviders(),
  ]);
}
