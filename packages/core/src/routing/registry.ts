/**
 * Capstack Core — Provider Registry
 *
 * Maps (capability group, provider id) to a built adapter. The registry is
 * populated once, when the stack is assembled, and is read-only afterwards;
 * lookups need no locking.
 *
 * Each group has exactly one active binding: the one flagged active, else
 * the first registered. Other bindings stay reachable by explicit id.
 */

import type { CapabilityGroup, ProviderKind } from '../types/capability.js';
import type { ProviderAdapter } from '../adapters/index.js';
import { ConfigError, RoutingError } from '../errors.js';

export interface RegistryEntry {
  readonly adapter: ProviderAdapter;
  /** Flagged active in the manifest. */
  readonly active?: boolean;
}

/** Public description of a binding, as listed by `GET /providers`. */
export interface ProviderListing {
  readonly capability: CapabilityGroup;
  readonly provider_id: string;
  readonly provider_type: string;
  readonly kind: ProviderKind;
  readonly active: boolean;
}

interface GroupBindings {
  readonly active: ProviderAdapter;
  readonly byId: ReadonlyMap<string, ProviderAdapter>;
}

export class ProviderRegistry {
  private readonly groups: ReadonlyMap<CapabilityGroup, GroupBindings>;
  private readonly ordered: ReadonlyArray<ProviderAdapter>;

  /**
   * @throws {ConfigError} DuplicateProviderId when an id repeats within a group
   * @throws {ConfigError} MultipleActiveProviders when a group flags more than one binding
   */
  constructor(entries: ReadonlyArray<RegistryEntry>) {
    const byGroup = new Map<CapabilityGroup, RegistryEntry[]>();
    for (const entry of entries) {
      const list = byGroup.get(entry.adapter.capability) ?? [];
      list.push(entry);
      byGroup.set(entry.adapter.capability, list);
    }

    const groups = new Map<CapabilityGroup, GroupBindings>();
    for (const [capability, list] of byGroup) {
      const byId = new Map<string, ProviderAdapter>();
      for (const { adapter } of list) {
        if (byId.has(adapter.provider_id)) {
          throw new ConfigError(
            'DuplicateProviderId',
            `Duplicate provider_id '${adapter.provider_id}' in capability '${capability}'`,
            { capability, provider_id: adapter.provider_id },
          );
        }
        byId.set(adapter.provider_id, adapter);
      }

      const flagged = list.filter((entry) => entry.active === true);
      if (flagged.length > 1) {
        throw new ConfigError(
          'MultipleActiveProviders',
          `Capability '${capability}' flags ${flagged.length} providers as active: ${flagged
            .map((entry) => entry.adapter.provider_id)
            .join(', ')}`,
          { capability },
        );
      }
      const active = flagged[0] ?? list[0];
      if (active !== undefined) {
        groups.set(capability, { active: active.adapter, byId });
      }
    }

    this.groups = groups;
    this.ordered = entries.map((entry) => entry.adapter);
  }

  /**
   * Resolve the adapter serving a group: the named binding if `providerId`
   * is given, else the active one.
   *
   * @throws {RoutingError} NoActiveProvider when the group has no binding
   * @throws {RoutingError} UnknownProvider when the named binding does not exist
   */
  resolve(capability: CapabilityGroup, providerId?: string): ProviderAdapter {
    const bindings = this.groups.get(capability);
    if (bindings === undefined) {
      throw new RoutingError('NoActiveProvider', `No provider is bound to capability '${capability}'`, {
        capability,
      });
    }
    if (providerId === undefined) return bindings.active;

    const adapter = bindings.byId.get(providerId);
    if (adapter === undefined) {
      throw new RoutingError(
        'UnknownProvider',
        `Capability '${capability}' has no provider '${providerId}'`,
        { capability, provider_id: providerId },
      );
    }
    return adapter;
  }

  has(capability: CapabilityGroup): boolean {
    return this.groups.has(capability);
  }

  list(): ReadonlyArray<ProviderListing> {
    return this.ordered.map((adapter) => ({
      capability: adapter.capability,
      provider_id: adapter.provider_id,
      provider_type: adapter.provider_type,
      kind: adapter.kind,
      active: this.groups.get(adapter.capability)?.active === adapter,
    }));
  }

  /** All adapters in registration order. */
  adapters(): ReadonlyArray<ProviderAdapter> {
    return this.ordered;
  }
}
