/**
 * Capstack Distribution — Manifest Resolver
 *
 * Turns a manifest into a running Stack: a read-only provider registry, the
 * router in front of it and a typed client bound to that router.
 *
 * Resolution contract:
 * - The manifest is validated before anything is built
 * - Every group in `apis` has at least one binding; every group key and
 *   every provider_type is known; ids are unique within a group
 * - A provider's declared dependencies are bound in the same manifest
 * - Adapters are built eagerly, then initialized group by group in
 *   capability-group order (inference first)
 * - All-or-nothing: on any failure, every adapter built so far is shut down
 *   and no Stack is returned
 *
 * Providers receive a client whose dispatch goes through the stack's own
 * router. The router exists only once every adapter is built, so the client
 * must not be used from inside `build()`; `initialize()` may use it.
 */

import {
  CAPABILITY_GROUPS,
  ConfigError,
  ProviderRegistry,
  Router,
  RoutingError,
  StackClient,
  isCapabilityGroup,
  toStackError,
} from '@capstack/core';
import type {
  CapabilityGroup,
  Dispatch,
  DispatchOptions,
  LogSink,
  ProviderAdapter,
  ProviderListing,
  ProviderSpec,
  RegistryEntry,
} from '@capstack/core';
import type { Manifest, ProviderBinding } from './manifest-schema.js';
import { parseManifest } from './manifest-schema.js';
import type { ProviderCatalog } from './catalog.js';
import { defaultCatalog } from './catalog.js';

export interface ResolveOptions {
  /** State root handed to providers that persist data. */
  readonly home?: string | undefined;
  /** Sinks receiving one record per routed call. */
  readonly logSinks?: ReadonlyArray<LogSink> | undefined;
  readonly catalog?: ProviderCatalog | undefined;
  /** Reports adapters that fail to shut down while a failed resolution unwinds. */
  readonly warn?: ((message: string) => void) | undefined;
}

export interface Stack {
  readonly manifest: Manifest;
  readonly registry: ProviderRegistry;
  readonly router: Router;
  readonly client: StackClient;
  dispatch(capability: string, operation: string, payload: unknown, options?: DispatchOptions): Promise<unknown>;
  providers(): ReadonlyArray<ProviderListing>;
  /** Shut down every adapter, last built first. Safe to call more than once. */
  shutdown(): Promise<void>;
}

interface PlannedBinding {
  readonly capability: CapabilityGroup;
  readonly binding: ProviderBinding;
  readonly spec: ProviderSpec;
}

/**
 * Validate a manifest and assemble the stack it describes.
 *
 * @throws {ConfigError} for any manifest, catalog or provider config problem
 * @throws {StackError} from a provider's initialize(), annotated with its binding
 */
export async function resolveManifest(manifest: unknown, options: ResolveOptions = {}): Promise<Stack> {
  const validated = parseManifest(manifest);
  const catalog = options.catalog ?? defaultCatalog();
  const plan = planBindings(validated, catalog);
  const groups = new Set(plan.map((entry) => entry.capability));
  checkDependencies(plan, groups);

  let router: Router | undefined;
  const dispatch: Dispatch = (capability, operation, payload, dispatchOptions) => {
    if (router === undefined) {
      return Promise.reject(
        new RoutingError('NoActiveProvider', `Stack is still being assembled; cannot call ${capability}.${operation}`),
      );
    }
    return router.dispatch(capability, operation, payload, dispatchOptions);
  };
  const client = new StackClient(dispatch);

  const built: ProviderAdapter[] = [];
  try {
    const entries: RegistryEntry[] = [];
    for (const { capability, binding, spec } of plan) {
      const adapter = spec.build(binding.config, {
        provider_id: binding.provider_id,
        capability,
        client,
        groups,
        home: options.home,
      });
      built.push(adapter);
      entries.push({ adapter, active: binding.active });
    }

    const registry = new ProviderRegistry(entries);
    router = new Router(registry, options.logSinks ?? []);

    for (const capability of CAPABILITY_GROUPS) {
      for (const adapter of built) {
        if (adapter.capability !== capability) continue;
        try {
          await adapter.initialize();
        } catch (err: unknown) {
          throw toStackError(err).annotate(adapter.capability, adapter.provider_id);
        }
      }
    }

    return createStack(validated, registry, router, client, built);
  } catch (err: unknown) {
    await shutdownAll(built, options.warn ?? ((message) => console.warn(message)));
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Planning
// ---------------------------------------------------------------------------

function planBindings(manifest: Manifest, catalog: ProviderCatalog): PlannedBinding[] {
  const plan: PlannedBinding[] = [];

  for (const [group, bindings] of Object.entries(manifest.providers)) {
    if (!isCapabilityGroup(group)) {
      throw new ConfigError('UnknownCapability', `Manifest binds providers to unknown capability '${group}'`);
    }

    const seen = new Set<string>();
    for (const binding of bindings) {
      if (seen.has(binding.provider_id)) {
        throw new ConfigError(
          'DuplicateProviderId',
          `Duplicate provider_id '${binding.provider_id}' in capability '${group}'`,
          { capability: group, provider_id: binding.provider_id },
        );
      }
      seen.add(binding.provider_id);

      const spec = catalog.lookup(group, binding.provider_type);
      if (spec === undefined) {
        throw new ConfigError(
          'UnknownProviderKind',
          `No '${binding.provider_type}' provider exists for capability '${group}'`,
          { capability: group, provider_id: binding.provider_id },
        );
      }
      plan.push({ capability: group, binding, spec });
    }
  }

  const bound = new Set(plan.map((entry) => entry.capability));
  for (const api of manifest.apis) {
    if (!isCapabilityGroup(api)) {
      throw new ConfigError('UnknownCapability', `Manifest requires unknown capability '${api}'`);
    }
    if (!bound.has(api)) {
      throw new ConfigError('MissingCapability', `Capability '${api}' is required but has no provider`, {
        capability: api,
      });
    }
  }

  return plan;
}

function checkDependencies(plan: ReadonlyArray<PlannedBinding>, groups: ReadonlySet<CapabilityGroup>): void {
  for (const { capability, binding, spec } of plan) {
    const missing = spec.dependencies.filter((dependency) => !groups.has(dependency));
    if (missing.length > 0) {
      throw new ConfigError(
        'MissingDependency',
        `Provider '${binding.provider_id}' (${spec.provider_type}) needs capability ${missing
          .map((group) => `'${group}'`)
          .join(', ')}, which the manifest does not bind`,
        { capability, provider_id: binding.provider_id },
      );
    }
  }
}

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

function createStack(
  manifest: Manifest,
  registry: ProviderRegistry,
  router: Router,
  client: StackClient,
  adapters: ReadonlyArray<ProviderAdapter>,
): Stack {
  let stopping: Promise<void> | undefined;

  return {
    manifest,
    registry,
    router,
    client,
    dispatch: (capability, operation, payload, options) => router.dispatch(capability, operation, payload, options),
    providers: () => registry.list(),
    shutdown(): Promise<void> {
      stopping ??= shutdownStrict(adapters);
      return stopping;
    },
  };
}

/** Shut down every adapter; the first failure is rethrown once all have run. */
async function shutdownStrict(adapters: ReadonlyArray<ProviderAdapter>): Promise<void> {
  const failures = await shutdownEach(adapters);
  const first = failures[0];
  if (first !== undefined) {
    throw toStackError(first.error).annotate(first.adapter.capability, first.adapter.provider_id);
  }
}

/** Used while unwinding a failed resolution, where the original error wins. */
async function shutdownAll(adapters: ReadonlyArray<ProviderAdapter>, warn: (message: string) => void): Promise<void> {
  for (const { adapter, error } of await shutdownEach(adapters)) {
    warn(`Provider '${adapter.provider_id}' (${adapter.capability}) failed to shut down: ${String(error)}`);
  }
}

async function shutdownEach(
  adapters: ReadonlyArray<ProviderAdapter>,
): Promise<Array<{ adapter: ProviderAdapter; error: unknown }>> {
  const failures: Array<{ adapter: ProviderAdapter; error: unknown }> = [];
  for (const adapter of [...adapters].reverse()) {
    try {
      await adapter.shutdown();
    } catch (error: unknown) {
      failures.push({ adapter, error });
    }
  }
  return failures;
}
