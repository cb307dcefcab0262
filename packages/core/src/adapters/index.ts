/**
 * Capstack Core — Provider Adapters
 *
 * A provider adapter implements one capability group for one binding in the
 * manifest. Inline adapters run in-process; remote adapters proxy every
 * operation over HTTP. Both satisfy the same interface, so the Router never
 * knows which kind it is talking to.
 *
 * Providers are described by a ProviderSpec: the catalog entry the Manifest
 * Resolver looks up by (capability, provider_type). A spec validates its own
 * configuration and builds the adapter.
 */

import type { z } from 'zod';
import type { CapabilityGroup } from '../types/capability.js';
import { ProviderKind, normalizeProviderType } from '../types/capability.js';
import type { InvokeOptions, OperationHandler } from '../contracts/shared.js';
import { describeIssues } from '../contracts/shared.js';
import { ConfigError, RoutingError } from '../errors.js';
import type { StackClient } from '../routing/client.js';

// ---------------------------------------------------------------------------
// Adapter Interface
// ---------------------------------------------------------------------------

export interface ProviderAdapter {
  readonly provider_id: string;
  /** Normalized `<kind>::<name>` type. */
  readonly provider_type: string;
  readonly kind: ProviderKind;
  readonly capability: CapabilityGroup;

  /**
   * Execute one operation. The payload is forwarded exactly as the caller
   * sent it; the adapter validates it against the operation's request schema.
   */
  invoke(operation: string, payload: unknown, options: InvokeOptions): Promise<unknown>;

  /** Acquire resources. Called once, after the adapter is built. */
  initialize(): Promise<void>;

  /** Release resources. Called once when the stack shuts down. */
  shutdown(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Inline Adapter
// ---------------------------------------------------------------------------

export interface InlineAdapterOptions {
  readonly provider_id: string;
  readonly provider_type: string;
  readonly capability: CapabilityGroup;
  /**
   * `Remote` for tables whose handlers call a network backend (e.g. Ollama).
   * Defaults to `Inline`.
   */
  readonly kind?: ProviderKind;
  readonly operations: Readonly<Record<string, OperationHandler>>;
  readonly initialize?: () => Promise<void>;
  readonly shutdown?: () => Promise<void>;
}

/**
 * An adapter backed by an in-process handler table, usually produced by one
 * of the `<group>Operations(api)` functions.
 */
export class InlineAdapter implements ProviderAdapter {
  readonly kind: ProviderKind;
  readonly provider_id: string;
  readonly provider_type: string;
  readonly capability: CapabilityGroup;

  constructor(private readonly options: InlineAdapterOptions) {
    this.kind = options.kind ?? ProviderKind.Inline;
    this.provider_id = options.provider_id;
    this.provider_type = options.provider_type;
    this.capability = options.capability;
  }

  async invoke(operation: string, payload: unknown, options: InvokeOptions): Promise<unknown> {
    const handler = Object.hasOwn(this.options.operations, operation)
      ? this.options.operations[operation]
      : undefined;
    if (handler === undefined) {
      throw new RoutingError(
        'UnknownOperation',
        `Provider '${this.provider_id}' does not implement ${this.capability}.${operation}`,
      );
    }
    return handler(payload, options);
  }

  async initialize(): Promise<void> {
    await this.options.initialize?.();
  }

  async shutdown(): Promise<void> {
    await this.options.shutdown?.();
  }
}

// ---------------------------------------------------------------------------
// Provider Specs
// ---------------------------------------------------------------------------

/**
 * What a provider receives when it is built.
 */
export interface ProviderContext {
  readonly provider_id: string;
  readonly capability: CapabilityGroup;
  /**
   * Client bound to the stack's own Router. Usable only after assembly
   * completes; cross-capability calls made from an operation go through it.
   */
  readonly client: StackClient;
  /** Capability groups that have at least one binding in the manifest. */
  readonly groups: ReadonlySet<CapabilityGroup>;
  /** State root for providers that persist data. Undefined means in-memory only. */
  readonly home: string | undefined;
}

export interface ProviderSpec {
  readonly capability: CapabilityGroup;
  /** Normalized `<kind>::<name>` type. */
  readonly provider_type: string;
  readonly kind: ProviderKind;
  /** Groups this provider calls into. Each must be bound in the manifest. */
  readonly dependencies: ReadonlyArray<CapabilityGroup>;
  readonly description: string;
  build(config: unknown, context: ProviderContext): ProviderAdapter;
}

export interface ProviderDefinition<S extends z.ZodTypeAny> {
  readonly capability: CapabilityGroup;
  readonly provider_type: string;
  readonly description: string;
  readonly dependencies?: ReadonlyArray<CapabilityGroup>;
  readonly config: S;
  build(config: z.output<S>, context: ProviderContext): ProviderAdapter;
}

/**
 * Declare a provider. The returned spec parses the binding's `config` with
 * the given schema before building; a mismatch is `InvalidProviderConfig`.
 */
export function defineProvider<S extends z.ZodTypeAny>(definition: ProviderDefinition<S>): ProviderSpec {
  const normalized = normalizeProviderType(definition.provider_type);
  if (normalized === undefined) {
    throw new Error(`Invalid provider_type in provider definition: '${definition.provider_type}'`);
  }

  return {
    capability: definition.capability,
    provider_type: normalized.provider_type,
    kind: normalized.kind,
    dependencies: definition.dependencies ?? [],
    description: definition.description,
    build(config: unknown, context: ProviderContext): ProviderAdapter {
      const parsed = definition.config.safeParse(config ?? {});
      if (!parsed.success) {
        throw new ConfigError(
          'InvalidProviderConfig',
          `Invalid config for provider '${context.provider_id}' (${normalized.provider_type}): ${describeIssues(parsed.error)}`,
          { capability: definition.capability, provider_id: context.provider_id },
        );
      }
      return definition.build(parsed.data, context);
    },
  };
}
