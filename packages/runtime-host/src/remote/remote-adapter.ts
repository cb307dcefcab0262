/**
 * Capstack Runtime Host — Remote Stack Adapter
 *
 * Serves one capability group by forwarding every operation to another
 * Capstack server: `POST <url>/<capability>/<operation>` with the payload as
 * the JSON body. The payload is sent as received; the serving stack
 * validates it.
 *
 * Building the adapter performs no network I/O.
 */

import { z } from 'zod';
import { CAPABILITY_GROUPS, ProviderKind, defineProvider } from '@capstack/core';
import type { CapabilityGroup, InvokeOptions, ProviderAdapter, ProviderSpec } from '@capstack/core';
import { HttpTransport } from './http-transport.js';

export const DEFAULT_REMOTE_TIMEOUT_MS = 20_000;

export const RemoteStackConfigSchema = z.object({
  url: z.string().url(),
  timeout_ms: z.number().int().positive().default(DEFAULT_REMOTE_TIMEOUT_MS),
  structured_errors: z.boolean().default(false),
  headers: z.record(z.string()).optional(),
});
export type RemoteStackConfig = z.output<typeof RemoteStackConfigSchema>;

export interface RemoteAdapterOptions {
  readonly provider_id: string;
  readonly capability: CapabilityGroup;
  readonly config: RemoteStackConfig;
  readonly fetch?: typeof fetch | undefined;
}

export class RemoteAdapter implements ProviderAdapter {
  readonly kind = ProviderKind.Remote;
  readonly provider_type = 'remote::stack';
  readonly provider_id: string;
  readonly capability: CapabilityGroup;
  private readonly transport: HttpTransport;

  constructor(options: RemoteAdapterOptions) {
    this.provider_id = options.provider_id;
    this.capability = options.capability;
    this.transport = new HttpTransport({
      base_url: options.config.url,
      timeout_ms: options.config.timeout_ms,
      headers: options.config.headers,
      structured_errors: options.config.structured_errors,
      fetch: options.fetch,
    });
  }

  invoke(operation: string, payload: unknown, options: InvokeOptions): Promise<unknown> {
    return this.transport.postJson(
      `/${this.capability}/${encodeURIComponent(operation)}`,
      payload ?? {},
      options.signal,
    );
  }

  async initialize(): Promise<void> {
    // Connections are opened per call.
  }

  async shutdown(): Promise<void> {
    // Nothing is held between calls.
  }
}

/** The `remote::stack` catalog entry for one capability group. */
export function remoteStackProvider(capability: CapabilityGroup): ProviderSpec {
  return defineProvider({
    capability,
    provider_type: 'remote::stack',
    description: `Forwards ${capability} operations to another stack over HTTP`,
    config: RemoteStackConfigSchema,
    build: (config, context) =>
      new RemoteAdapter({ provider_id: context.provider_id, capability, config }),
  });
}

/** `remote::stack` entries for every capability group. */
export function remoteStackProviders(): ReadonlyArray<ProviderSpec> {
  return CAPABILITY_GROUPS.map((capability) => remoteStackProvider(capability));
}
