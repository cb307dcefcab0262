/**
 * Capstack Safety Module — Shield Registry
 *
 * Serves the `shields` group: named shields, each binding an identifier to a
 * shield type and fixed params. A shield type is accepted only if the
 * stack's safety capability reports serving it.
 *
 * Registrations of one identifier are serialized, so two concurrent
 * registrations of it cannot both succeed.
 */

import { ConfigError, RoutingError, ShieldSchema } from '@capstack/core';
import type {
  GetShieldRequest,
  GetShieldResponse,
  InvokeOptions,
  ListShieldsResponse,
  RegisterShieldRequest,
  RegisterShieldResponse,
  Shield,
  ShieldsApi,
} from '@capstack/core';
import { KeyedLock } from '@capstack/runtime-host';
import type { KVStore } from '@capstack/runtime-host';

const KEY_PREFIX = 'shield:';

/** Shield types the stack's safety capability serves. */
export type ShieldTypeLookup = (signal: AbortSignal) => Promise<ReadonlyArray<string>>;

export class ShieldRegistry implements ShieldsApi {
  private readonly lock = new KeyedLock();

  constructor(
    private readonly store: KVStore,
    private readonly shieldTypes: ShieldTypeLookup,
  ) {}

  register_shield(request: RegisterShieldRequest, options: InvokeOptions): Promise<RegisterShieldResponse> {
    return this.lock.run(request.identifier, async () => {
      if ((await this.read(request.identifier)) !== null) {
        throw new ConfigError('DuplicateShield', `Shield '${request.identifier}' is already registered`);
      }
      return { shield: await this.write(request, options.signal) };
    });
  }

  /**
   * Register or replace a shield. Used for shields declared in provider
   * config, which are rewritten on every start.
   */
  put_shield(request: RegisterShieldRequest, options: InvokeOptions): Promise<RegisterShieldResponse> {
    return this.lock.run(request.identifier, async () => ({ shield: await this.write(request, options.signal) }));
  }

  async get_shield(request: GetShieldRequest): Promise<GetShieldResponse> {
    return { shield: await this.read(request.identifier) };
  }

  async list_shields(): Promise<ListShieldsResponse> {
    const shields: Shield[] = [];
    for (const key of await this.store.keys(KEY_PREFIX)) {
      const parsed = ShieldSchema.safeParse(await this.store.get(key));
      if (parsed.success) shields.push(parsed.data);
    }
    return { shields };
  }

  // -------------------------------------------------------------------------
  // Internal helpers
  // -------------------------------------------------------------------------

  private async write(request: RegisterShieldRequest, signal: AbortSignal): Promise<Shield> {
    const served = await this.shieldTypes(signal);
    if (!served.includes(request.shield_type)) {
      throw new RoutingError(
        'UnknownShield',
        `Shield type '${request.shield_type}' is not served by this stack; available: ${served.join(', ')}`,
      );
    }
    const shield: Shield = {
      identifier: request.identifier,
      shield_type: request.shield_type,
      params: request.params ?? {},
    };
    await this.store.set(KEY_PREFIX + shield.identifier, shield);
    return shield;
  }

  private async read(identifier: string): Promise<Shield | null> {
    const parsed = ShieldSchema.safeParse(await this.store.get(KEY_PREFIX + identifier));
    return parsed.success ? parsed.data : null;
  }
}
