/**
 * Capstack Runtime Host — Key/Value Store
 *
 * Persistence contract for providers that keep records across calls
 * (agents and sessions, registered shields). Values are plain JSON and are
 * returned as `unknown`; each caller parses them with its own schema.
 *
 * Implementations:
 *   - MemoryKVStore — process lifetime only
 *   - StateKVStore  — one JSON document per namespace, through StateIO
 */

import { z } from 'zod';
import { ConfigError } from '@capstack/core';
import type { StateIO } from './state-io.js';
import { FileStateIO } from './state-io.js';

export interface KVStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  delete(key: string): Promise<void>;
  /** Keys starting with `prefix`, in insertion order. */
  keys(prefix?: string): Promise<ReadonlyArray<string>>;
}

export class MemoryKVStore implements KVStore {
  private readonly entries = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.entries.get(key);
    return raw === undefined ? undefined : JSON.parse(raw);
  }

  async set(key: string, value: unknown): Promise<void> {
    this.entries.set(key, JSON.stringify(value));
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async keys(prefix = ''): Promise<ReadonlyArray<string>> {
    return [...this.entries.keys()].filter((key) => key.startsWith(prefix));
  }
}

const NamespaceDocument = z.record(z.unknown());

/**
 * A KVStore persisted as `<namespace>.json` in the StateIO state directory.
 * The whole document is rewritten on every mutation.
 */
export class StateKVStore implements KVStore {
  private readonly filename: string;

  constructor(
    private readonly stateIO: StateIO,
    namespace: string,
  ) {
    this.filename = `${namespace}.json`;
  }

  async get(key: string): Promise<unknown> {
    const doc = this.load();
    return Object.hasOwn(doc, key) ? doc[key] : undefined;
  }

  async set(key: string, value: unknown): Promise<void> {
    const doc = this.load();
    doc[key] = value;
    this.stateIO.writeJson(this.filename, doc);
  }

  async delete(key: string): Promise<void> {
    const doc = this.load();
    if (!Object.hasOwn(doc, key)) return;
    delete doc[key];
    this.stateIO.writeJson(this.filename, doc);
  }

  async keys(prefix = ''): Promise<ReadonlyArray<string>> {
    return Object.keys(this.load()).filter((key) => key.startsWith(prefix));
  }

  private load(): Record<string, unknown> {
    const parsed = NamespaceDocument.safeParse(this.stateIO.readJson(this.filename));
    return parsed.success ? { ...parsed.data } : {};
  }
}

// ---------------------------------------------------------------------------
// Store selection
// ---------------------------------------------------------------------------

/** Provider config field choosing where records live. */
export const KVStoreKindSchema = z.enum(['memory', 'file']);
export type KVStoreKind = z.infer<typeof KVStoreKindSchema>;

export interface OpenKVStoreOptions {
  readonly kind: KVStoreKind;
  /** Stack home; required for the file store. */
  readonly home: string | undefined;
  readonly namespace: string;
  /** Binding that asked for the store, for error attribution. */
  readonly provider_id: string;
}

/**
 * Open the store a provider binding asked for. A file store keeps
 * `<home>/state/<namespace>.json`.
 */
export function openKVStore(options: OpenKVStoreOptions): KVStore {
  if (options.kind === 'memory') {
    return new MemoryKVStore();
  }
  if (options.home === undefined) {
    throw new ConfigError(
      'InvalidProviderConfig',
      `Provider '${options.provider_id}' uses a file store but the stack has no home directory`,
      { provider_id: options.provider_id },
    );
  }
  return new StateKVStore(new FileStateIO(options.home), options.namespace);
}
