/**
 * Capstack Distribution — Manifest Loader
 *
 * Reads a manifest file (YAML, or JSON, which YAML parses as-is), expands
 * environment references in string values, then validates the result.
 *
 * Reference syntax inside any string value:
 *   ${env.NAME}           value of NAME; an unset variable is an error
 *   ${env.NAME:fallback}  value of NAME, or `fallback` when unset
 *
 * Expansion is textual and always yields a string. Keys are never expanded.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { ConfigError } from '@capstack/core';
import type { Manifest } from './manifest-schema.js';
import { parseManifest } from './manifest-schema.js';

const ENV_REFERENCE = /\$\{env\.([A-Za-z_][A-Za-z0-9_]*)(?::([^}]*))?\}/g;

export interface LoadManifestOptions {
  /** Environment to expand references from; defaults to process.env. */
  readonly env?: NodeJS.ProcessEnv | undefined;
}

/**
 * Load, expand and validate the manifest at `path`.
 *
 * @throws {ConfigError} InvalidManifest when the file cannot be read or
 *   parsed, a referenced variable is unset, or the document is malformed
 */
export function loadManifest(path: string, options: LoadManifestOptions = {}): Manifest {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    throw new ConfigError('InvalidManifest', `Cannot read manifest '${path}': ${String(err)}`, { cause: err });
  }
  return parseManifestText(text, { ...options, source: path });
}

/**
 * Parse manifest text already in memory.
 */
export function parseManifestText(
  text: string,
  options: LoadManifestOptions & { readonly source?: string | undefined } = {},
): Manifest {
  const source = options.source ?? 'manifest';
  let document: unknown;
  try {
    document = parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError('InvalidManifest', `Cannot parse ${source}: ${reason}`, { cause: err });
  }
  return parseManifest(expandEnv(document, options.env ?? process.env), source);
}

/**
 * Replace `${env.NAME}` references in every string of a parsed document.
 * Returns a new value; the input is not modified.
 *
 * @throws {ConfigError} InvalidManifest naming every unset variable that has no fallback
 */
export function expandEnv(document: unknown, env: NodeJS.ProcessEnv): unknown {
  const missing = new Set<string>();
  const expanded = expandValue(document, env, missing);
  if (missing.size > 0) {
    throw new ConfigError(
      'InvalidManifest',
      `Manifest references unset environment variable(s): ${[...missing].join(', ')}`,
    );
  }
  return expanded;
}

function expandValue(value: unknown, env: NodeJS.ProcessEnv, missing: Set<string>): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (match: string, name: string, fallback: string | undefined) => {
      const resolved = env[name];
      if (resolved !== undefined) return resolved;
      if (fallback !== undefined) return fallback;
      missing.add(name);
      return match;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => expandValue(item, env, missing));
  }
  if (typeof value === 'object' && value !== null) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = expandValue(item, env, missing);
    }
    return out;
  }
  return value;
}
