/**
 * Capstack Distribution — Manifest Schema
 *
 * A manifest names the capability groups a stack must serve (`apis`) and
 * the provider bindings for each group. Keys this schema does not know
 * (build metadata, image names) are dropped, not rejected.
 *
 * Group names are kept as plain strings here; the resolver checks them
 * against the closed set of capability groups so it can report
 * `UnknownCapability` rather than a generic schema failure.
 */

import { z } from 'zod';
import { ConfigError, describeIssues } from '@capstack/core';

export const ProviderBindingSchema = z.object({
  provider_id: z.string().min(1),
  provider_type: z.string().min(1),
  config: z.record(z.unknown()).default({}),
  active: z.boolean().optional(),
});
export type ProviderBinding = z.output<typeof ProviderBindingSchema>;

export const ServerSettingsSchema = z.object({
  port: z.number().int().min(0).max(65_535).optional(),
  host: z.string().min(1).optional(),
});
export type ServerSettings = z.output<typeof ServerSettingsSchema>;

export const ManifestSchema = z.object({
  version: z.union([z.string(), z.number()]).transform((v) => String(v)),
  image_name: z.string().optional(),
  apis: z.array(z.string().min(1)).default([]),
  providers: z.record(z.array(ProviderBindingSchema)),
  server: ServerSettingsSchema.optional(),
});
export type Manifest = z.output<typeof ManifestSchema>;

/**
 * Validate a parsed manifest document.
 *
 * @param source - Where the document came from, for the error message
 * @throws {ConfigError} InvalidManifest listing every issue path
 */
export function parseManifest(document: unknown, source = 'manifest'): Manifest {
  const parsed = ManifestSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError('InvalidManifest', `Invalid ${source}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}
