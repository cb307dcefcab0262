/**
 * Capstack Safety Module — Provider Manifests
 *
 * Two catalog entries:
 *   safety  inline::meta-reference  — the shield runner
 *   shields inline::meta-reference  — the named shield registry
 */

import { z } from 'zod';
import {
  CapabilityGroup,
  ConfigError,
  InlineAdapter,
  RegisterShieldRequestSchema,
  defineProvider,
  safetyOperations,
  shieldsOperations,
} from '@capstack/core';
import { KVStoreKindSchema, openKVStore } from '@capstack/runtime-host';
import type { ShieldClassifier } from './classifier.js';
import { LlamaGuardClassifier, isLlamaGuardCategory } from './llama-guard.js';
import { PatternClassifier, PatternRuleSchema } from './pattern.js';
import { ShieldRunner } from './runner.js';
import { ShieldRegistry } from './shield-registry.js';

// ---------------------------------------------------------------------------
// Shield runner
// ---------------------------------------------------------------------------

export const LlamaGuardConfigSchema = z.object({
  /** Inference model serving Llama Guard. */
  model: z.string().min(1),
  /** Inference binding to classify with; the active one if omitted. */
  provider_id: z.string().min(1).optional(),
  excluded_categories: z
    .array(z.string().refine(isLlamaGuardCategory, { message: 'not a Llama Guard category (S1-S14)' }))
    .default([]),
  violation_level: z.enum(['warning', 'error']).default('error'),
});

export const SafetyProviderConfigSchema = z
  .object({
    llama_guard: LlamaGuardConfigSchema.optional(),
    pattern: z.object({ rules: z.array(PatternRuleSchema).min(1) }).optional(),
  })
  .refine((c) => c.llama_guard !== undefined || c.pattern !== undefined, {
    message: 'configure at least one of llama_guard or pattern',
  });
export type SafetyProviderConfig = z.output<typeof SafetyProviderConfigSchema>;

export const SAFETY_PROVIDER = defineProvider({
  capability: CapabilityGroup.Safety,
  provider_type: 'inline::meta-reference',
  description: 'Shield runner with Llama Guard (via inference) and regex pattern classifiers',
  config: SafetyProviderConfigSchema,
  build(config, context) {
    const classifiers: ShieldClassifier[] = [];

    const guard = config.llama_guard;
    if (guard !== undefined) {
      if (!context.groups.has(CapabilityGroup.Inference)) {
        throw new ConfigError(
          'MissingDependency',
          `Provider '${context.provider_id}' configures llama_guard but no inference provider is bound`,
          { capability: CapabilityGroup.Safety, provider_id: context.provider_id },
        );
      }
      classifiers.push(
        new LlamaGuardClassifier({
          model: guard.model,
          excluded_categories: guard.excluded_categories,
          violation_level: guard.violation_level,
          chat: (request, signal) =>
            context.client.withOptions({ signal, provider_id: guard.provider_id }).inference.chat_completion(request),
        }),
      );
    }

    if (config.pattern !== undefined) {
      try {
        classifiers.push(new PatternClassifier(config.pattern.rules));
      } catch (err: unknown) {
        throw new ConfigError(
          'InvalidProviderConfig',
          `Provider '${context.provider_id}' has an invalid pattern rule: ${err instanceof Error ? err.message : String(err)}`,
          { capability: CapabilityGroup.Safety, provider_id: context.provider_id, cause: err },
        );
      }
    }

    return new InlineAdapter({
      provider_id: context.provider_id,
      provider_type: 'inline::meta-reference',
      capability: CapabilityGroup.Safety,
      operations: safetyOperations(new ShieldRunner(classifiers)),
    });
  },
});

// ---------------------------------------------------------------------------
// Shield registry
// ---------------------------------------------------------------------------

export const ShieldsProviderConfigSchema = z.object({
  store: KVStoreKindSchema.default('memory'),
  /** Registered (or replaced) when the provider initializes. */
  shields: z.array(RegisterShieldRequestSchema).default([]),
});
export type ShieldsProviderConfig = z.output<typeof ShieldsProviderConfigSchema>;

export const SHIELDS_PROVIDER = defineProvider({
  capability: CapabilityGroup.Shields,
  provider_type: 'inline::meta-reference',
  description: 'Named shields over the stack safety capability',
  dependencies: [CapabilityGroup.Safety],
  config: ShieldsProviderConfigSchema,
  build(config, context) {
    const store = openKVStore({
      kind: config.store,
      home: context.home,
      namespace: 'shields',
      provider_id: context.provider_id,
    });
    const registry = new ShieldRegistry(store, async (signal) => {
      const response = await context.client.withOptions({ signal }).safety.list_shield_types();
      return response.shield_types;
    });

    return new InlineAdapter({
      provider_id: context.provider_id,
      provider_type: 'inline::meta-reference',
      capability: CapabilityGroup.Shields,
      operations: shieldsOperations(registry),
      initialize: async () => {
        const options = { signal: new AbortController().signal };
        for (const shield of config.shields) {
          await registry.put_shield(shield, options);
        }
      },
    });
  },
});
