/**
 * Capstack Agents Module — Provider Manifest
 */

import { z } from 'zod';
import { CapabilityGroup, ConfigError, InlineAdapter, agentsOperations, defineProvider } from '@capstack/core';
import { KVStoreKindSchema, openKVStore } from '@capstack/runtime-host';
import { AgentStore } from './agent-store.js';
import { AgentService } from './agent-service.js';

export const AgentsProviderConfigSchema = z.object({
  /** `file` keeps agents and sessions in `<home>/state/agents.json`. */
  store: KVStoreKindSchema.default('memory'),
  trace_turns: z.boolean().default(false),
});
export type AgentsProviderConfig = z.output<typeof AgentsProviderConfigSchema>;

export const AGENTS_PROVIDER = defineProvider({
  capability: CapabilityGroup.Agents,
  provider_type: 'inline::meta-reference',
  description: 'Agents and sessions; turns run shields, memory retrieval and inference through the stack',
  dependencies: [CapabilityGroup.Inference],
  config: AgentsProviderConfigSchema,
  build(config, context) {
    if (config.trace_turns && !context.groups.has(CapabilityGroup.Telemetry)) {
      throw new ConfigError(
        'MissingDependency',
        `Provider '${context.provider_id}' sets trace_turns but no telemetry provider is bound`,
        { capability: CapabilityGroup.Agents, provider_id: context.provider_id },
      );
    }
    const store = openKVStore({
      kind: config.store,
      home: context.home,
      namespace: 'agents',
      provider_id: context.provider_id,
    });
    const service = new AgentService({
      store: new AgentStore(store),
      client: context.client,
      groups: context.groups,
      provider_id: context.provider_id,
      trace_turns: config.trace_turns,
    });

    return new InlineAdapter({
      provider_id: context.provider_id,
      provider_type: 'inline::meta-reference',
      capability: CapabilityGroup.Agents,
      operations: agentsOperations(service),
    });
  },
});
