/**
 * @capstack/module-agents
 *
 * Agents, sessions and turns. A turn composes the stack's safety, memory
 * and inference capabilities through the router.
 */

export { AGENTS_PROVIDER, AgentsProviderConfigSchema } from './manifest.js';
export type { AgentsProviderConfig } from './manifest.js';
export { AgentService, DEFAULT_MAX_MEMORY_CHUNKS } from './agent-service.js';
export type { AgentServiceOptions } from './agent-service.js';
export { AgentStore } from './agent-store.js';
export { formatRetrievedContext, selectChunks } from './retrieval.js';
export type { ScoredChunk } from './retrieval.js';
