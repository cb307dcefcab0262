/**
 * @capstack/core
 *
 * Capability contracts, provider adapter interfaces, the provider registry,
 * the request router and the error taxonomy.
 *
 * This package performs no I/O of its own. Concrete log sinks, persistence
 * and the HTTP transport for remote providers live in @capstack/runtime-host.
 */

// Types
export { CapabilityGroup, CAPABILITY_GROUPS, isCapabilityGroup, ProviderKind, normalizeProviderType } from './types/capability.js';
export type { CallOutcome, CallRecord } from './types/call.js';

// Errors
export type {
  AdapterErrorCode,
  AdapterErrorDetails,
  ChunkingErrorCode,
  ConfigErrorCode,
  ErrorFault,
  ErrorOrigin,
  NotFoundErrorCode,
  RoutingErrorCode,
  UpstreamError,
  WireError,
} from './errors.js';
export {
  AdapterError,
  ChunkingError,
  ConfigError,
  NotFoundError,
  RoutingError,
  StackError,
  isStackError,
  toStackError,
} from './errors.js';

// Contracts
export type {
  Dispatch,
  DispatchOptions,
  GroupCall,
  GroupContract,
  InvokeOptions,
  OperationContract,
  OperationHandler,
  OperationTable,
} from './contracts/shared.js';
export { describeIssues, groupCall, handle, lookupOperation, operation } from './contracts/shared.js';
export { CONTRACTS, operationNames } from './contracts/index.js';
export * from './contracts/inference.js';
export * from './contracts/safety.js';
export * from './contracts/memory.js';
export * from './contracts/agents.js';
export * from './contracts/telemetry.js';
export * from './contracts/shields.js';

// Adapters
export type {
  InlineAdapterOptions,
  ProviderAdapter,
  ProviderContext,
  ProviderDefinition,
  ProviderSpec,
} from './adapters/index.js';
export { InlineAdapter, defineProvider } from './adapters/index.js';

// Routing
export type { ProviderListing, RegistryEntry } from './routing/registry.js';
export { ProviderRegistry } from './routing/registry.js';
export { Router } from './routing/router.js';
export { StackClient } from './routing/client.js';

// Logging
export type { LogSink } from './logging/log-sink.js';
export { CallLogger } from './logging/call-log.js';
