/**
 * @capstack/runtime-host
 *
 * Side-effectful implementations behind the interfaces @capstack/core
 * defines: state persistence, call-log sinks, stack home resolution and the
 * HTTP transport used by remote providers.
 *
 * Core never imports from this package.
 */

// StateIO and key/value persistence
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';
export type { KVStore, KVStoreKind, OpenKVStoreOptions } from './state/kv-store.js';
export { KVStoreKindSchema, MemoryKVStore, StateKVStore, openKVStore } from './state/kv-store.js';

// Write serialization
export { KeyedLock } from './keyed-lock.js';

// CAPSTACK_HOME resolution
export type { ResolveStackHomeOptions } from './home.js';
export { resolveStackHome } from './home.js';

// Logging
export type { CallLogEntry } from './logging/file-log-sink.js';
export { CALL_LOG_FILE, CallLogEntrySchema, FileLogSink } from './logging/file-log-sink.js';
export type { WriteLine } from './logging/console-log-sink.js';
export { ConsoleLogSink, formatCallRecord } from './logging/console-log-sink.js';
export type { LoggedEvent, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog } from './logging/log-reader.js';

// Remote providers
export type { HttpRequestOptions, HttpResponse, HttpTransportOptions } from './remote/http-transport.js';
export { HttpTransport, sendHttp } from './remote/http-transport.js';
export type { RemoteAdapterOptions, RemoteStackConfig } from './remote/remote-adapter.js';
export {
  DEFAULT_REMOTE_TIMEOUT_MS,
  RemoteAdapter,
  RemoteStackConfigSchema,
  remoteStackProvider,
  remoteStackProviders,
} from './remote/remote-adapter.js';
