/**
 * @capstack/module-telemetry
 */

export { TELEMETRY_PROVIDER, TelemetryProviderConfigSchema } from './manifest.js';
export type { TelemetryProviderConfig } from './manifest.js';
export { TELEMETRY_LOG_FILE, TraceLog, formatEvent } from './trace-log.js';
export type { TraceLogOptions } from './trace-log.js';
