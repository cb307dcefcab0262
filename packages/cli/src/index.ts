/**
 * @capstack/cli
 *
 * The `capstack` program and the functions behind each command, exported
 * so they can be driven without a process.
 */

export { program } from './commands/index.js';
export type { CliIO, LogMode, OpenStackOptions } from './context.js';
export {
  ExitCode,
  LogModeSchema,
  consoleIO,
  exitCodeFor,
  logModeFrom,
  logSinksFor,
  openStack,
  reportError,
  resolvePort,
  shutdownAfterFailure,
} from './context.js';
export type { CallOptions } from './commands/call.js';
export { DEFAULT_CALL_TIMEOUT_MS, callOperation } from './commands/call.js';
export type { LogsOptions } from './commands/logs.js';
export { showLogs } from './commands/logs.js';
export { listProviders } from './commands/providers.js';
export type { RunOptions } from './commands/run.js';
export { runServer } from './commands/run.js';
export type { ValidateOptions } from './commands/validate.js';
export { validateManifest } from './commands/validate.js';
