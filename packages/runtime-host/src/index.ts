/**
 * @switchboard/runtime-host
 *
 * Switchboard runtime host: side-effectful implementations of the kernel's
 * adapter interfaces, plus home directory, configuration and change log
 * persistence. Depends on @switchboard/kernel (interfaces); implements
 * concrete behavior using Node.js built-ins.
 *
 * No kernel code imports from this package.
 */

// Variable table (implements the kernel's VariableStore)
export type { AssignResult } from './variables/shell-variables.js';
export { ShellVariables, isValidVariableName } from './variables/shell-variables.js';

// Logging
export { CHANGE_LOG_FILE, FileLogSink } from './logging/file-log-sink.js';
export type { MonotonicUlidOptions } from './logging/ulid.js';
export { createMonotonicUlid, ulid } from './logging/ulid.js';
export type { ChangeLogRecord, LogReadResult, LogReadStats } from './logging/log-reader.js';
export { readLog, toChangeLogRecord } from './logging/log-reader.js';

// StateIO: home-scoped I/O abstraction
export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO } from './state/state-io.js';

// SWITCHBOARD_HOME resolution with precedence chain
export type { ResolveHomeOptions } from './home.js';
export {
  getOsConfigPath,
  readHomeFromOsConfig,
  resolveSwitchboardHome,
  writeHomeToOsConfig,
} from './home.js';

// Runtime configuration (<home>/config.json)
export type {
  ConfigKey,
  ConfigLoadResult,
  ConfigUpdateResult,
  RuntimeConfig,
} from './config/runtime-config.js';
export {
  CONFIG_FILE,
  CONFIG_KEYS,
  DEFAULT_RUNTIME_CONFIG,
  loadRuntimeConfig,
  parseRuntimeConfig,
  saveRuntimeConfig,
  updateRuntimeConfig,
} from './config/runtime-config.js';
