/**
 * @switchboard/kernel
 *
 * Switchboard option kernel: descriptor, access and outcome types, the
 * option registry, the value accessor, the environment mirror synchronizer,
 * display rendering, single-letter flag helpers and the change-log contract.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. The variable table
 * and log persistence are injected through the adapter interfaces and live
 * in @switchboard/runtime-host.
 */

// Types
export * from './types/index.js';

// Adapter interfaces (implementations live in runtime-host)
export type { BindOptions, VariableStore, VariableView } from './adapters/index.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';

// Errors
export { InternalConsistencyError } from './errors.js';

// Implementations
export { OptionRegistry } from './registry/option-registry.js';
export type { OptionRegistryOptions } from './registry/option-registry.js';
export { ValueAccessor, isStorableValue, readOption, writeOption } from './values/accessor.js';
export type { ValueAccessorOptions, WriteOptions } from './values/accessor.js';
export { MirrorSynchronizer, isListShaped } from './sync/mirror.js';
export type { ImportReport, MirrorImportWriter } from './sync/mirror.js';
export { DisplayStyle, NAME_COLUMN_WIDTH, listOptions, renderOption } from './display/render.js';
export {
  FLAG_ERROR,
  FLAG_OFF,
  FLAG_ON,
  boolToFlag,
  changeFlag,
  flagToBool,
  isValidFlag,
  restoreFlags,
  saveFlags,
  whichSetFlags,
} from './flags/flags.js';
export type { FlagChar, FlagSnapshot, SetFlagExtras } from './flags/flags.js';
export { ChangeLogger, DEFAULT_RECENT_LIMIT } from './logging/change-log.js';
export { OptionSystem } from './system.js';
export type {
  InitializeOptions,
  InitializeReport,
  OptionSystemOptions,
  ResetEntry,
} from './system.js';
