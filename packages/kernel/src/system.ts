/**
 * Switchboard Kernel - Option System
 *
 * The OptionSystem is the context object every caller receives. It owns one
 * registry and wires the value accessor, the mirror synchronizer and the
 * change logger around it. There is no module-level instance: a process may
 * build as many independent systems as it needs (tests build one per case).
 */

import type { VariableStore } from './adapters/index.js';
import { DisplayStyle, listOptions, renderOption } from './display/render.js';
import { ChangeLogger } from './logging/change-log.js';
import type { LogSink } from './logging/log-sink.js';
import { OptionRegistry } from './registry/option-registry.js';
import { MirrorSynchronizer } from './sync/mirror.js';
import type { ImportReport } from './sync/mirror.js';
import { AccessClass } from './types/access.js';
import { ALL_MIRRORS, Mirror, mirrorsOf } from './types/mirror.js';
import type { OptionDescriptor, OptionValue } from './types/option.js';
import type { Outcome } from './types/outcome.js';
import { ValueAccessor } from './values/accessor.js';

export interface OptionSystemOptions {
  /** The interpreter's variable table; receives the environment mirrors. */
  readonly variables: VariableStore;
  /** Persistence for change events. Omit to keep them in memory only. */
  readonly sink?: LogSink | undefined;
  /** Throw on registry consistency violations (default true). */
  readonly strictConsistency?: boolean | undefined;
  readonly onConsistencyViolation?: ((detail: string) => void) | undefined;
  readonly now?: (() => Date) | undefined;
}

export interface InitializeOptions {
  /** Import inherited SHELLOPTS/BASHOPTS before serializing (default true). */
  readonly importEnvironment?: boolean | undefined;
}

export interface InitializeReport {
  /** One report per mirror, empty when importing was disabled. */
  readonly imports: ReadonlyArray<ImportReport>;
  readonly mirrors: Readonly<Record<Mirror, string>>;
}

export interface ResetEntry {
  readonly option: OptionDescriptor;
  readonly outcome: Outcome;
}

export class OptionSystem {
  readonly registry: OptionRegistry;
  readonly accessor: ValueAccessor;
  readonly synchronizer: MirrorSynchronizer;
  readonly logger: ChangeLogger;
  readonly variables: VariableStore;

  constructor(options: OptionSystemOptions) {
    this.variables = options.variables;
    this.logger = new ChangeLogger(options.sink);
    this.registry = new OptionRegistry({
      strict: options.strictConsistency,
      onConsistencyViolation: options.onConsistencyViolation,
      onRegister: (option) => this.refreshIfEnabled(option, AccessClass.Environ),
      onDeregister: (option) => this.refreshIfEnabled(option, AccessClass.Unload),
    });
    this.synchronizer = new MirrorSynchronizer(
      this.registry,
      this.variables,
      (option, access, value) => this.accessor.write(option, access, value, { refresh: false }),
    );
    this.accessor = new ValueAccessor({
      refresher: this.synchronizer,
      logger: this.logger,
      now: options.now,
    });
  }

  // -------------------------------------------------------------------------
  // Registry
  // -------------------------------------------------------------------------

  register(option: OptionDescriptor): Outcome {
    return this.registry.register(option);
  }

  deregister(option: OptionDescriptor): Outcome {
    return this.registry.deregister(option);
  }

  findByName(name: string): OptionDescriptor | undefined {
    return this.registry.findByName(name);
  }

  findByLetter(letter: string): OptionDescriptor | undefined {
    return this.registry.findByLetter(letter);
  }

  letters(): string {
    return this.registry.letters();
  }

  /**
   * An enabled option joins its mirrors when it is registered and drops out
   * of them when it is removed.
   */
  private refreshIfEnabled(option: OptionDescriptor, access: AccessClass): void {
    const mirrors = mirrorsOf(option);
    if (mirrors.length === 0) return;
    if (this.accessor.read(option, access) <= 0) return;
    for (const mirror of mirrors) {
      this.synchronizer.refresh(mirror);
    }
  }

  // -------------------------------------------------------------------------
  // Values
  // -------------------------------------------------------------------------

  read(option: OptionDescriptor | undefined, access: AccessClass): OptionValue {
    return this.accessor.read(option, access);
  }

  write(option: OptionDescriptor | undefined, access: AccessClass, value: OptionValue): Outcome {
    return this.accessor.write(option, access, value);
  }

  /** Write by long name; NotFound for an unknown name. */
  writeByName(name: string, access: AccessClass, value: OptionValue): Outcome {
    return this.write(this.findByName(name), access, value);
  }

  /** Write by letter; NotFound for an unknown letter. */
  writeByLetter(letter: string, access: AccessClass, value: OptionValue): Outcome {
    return this.write(this.findByLetter(letter), access, value);
  }

  // -------------------------------------------------------------------------
  // Mirrors
  // -------------------------------------------------------------------------

  serialize(mirror: Mirror): string {
    return this.synchronizer.serialize(mirror);
  }

  deserialize(mirror: Mirror): ImportReport {
    return this.synchronizer.deserialize(mirror);
  }

  /**
   * Bring the mirrors in line with the registry once the built-in options
   * are registered: import inherited values when allowed, then publish both.
   */
  initialize(options: InitializeOptions = {}): InitializeReport {
    const imports: ImportReport[] = [];
    if (options.importEnvironment ?? true) {
      for (const mirror of ALL_MIRRORS) {
        imports.push(this.deserialize(mirror));
      }
    }
    const mirrors: Record<Mirror, string> = {
      [Mirror.ShellOpts]: this.serialize(Mirror.ShellOpts),
      [Mirror.BashOpts]: this.serialize(Mirror.BashOpts),
    };
    return { imports, mirrors };
  }

  /** Write every option's default value back with Reinit access. */
  resetToDefaults(): ReadonlyArray<ResetEntry> {
    const entries: ResetEntry[] = [];
    for (const option of [...this.registry.enumerate()]) {
      if (option.defaultValue === undefined) continue;
      entries.push({
        option,
        outcome: this.write(option, AccessClass.Reinit, option.defaultValue),
      });
    }
    return entries;
  }

  // -------------------------------------------------------------------------
  // Display
  // -------------------------------------------------------------------------

  list(access: AccessClass, style: DisplayStyle, hideValues?: ReadonlySet<OptionValue>): string[] {
    return listOptions(this.registry, access, style, hideValues);
  }

  describe(option: OptionDescriptor, style: DisplayStyle = DisplayStyle.Help3): string[] {
    return renderOption(option, AccessClass.Any, style);
  }
}
