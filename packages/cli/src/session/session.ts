/**
 * Switchboard CLI - Session
 *
 * One interpreter session: the variable table, the option system, the
 * extension loader and the builtin shell-options extension. The constructor
 * runs the startup sequence in order:
 *
 *   1. load shell-options, then every extension listed in `autoload`;
 *   2. apply command-line options (`-o`, `-O`, `--flags`) with Argv access;
 *   3. import inherited SHELLOPTS / BASHOPTS (unless disabled) and publish
 *      both mirrors.
 *
 * Everything side-effectful is injected: with no StateIO the session reads
 * no configuration and writes no change log.
 */

import {
  AccessClass,
  Outcome,
  OptionSystem,
  describeOutcome,
  isBadOutcome,
  toOptionValue,
  whichSetFlags,
  type InitializeReport,
  type SetFlagExtras,
} from '@switchboard/kernel';
import {
  DEFAULT_RUNTIME_CONFIG,
  FileLogSink,
  ShellVariables,
  loadRuntimeConfig,
  type RuntimeConfig,
  type StateIO,
} from '@switchboard/runtime-host';
import {
  ExtensionLoader,
  type CommandResult,
  type ExtensionContext,
  type LoadResult,
  type UnloadResult,
} from '@switchboard/extension-loader';
import {
  createShellOptionsExtension,
  type EditingModeState,
  type SessionTraits,
  type ShellOptionCatalog,
} from '@switchboard/module-shell-options';
import { runCommand } from '../builtins/index.js';
import { formatFailure } from '../builtins/output.js';
import { FIRST_PARTY_EXTENSIONS, type ExtensionCatalog } from './extension-catalog.js';
import { splitCommands } from './words.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Options given on the command line, applied before the environment import. */
export interface StartupOptions {
  /** `-o NAME`, in order. */
  readonly setOptions?: ReadonlyArray<string> | undefined;
  /** `-O NAME`, in order. */
  readonly shoptOptions?: ReadonlyArray<string> | undefined;
  /** `--flags LETTERS`: letters to turn on, or off after a leading `+`. */
  readonly flags?: string | undefined;
}

export interface SessionOptions {
  /** Environment block the variable table starts from (default: empty). */
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  /** Home-scoped persistence for config.json and the change log. */
  readonly stateIO?: StateIO | undefined;
  /** Use this configuration instead of reading config.json. */
  readonly config?: RuntimeConfig | undefined;
  /** Overrides config.importEnvironment (`--no-import-env`). */
  readonly importEnvironment?: boolean | undefined;
  readonly traits?: SessionTraits | undefined;
  readonly startup?: StartupOptions | undefined;
  readonly extensions?: ExtensionCatalog | undefined;
  readonly catalog?: ShellOptionCatalog | undefined;
  /** Extra letters reported in `$-`. */
  readonly flagExtras?: SetFlagExtras | undefined;
  readonly now?: (() => Date) | undefined;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export class Session {
  readonly variables: ShellVariables;
  readonly system: OptionSystem;
  readonly loader: ExtensionLoader;
  readonly config: RuntimeConfig;
  readonly editing: EditingModeState;
  readonly extensions: ExtensionCatalog;
  readonly initReport: InitializeReport;
  /** Configuration and autoload problems, reported once at startup. */
  readonly warnings: string[] = [];
  /** Diagnostics for rejected command-line options. */
  readonly startupErrors: string[] = [];

  /** Positional parameters, as last set by `set`. */
  positional: ReadonlyArray<string> = [];
  /** Status of the last command run through execute(). */
  lastStatus = 0;

  private exitStatus: number | undefined;
  private readonly flagExtras: SetFlagExtras;

  constructor(options: SessionOptions = {}) {
    this.flagExtras = options.flagExtras ?? {};
    this.extensions = options.extensions ?? FIRST_PARTY_EXTENSIONS;
    this.config = this.resolveConfig(options);
    this.variables = ShellVariables.fromEnvironment(options.env ?? {});

    const sink =
      options.stateIO !== undefined && this.config.changeLog
        ? new FileLogSink(options.stateIO)
        : undefined;
    this.system = new OptionSystem({
      variables: this.variables,
      sink,
      strictConsistency: this.config.strictConsistency,
      onConsistencyViolation: (detail) => this.warnings.push(`consistency: ${detail}`),
      now: options.now,
    });
    this.loader = new ExtensionLoader(this.context());

    const shellOptions = createShellOptionsExtension(options.traits, options.catalog);
    const loaded = this.loader.load(shellOptions.manifest);
    if (!loaded.ok) {
      throw new Error(`shell-options failed to load: ${formatFailure(loaded)}`);
    }
    this.editing = shellOptions.editing;

    for (const id of this.config.autoload) {
      const result = this.loadExtension(id);
      if (!result.ok) this.warnings.push(`autoload: ${id}: ${formatFailure(result)}`);
    }

    this.applyStartupOptions(options.startup ?? {});
    this.initReport = this.system.initialize({
      importEnvironment: options.importEnvironment ?? this.config.importEnvironment,
    });
  }

  private resolveConfig(options: SessionOptions): RuntimeConfig {
    if (options.config !== undefined) return options.config;
    if (options.stateIO === undefined) return DEFAULT_RUNTIME_CONFIG;
    const { config, warnings } = loadRuntimeConfig(options.stateIO);
    this.warnings.push(...warnings);
    return config;
  }

  private applyStartupOptions(startup: StartupOptions): void {
    for (const name of startup.setOptions ?? []) {
      this.applyStartupWrite(name, this.system.writeByName(name, AccessClass.Argv, 1));
    }
    for (const name of startup.shoptOptions ?? []) {
      this.applyStartupWrite(name, this.system.writeByName(name, AccessClass.Argv, 1));
    }

    const flags = startup.flags ?? '';
    const enable = !flags.startsWith('+');
    const letters = flags.startsWith('+') || flags.startsWith('-') ? flags.slice(1) : flags;
    for (const letter of letters) {
      const outcome = this.system.writeByLetter(letter, AccessClass.Argv, toOptionValue(enable));
      if (outcome === Outcome.NotFound) {
        this.startupErrors.push(`switchboard: -${letter}: invalid option`);
      } else {
        this.applyStartupWrite(`-${letter}`, outcome);
      }
    }
  }

  private applyStartupWrite(label: string, outcome: Outcome): void {
    if (isBadOutcome(outcome)) {
      this.startupErrors.push(`switchboard: ${label}: ${describeOutcome(outcome)}`);
    }
  }

  // -------------------------------------------------------------------------
  // Extensions
  // -------------------------------------------------------------------------

  context(): ExtensionContext {
    return { variables: this.variables, system: this.system };
  }

  loadExtension(id: string): LoadResult {
    const factory = this.extensions.get(id);
    if (factory === undefined) {
      return { ok: false, reason: `Unknown extension: ${id}` };
    }
    return this.loader.load(factory());
  }

  unloadExtension(id: string): UnloadResult {
    return this.loader.unload(id);
  }

  // -------------------------------------------------------------------------
  // Commands
  // -------------------------------------------------------------------------

  /** The value of `$-`. */
  flags(): string {
    return whichSetFlags(this.system, this.flagExtras);
  }

  /**
   * Run every command on `line` in order, stopping after `exit`.
   * Returns one result per command that ran.
   */
  execute(line: string): CommandResult[] {
    const results: CommandResult[] = [];
    for (const words of splitCommands(line)) {
      if (this.exitStatus !== undefined) break;
      const result = runCommand(words, this);
      this.lastStatus = result.status;
      results.push(result);
    }
    return results;
  }

  requestExit(status: number): void {
    this.exitStatus = status;
  }

  /** The status passed to `exit`, or undefined while the session runs. */
  get exitRequested(): number | undefined {
    return this.exitStatus;
  }
}
