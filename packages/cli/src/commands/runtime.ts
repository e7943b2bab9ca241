/**
 * Switchboard CLI - Runtime
 *
 * Shared setup for the root command and the subcommands: the global
 * options, the home directory and session construction.
 */

import chalk from 'chalk';
import type { CommandResult } from '@switchboard/extension-loader';
import type { SetFlagExtras } from '@switchboard/kernel';
import type { SessionTraits } from '@switchboard/module-shell-options';
import { FileStateIO, resolveSwitchboardHome } from '@switchboard/runtime-host';
import { Session } from '../session/session.js';

/** Options accepted before any subcommand. */
export interface GlobalOptions {
  readonly setOption: string[];
  readonly shoptOption: string[];
  readonly flags?: string | undefined;
  readonly importEnv: boolean;
  readonly home?: string | undefined;
  readonly c?: string | undefined;
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function openStateIO(options: Pick<GlobalOptions, 'home'>): FileStateIO {
  return new FileStateIO(resolveSwitchboardHome({ home: options.home }));
}

/**
 * Start a session from the global options, printing configuration
 * warnings and startup diagnostics to stderr.
 */
export function openSession(
  options: GlobalOptions,
  traits: SessionTraits = {},
  flagExtras: SetFlagExtras = {},
): Session {
  const session = new Session({
    env: process.env,
    stateIO: openStateIO(options),
    importEnvironment: options.importEnv ? undefined : false,
    traits,
    flagExtras,
    startup: {
      setOptions: options.setOption,
      shoptOptions: options.shoptOption,
      flags: options.flags,
    },
  });

  for (const warning of session.warnings) {
    // eslint-disable-next-line no-console
    console.error(chalk.yellow(`switchboard: ${warning}`));
  }
  for (const error of session.startupErrors) {
    // eslint-disable-next-line no-console
    console.error(chalk.red(error));
  }
  return session;
}

export function printResult(result: CommandResult): void {
  for (const line of result.stdout) {
    // eslint-disable-next-line no-console
    console.log(line);
  }
  for (const line of result.stderr) {
    // eslint-disable-next-line no-console
    console.error(line);
  }
}
