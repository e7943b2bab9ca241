/**
 * switchboard mirrors: Print the environment mirrors
 *
 * Shows SHELLOPTS and BASHOPTS as a fresh session publishes them, after
 * the startup options and the environment import.
 */

import { Command } from 'commander';
import { ALL_MIRRORS } from '@switchboard/kernel';
import { openSession, type GlobalOptions } from './runtime.js';

export const mirrorsCommand = new Command('mirrors')
  .description('Print SHELLOPTS and BASHOPTS')
  .action((_options: unknown, command: Command) => {
    const session = openSession(command.optsWithGlobals<GlobalOptions>());
    for (const mirror of ALL_MIRRORS) {
      // eslint-disable-next-line no-console
      console.log(`${mirror}=${session.initReport.mirrors[mirror]}`);
    }
  });
